import type { Request, Response } from "express";
import { z } from "zod";
import { getService, sendError } from "@/app/context";
import { ValidationError } from "@/lib/util/errors";
import { parseTopK, queryString } from "@/lib/util/params";
import { logger } from "@/lib/util/logger";

const BodySchema = z
  .object({
    userId: z.string().trim().min(1).optional(),
    basket: z.array(z.string().trim().min(1)).max(100).optional(),
    topK: z.number().optional(),
  })
  .refine((body) => body.userId !== undefined || (body.basket?.length ?? 0) > 0, {
    message: "userId or a non-empty basket is required",
  });

export type FpGrowthRequestBody = z.infer<typeof BodySchema>;

function parseBody(input: unknown): FpGrowthRequestBody {
  const parsed = BodySchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue?.path.join(".");
    throw new ValidationError(path ? `${path}: ${issue?.message}` : issue?.message ?? "Invalid body");
  }
  return parsed.data;
}

/**
 * FP-Growth recommendations for a stored user and/or an explicit basket
 */
export async function POST(req: Request, res: Response) {
  try {
    const body = parseBody(req.body);
    const topK = parseTopK(body.topK);

    logger.info("FP-Growth recommendations request", {
      userId: body.userId,
      basketSize: body.basket?.length ?? 0,
      topK,
    });

    const result = await getService(req).getRecommendations({
      strategy: "fpgrowth",
      topK,
      userId: body.userId,
      basket: body.basket,
    });
    res.json(result);
  } catch (error) {
    sendError(res, error, "FP-Growth recommendations error");
  }
}

/**
 * FP-Growth recommendations from a stored user's recent items
 * (mounted at /recommendations/fpgrowth/:userId)
 */
export async function GET(req: Request, res: Response) {
  try {
    const userId = req.params.userId ?? "";
    const topK = parseTopK(queryString(req.query.top_k));

    logger.info("FP-Growth recommendations request", { userId, topK });

    const result = await getService(req).getRecommendations({
      strategy: "fpgrowth",
      topK,
      userId,
    });
    res.json(result);
  } catch (error) {
    sendError(res, error, "FP-Growth recommendations error");
  }
}
