import type { Request, Response } from "express";
import { getService, sendError } from "@/app/context";
import { parseTopK, queryString } from "@/lib/util/params";
import { logger } from "@/lib/util/logger";

/**
 * Legacy combined endpoint: association rules for the user's recent
 * items, back-filled with popular items
 */
export async function GET(req: Request, res: Response) {
  try {
    const userId = req.params.userId ?? "";
    const topK = parseTopK(queryString(req.query.top_k));

    logger.info("Legacy recommendations request", { userId, topK });

    const result = await getService(req).getRecommendations({
      strategy: "fpgrowth",
      topK,
      userId,
    });
    res.json(result);
  } catch (error) {
    sendError(res, error, "Legacy recommendations error");
  }
}
