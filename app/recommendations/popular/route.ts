import type { Request, Response } from "express";
import { getService, sendError } from "@/app/context";
import { parseTopK, queryString } from "@/lib/util/params";
import { logger } from "@/lib/util/logger";

/**
 * Popularity-ranked items; identical for every caller
 */
export async function GET(req: Request, res: Response) {
  try {
    const topK = parseTopK(queryString(req.query.top_k));
    const userId = queryString(req.query.user_id);

    logger.info("Popular recommendations request", { userId, topK });

    const result = await getService(req).getRecommendations({
      strategy: "popular",
      topK,
      userId,
    });
    res.json(result);
  } catch (error) {
    sendError(res, error, "Popular recommendations error");
  }
}
