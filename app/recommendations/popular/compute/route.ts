import type { Request, Response } from "express";
import { getService, sendError } from "@/app/context";
import { logger } from "@/lib/util/logger";

/**
 * Recount popularity. Popularity and rules share one snapshot,
 * so this retrains both.
 */
export async function POST(req: Request, res: Response) {
  try {
    logger.info("Popularity recompute requested");
    const metadata = await getService(req).retrain();
    res.json({ status: "success", count: metadata.itemCount, metadata });
  } catch (error) {
    sendError(res, error, "Popularity recompute error");
  }
}
