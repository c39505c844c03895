import type { Request, Response } from "express";
import { getService, sendError } from "@/app/context";
import { logger } from "@/lib/util/logger";

/**
 * Retrain from the interaction store and swap in the new snapshot
 */
export async function POST(req: Request, res: Response) {
  try {
    logger.info("FP-Growth training requested");
    const metadata = await getService(req).retrain();
    res.json({ status: "success", modelInfo: metadata });
  } catch (error) {
    sendError(res, error, "FP-Growth training error");
  }
}
