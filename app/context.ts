import type { Request, Response } from "express";
import { RecommendationService } from "@/lib/recs/service";
import { isDevelopment } from "@/lib/config/env";
import { isAppError } from "@/lib/util/errors";
import { logger, errorContext } from "@/lib/util/logger";

/**
 * Service instance registered on the Express app by createApp
 */
export function getService(req: Request): RecommendationService {
  const service: unknown = req.app.locals.service;
  if (!(service instanceof RecommendationService)) {
    throw new Error("RecommendationService is not registered on the app");
  }
  return service;
}

/**
 * Log a route failure and answer with the mapped status
 */
export function sendError(res: Response, error: unknown, label: string): void {
  if (isAppError(error)) {
    const context = { code: error.code, ...errorContext(error) };
    if (error.status >= 500) logger.error(label, context);
    else logger.warn(label, { code: error.code, error: error.message });

    res.status(error.status).json({ error: error.message, code: error.code });
    return;
  }

  const details = errorContext(error);
  logger.error(label, details);

  // Include error details in development for easier debugging
  const body = isDevelopment()
    ? { error: "Internal server error", code: "INTERNAL_ERROR", details: details.error }
    : { error: "Internal server error", code: "INTERNAL_ERROR" };
  res.status(500).json(body);
}
