import express, { type NextFunction, type Request, type Response } from "express";
import type { RecommendationService } from "@/lib/recs/service";
import { RequestError, ValidationError } from "@/lib/util/errors";
import { sendError } from "./context";
import * as health from "./health/route";
import * as legacy from "./recommend/route";
import * as fpgrowth from "./recommendations/fpgrowth/route";
import * as fpgrowthCompute from "./recommendations/fpgrowth/compute/route";
import * as model from "./recommendations/model/route";
import * as popular from "./recommendations/popular/route";
import * as popularCompute from "./recommendations/popular/compute/route";
import * as similar from "./recommendations/similar/route";

interface BodyParserError {
  status: number;
  type: string;
  message: string;
}

/**
 * body-parser failures carry a 4xx `status` and a `type` such as
 * entity.parse.failed or entity.too.large
 */
function bodyParserError(err: unknown): BodyParserError | null {
  if (!(err instanceof Error)) return null;
  const status = "status" in err ? err.status : undefined;
  const type = "type" in err ? err.type : undefined;
  if (typeof status !== "number" || typeof type !== "string") return null;
  if (status < 400 || status > 499) return null;
  return { status, type, message: err.message };
}

export function createApp(service: RecommendationService) {
  const app = express();
  app.locals.service = service;
  app.disable("x-powered-by");
  app.use(express.json({ limit: "100kb" }));

  app.get("/health", health.GET);

  app.get("/recommendations/popular", popular.GET);
  app.post("/recommendations/popular/compute", popularCompute.POST);

  app.post("/recommendations/fpgrowth", fpgrowth.POST);
  app.post("/recommendations/fpgrowth/compute", fpgrowthCompute.POST);
  app.get("/recommendations/fpgrowth/:userId", fpgrowth.GET);

  app.get("/recommendations/similar/:itemId", similar.GET);
  app.get("/recommendations/model", model.GET);

  // Legacy path
  app.get("/recommend/:userId", legacy.GET);

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found", code: "NOT_FOUND" });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const rejected = bodyParserError(err);
    if (rejected?.type === "entity.parse.failed") {
      sendError(res, new ValidationError("Request body is not valid JSON"), "Malformed request body");
      return;
    }
    if (rejected) {
      sendError(res, new RequestError(rejected.message, rejected.status), "Rejected request body");
      return;
    }
    sendError(res, err, "Unhandled request error");
  });

  return app;
}
