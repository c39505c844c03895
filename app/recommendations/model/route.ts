import type { Request, Response } from "express";
import { getService, sendError } from "@/app/context";

export async function GET(req: Request, res: Response) {
  try {
    res.json(getService(req).modelInfo());
  } catch (error) {
    sendError(res, error, "Model info error");
  }
}
