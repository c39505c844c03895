import type { Request, Response } from "express";
import { getService, sendError } from "@/app/context";
import { parseTopK, queryString } from "@/lib/util/params";

/**
 * Items that co-occur with one item, ranked by rule confidence
 */
export async function GET(req: Request, res: Response) {
  try {
    const topK = parseTopK(queryString(req.query.top_k));
    const result = await getService(req).getSimilarItems(req.params.itemId ?? "", topK);
    res.json(result);
  } catch (error) {
    sendError(res, error, "Similar items error");
  }
}
