import { Router } from "express";
import { parsePriceMode } from "../../config";
import { parseBoolean } from "../../lib/validators";
import { getRefreshJobStatus, requestRefresh, type RefreshQueue } from "./service";

export const createRefreshRouter = (queue: RefreshQueue): Router => {
  const router = Router();

  /**
   * POST /api/refresh { mode?: "live" | "statistics", force?: boolean }
   * Starts a background refresh, or returns the one already queued.
   */
  router.post("/", async (request, response) => {
    try {
      const body: unknown = request.body;
      const fields: object = body && typeof body === "object" ? body : {};
      const mode = "mode" in fields ? parsePriceMode(fields.mode) : undefined;
      const force = "force" in fields ? parseBoolean(fields.force) : false;
      const status = await requestRefresh(queue, { mode, force, triggeredBy: "manual" });
      return response.status(202).json(status);
    } catch (error) {
      return response.status(500).json({ error: String(error) });
    }
  });

  /** GET /api/refresh/:id */
  router.get("/:id", async (request, response) => {
    try {
      const status = await getRefreshJobStatus(queue, request.params.id);
      if (!status) return response.status(404).json({ error: "Job not found" });
      return response.json(status);
    } catch (error) {
      return response.status(500).json({ error: String(error) });
    }
  });

  return router;
};
