import { Router, type NextFunction, type Request, type Response } from "express";
import { HistoryError, httpStatusFor, isHistoryError } from "../history/errors.js";
import { parseHistoricalRequest } from "../history/request.js";
import type { HistoryService } from "../history/service.js";
import { logRest } from "../logging.js";
import { getOpenApiSpec } from "./openapi.js";

export const publicRouter = Router();

publicRouter.get("/openapi.json", (_req, res) => {
  res.json(getOpenApiSpec());
});

/** API routes over an injected HistoryService. */
export function createRouter(service: HistoryService): Router {
  const router = Router();

  // POST /api/historical-data
  router.post("/historical-data", async (req, res, next) => {
    try {
      const query = parseHistoricalRequest(req.body);
      res.json(await service.getHistory(query));
    } catch (e: unknown) {
      next(e);
    }
  });

  // POST /api/analytical-insights
  router.post("/analytical-insights", async (req, res, next) => {
    try {
      const query = parseHistoricalRequest(req.body);
      res.json(await service.getInsights(query));
    } catch (e: unknown) {
      next(e);
    }
  });

  // GET /api/company-info/:symbol
  router.get("/company-info/:symbol", async (req, res, next) => {
    try {
      res.json(await service.getCompanyInfo(req.params.symbol));
    } catch (e: unknown) {
      next(e);
    }
  });

  // GET /api/stock-data/:symbol
  router.get("/stock-data/:symbol", async (req, res, next) => {
    try {
      res.json(await service.getMarketData(req.params.symbol));
    } catch (e: unknown) {
      next(e);
    }
  });

  return router;
}

/** body-parser rejects malformed JSON with a 4xx error carrying `type` */
function isBodyParseError(e: unknown): e is Error & { status: number; type: string } {
  return e instanceof Error && "type" in e && "status" in e && typeof e.status === "number";
}

/**
 * Final error middleware: HistoryError kinds map to status codes, anything
 * else is a 500 InternalError.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (isBodyParseError(err)) {
    const error = new HistoryError("InvalidRequest", "Request body must be valid JSON", { cause: err });
    logRest.warn({ path: req.path, err: err.message }, "Malformed request body");
    res.status(httpStatusFor(error.kind)).json({ error: error.kind, message: error.message });
    return;
  }

  if (isHistoryError(err)) {
    const status = httpStatusFor(err.kind);
    if (status >= 500) {
      logRest.error({ path: req.path, kind: err.kind, err: err.message }, "Request failed");
    } else {
      logRest.warn({ path: req.path, kind: err.kind, err: err.message }, "Request rejected");
    }
    res.status(status).json({ error: err.kind, message: err.message });
    return;
  }

  const message = err instanceof Error ? err.message : "Unknown error";
  logRest.error({ path: req.path, err }, "Unhandled error");
  res.status(500).json({ error: "InternalError", message });
}
