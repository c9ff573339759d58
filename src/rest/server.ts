import express from "express";
import cors from "cors";
import type { Server } from "node:http";
import { createRouter, errorHandler, publicRouter } from "./routes.js";
import type { HistoryService } from "../history/service.js";
import { requestLogger, logRest } from "../logging.js";

const startTime = Date.now();

export function createApp(service: HistoryService): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  // Request logging
  app.use(requestLogger);

  // Serve public routes (OpenAPI document)
  app.use(publicRouter);

  app.get("/", (_req, res) => {
    res.json({
      name: "stock-history-service",
      version: "1.0.0",
      docs: "/openapi.json",
      health: "/health",
    });
  });

  // GET /health — liveness
  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
      timestamp: new Date().toISOString(),
    });
  });

  app.use("/api", createRouter(service));

  app.use((req, res) => {
    res.status(404).json({ error: "NotFound", message: `No route for ${req.method} ${req.path}` });
  });

  app.use(errorHandler);

  return app;
}

export function startRestServer(service: HistoryService, host: string, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const app = createApp(service);

    const httpServer = app.listen(port, host, () => {
      logRest.info({ host, port }, "REST server listening");
      logRest.info({ url: `http://localhost:${port}/openapi.json` }, "OpenAPI spec available");
      resolve(httpServer);
    });
    httpServer.once("error", reject);
  });
}
