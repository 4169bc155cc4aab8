import { randomUUID } from "node:crypto";

import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";

import { config } from "./config.js";
import { logger } from "./logger.js";
import { httpRequestCounter, httpRequestDuration, registry } from "./metrics/registry.js";
import { errorHandler } from "./middleware/errorHandler.js";
import { createOrderRouter } from "./routes/orders.js";
import type { OperationGateway } from "./services/operationGateway.js";

const headerValue = (value: string | string[] | undefined) => (Array.isArray(value) ? value[0] : value);

export const createApp = (gateway: OperationGateway) => {
  const app = express();

  // Correlation / trace id middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const existing = headerValue(req.headers["x-correlation-id"]) ?? headerValue(req.headers["x-request-id"]);
    const correlationId = existing && existing.trim() ? existing.trim() : randomUUID();
    req.correlationId = correlationId;
    res.setHeader("x-correlation-id", correlationId);
    next();
  });

  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = performance.now();
    res.on("finish", () => {
      const durationMs = Number((performance.now() - start).toFixed(2));
      logger.info({
        msg: "http_request",
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs,
        correlationId: req.correlationId,
      });
      const routeLabel = req.route?.path || req.originalUrl.split("?")[0] || "unknown";
      httpRequestDuration.observe({ method: req.method, route: routeLabel, status: String(res.statusCode) }, durationMs / 1000);
      httpRequestCounter.inc({ method: req.method, route: routeLabel, status: String(res.statusCode) });
    });
    next();
  });

  const allowedOrigins = new Set<string>();
  if (config.frontendUrl) {
    config.frontendUrl.split(",").forEach((origin) => {
      const trimmed = origin.trim();
      if (trimmed) allowedOrigins.add(trimmed);
    });
  }

  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin) return callback(null, true);
        if (allowedOrigins.size === 0) return callback(null, true);
        if (allowedOrigins.has(origin)) return callback(null, true);
        return callback(new Error(`CORS: Origin ${origin} not allowed`));
      },
    }),
  );
  app.use(express.json());

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: Date.now(), service: config.serviceName });
  });
  app.get("/healthz", (_req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: Date.now(), service: config.serviceName });
  });

  // Metrics endpoint (Prometheus text format)
  app.get("/metrics", (_req: Request, res: Response, next: NextFunction) => {
    registry
      .metrics()
      .then((body) => {
        res.setHeader("Content-Type", registry.contentType);
        res.send(body);
      })
      .catch(next);
  });

  app.use("/api/icos", createOrderRouter(gateway));

  app.use(errorHandler);

  return app;
};
