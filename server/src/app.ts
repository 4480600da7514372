import express, { Request, Response, NextFunction, Express } from "express";
import { ZodError } from "zod";
import type { AppConfig } from "./config";
import { createSearchController } from "./controllers/search";
import { GatewayError, type GatewayErrorKind } from "./errors";
import { createHealthRoutes } from "./routes/health";
import { createSearchRoutes } from "./routes/search";
import { log } from "./utils/logger";
import type { ConnectionManager } from "./weaviate";

const STATUS_BY_KIND: Record<GatewayErrorKind, number> = {
  InvalidQuery: 400,
  DecodeError: 422,
  SearchFailed: 502,
  BackendUnavailable: 503,
};

const BACKEND_HINT = "Make sure the Weaviate containers are running: `docker-compose up -d`";

export type AppConnections = Pick<ConnectionManager, "getConnection" | "isReady">;

export function createApp(connections: AppConnections, config: AppConfig): Express {
  const app = express();

  // ---------------------------------------------------------------------------
  // Middleware
  // ---------------------------------------------------------------------------

  app.use(express.json({ limit: "1mb" }));
  app.use((req: Request, _res: Response, next: NextFunction) => {
    log.http(`${req.method} ${req.path}`);
    next();
  });

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------

  const searchController = createSearchController(connections, config);
  app.use("/search", createSearchRoutes(searchController, config.uploadLimit));
  app.use("/health", createHealthRoutes(connections));

  // ---------------------------------------------------------------------------
  // Global error handler
  // ---------------------------------------------------------------------------

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    // Zod validation errors → 400
    if (err instanceof ZodError) {
      res.status(400).json({
        success: false,
        error: "Validation failed",
        details: err.errors,
      });
      return;
    }

    if (err instanceof GatewayError) {
      const status = STATUS_BY_KIND[err.kind];
      if (status >= 500) {
        log.error("http", err.kind, err);
      }
      res.status(status).json({
        success: false,
        kind: err.kind,
        error: err.message,
        ...(err.kind === "BackendUnavailable" ? { hint: BACKEND_HINT } : {}),
      });
      return;
    }

    // body-parser errors (oversized upload, malformed JSON) carry their own status
    if (err instanceof Error && "status" in err && typeof err.status === "number") {
      res.status(err.status).json({ success: false, error: err.message });
      return;
    }

    // Generic errors → 500
    const message = err instanceof Error ? err.message : "Internal server error";
    log.error("server", "Unhandled error", err);
    res.status(500).json({ success: false, error: message });
  });

  return app;
}
