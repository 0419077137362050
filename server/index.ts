// IMPORTANT: Import polyfills FIRST before any other imports
// This ensures DOMMatrix is available before pdfjs-dist loads
import "./extraction/polyfills";

// Validate environment variables before anything else
import { validateEnv } from "./config/env";
const config = validateEnv();

import express, { type Request, type Response, type NextFunction } from "express";
import compression from "compression";
import helmet from "helmet";
import { createServer } from "http";
import { registerRoutes } from "./routes";
import { logger, logRequest, createLogger, logFailure } from "./logger";
import { jsonError } from "./utils/response-helpers";

const log = createLogger("server");

// Base64 payloads are ~4/3 of the document size
const jsonBodyLimitMb = Math.ceil(config.extraction.maxFileSizeMb * 1.4) + 1;

const app = express();

// Security headers middleware
app.use(helmet({
  contentSecurityPolicy: false,
  hsts: config.server.nodeEnv === "production" ? {
    maxAge: 31536000, // 1 year
    includeSubDomains: true,
  } : false,
  frameguard: { action: "deny" },
  noSniff: true,
}));

const httpServer = createServer(app);

// Request logging middleware using structured logger (before everything for accurate timing)
app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path !== "/health" && path !== "/ready") {
      logRequest(req.method, path, res.statusCode, duration, {
        contentLength: res.getHeader("content-length"),
      });
    }
  });

  next();
});

app.use(express.json({ limit: `${jsonBodyLimitMb}mb` }));
app.use(express.urlencoded({ extended: false }));

// Enable gzip/deflate compression for JSON and HTML responses
app.use(compression({
  threshold: 1024,
  level: 6,
}));

(async () => {
  await registerRoutes(httpServer, app, { config });

  app.use((err: Error & { status?: number; statusCode?: number; type?: string }, _req: Request, res: Response, _next: NextFunction) => {
    const status = err.status || err.statusCode || 500;
    if (err.type === "entity.too.large") {
      jsonError(res, "FILE_TOO_LARGE", `File exceeds maximum size of ${config.extraction.maxFileSizeMb}MB`, 400);
      return;
    }
    if (status < 500) {
      jsonError(res, "VALIDATION_ERROR", err.message || "Bad request", status);
      return;
    }
    logFailure(log, "Unhandled error", err);
    jsonError(res, "PROCESSING_FAILED", "Internal Server Error", 500);
  });

  const { host, port } = config.server;
  httpServer.listen(port, host, () => {
    logger.info(`Server started`, { host, port, env: config.server.nodeEnv });
  });

  const shutdown = (signal: string) => {
    log.info("Shutting down", { signal });
    httpServer.close((error) => {
      if (error) {
        log.error("Error while closing HTTP server", { error: error.message });
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));
})().catch((error: unknown) => {
  logFailure(logger, "Failed to start server", error);
  process.exit(1);
});
