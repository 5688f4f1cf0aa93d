import { type Server, createServer } from "node:http";

import express, { type Express, type NextFunction, type Request, type Response } from "express";

import { registerChatRoutes } from "./routes/chatRoutes";
import { describeError } from "./utils/errors";
import { logError, logInfo, getLogger } from "./utils/logger";
import type { ChatContext } from "./appContext";

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    const status = Reflect.get(err, "status") ?? Reflect.get(err, "statusCode");
    if (typeof status === "number" && status >= 400 && status < 600) return status;
  }
  return 500;
}

export function createApp(ctx: ChatContext): Express {
  const logger = getLogger();
  const app = express();

  // Trust proxy for accurate IP detection behind reverse proxies.
  // Rate limiting keys on req.ip.
  app.set("trust proxy", 1);

  app.use(express.json({ limit: "64kb" }));

  // Request logging middleware using pino
  app.use((req, res, next) => {
    const start = Date.now();
    const reqPath = req.path;

    res.on("finish", () => {
      const duration = Date.now() - start;
      if (reqPath.startsWith("/api")) {
        logger.info(
          {
            method: req.method,
            path: reqPath,
            statusCode: res.statusCode,
            durationMs: duration,
          },
          "api_request"
        );
      }
    });

    next();
  });

  registerChatRoutes(app, ctx);

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);

    // Log the error but don't throw it - that causes connection issues
    logError("server_error", {
      statusCode: status,
      error: describeError(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    res.status(status).json({ message: status < 500 ? "Invalid request" : "Internal Server Error" });
  });

  return app;
}

export function startHttpServer(app: Express, port: number): Server {
  const server = createServer(app);
  server.listen({ port, host: "0.0.0.0" }, () => {
    logInfo("server_started", { port, host: "0.0.0.0" });
  });
  return server;
}
