import express, { Application, Request, Response, NextFunction } from "express";
import fs from "node:fs";
import helmet from "helmet";
import multer from "multer";
import swaggerUi from "swagger-ui-express";
import { McpServer, createMcpRouter } from "./mcp/server";
import type { Orchestrator } from "./orchestrator";
import { createRoutes } from "./routes";
import type { TraceStore } from "./traces/store";

export interface AppDeps {
  orchestrator: Orchestrator;
  store: TraceStore;
  mcp: McpServer;
  swaggerPath?: string;
}

export function createApp({ orchestrator, store, mcp, swaggerPath }: AppDeps): Application {
  const app: Application = express();

  app.use(helmet());
  // MCP tool calls carry their image base64 encoded inside the JSON body.
  app.use(express.json({ limit: "15mb" }));

  const swaggerDocument = swaggerPath ? loadSwagger(swaggerPath) : null;
  if (swaggerDocument) {
    app.use("/docs", swaggerUi.serve, swaggerUi.setup(swaggerDocument));
  }

  app.get("/healthz", (_req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: new Date().toISOString(), uptime: process.uptime() });
  });

  app.use(createRoutes({ orchestrator, store }));
  app.use(createMcpRouter(mcp));

  // Basic error handler for uncaught errors within the request pipeline.
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      return res.status(err.code === "LIMIT_FILE_SIZE" ? 413 : 400).json({ message: err.message, field: err.field });
    }
    if (isBodyParserError(err)) {
      return res.status(err.status).json({ message: err.message });
    }
    console.error("Unhandled error", err);
    return res.status(500).json({ message: "Unexpected server error" });
  });

  return app;
}

function loadSwagger(swaggerPath: string): Record<string, unknown> | null {
  if (!fs.existsSync(swaggerPath)) {
    console.warn(`Swagger definition not found at ${swaggerPath}. /docs route disabled.`);
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(swaggerPath, "utf-8"));
    return isRecord(parsed) ? parsed : null;
  } catch (error) {
    console.error("Failed to parse swagger.json", error);
    return null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// express.json() rejects malformed or oversized bodies with a 4xx `status` on the error.
function isBodyParserError(err: Error): err is Error & { status: number } {
  const status: unknown = Reflect.get(err, "status");
  return typeof status === "number" && status >= 400 && status < 500;
}
