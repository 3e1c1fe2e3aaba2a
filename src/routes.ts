import { Router, Request, Response, NextFunction } from "express";
import multer from "multer";
import type { OrchestrationResult, Orchestrator } from "./orchestrator";
import { IdentifyRequestSchema, LatestTracesQuerySchema, formatIssues } from "./parsers/request-schema";
import type { TraceStore } from "./traces/store";
import type { ResultSet, ServiceResult, TraceRecord } from "./types";
import { SERVICE_IDS } from "./types";
import { OrchestrationCancelledError, resolveTimeRange } from "./utils";

export interface RouteDeps {
  orchestrator: Orchestrator;
  store: TraceStore;
}

export const KNOWN_METRICS = ["identification-rate", "query-statistics"] as const;

export const MAX_IMAGE_BYTES = 10 * 1024 * 1024;

const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: MAX_IMAGE_BYTES, files: 1 } });

export function createRoutes({ orchestrator, store }: RouteDeps): Router {
  const router = Router();

  router.post("/identify-and-answer", upload.single("image"), async (req: Request, res: Response, next: NextFunction) => {
    const parsed = IdentifyRequestSchema.safeParse({
      ...req.body,
      image: req.file ? { buffer: req.file.buffer, filename: req.file.originalname } : undefined
    });
    if (!parsed.success) {
      return res.status(400).json({ message: "Invalid identification request.", issues: formatIssues(parsed.error) });
    }

    // The response closing before we write it means the client went away.
    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    };
    res.on("close", onClose);

    try {
      const { query, image, provider, k } = parsed.data;
      const result = await orchestrator.identifyAndAnswer(
        { query, image: image.buffer, filename: image.filename, provider, k },
        { signal: controller.signal }
      );
      return res.json(presentResult(result));
    } catch (error) {
      if (error instanceof OrchestrationCancelledError) {
        console.warn("Client disconnected before the identification finished; discarding partial results.");
        return undefined;
      }
      return next(error);
    } finally {
      res.off("close", onClose);
    }
  });

  router.get("/metrics/:name", async (req: Request, res: Response, next: NextFunction) => {
    const { label, since } = resolveTimeRange(req.query.time_range);
    const name = req.params.name;

    try {
      if (name === "identification-rate") {
        const rate = await store.identificationRate(since);
        return res.json({
          metric_name: "identification_rate",
          time_range: label,
          data: {
            total: rate.total,
            identified: rate.identified,
            not_identified: rate.notIdentified,
            identification_rate: rate.identificationRate,
            avg_score: rate.avgScore,
            min_score: rate.minScore,
            max_score: rate.maxScore
          },
          timestamp: new Date().toISOString()
        });
      }

      if (name === "query-statistics") {
        const stats = await store.queryStatistics(since);
        return res.json({
          metric_name: "query_statistics",
          time_range: label,
          data: {
            total_queries: stats.totalQueries,
            avg_processing_time_ms: stats.avgProcessingTimeMs,
            min_processing_time_ms: stats.minProcessingTimeMs,
            max_processing_time_ms: stats.maxProcessingTimeMs,
            outcomes: stats.outcomes
          },
          timestamp: new Date().toISOString()
        });
      }

      return res.status(404).json({ message: `Unknown metric "${name}".`, available: KNOWN_METRICS });
    } catch (error) {
      return next(error);
    }
  });

  router.get("/traces/latest", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = LatestTracesQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ message: "Invalid trace query.", issues: formatIssues(parsed.error) });
    }

    try {
      const traces = await store.latest(parsed.data.limit);
      return res.json({ traces: traces.map(presentTrace) });
    } catch (error) {
      return next(error);
    }
  });

  return router;
}

export function presentResult(result: OrchestrationResult) {
  return {
    request_id: result.requestId,
    decision: {
      outcome: result.decision.outcome,
      successful_services: result.decision.successfulServices,
      reason: result.decision.reason,
      score: result.decision.score,
      method: result.decision.method
    },
    person_id: result.personId,
    answer: result.answer,
    services: presentResultSet(result.resultSet),
    processing_time_ms: result.processingTimeMs,
    timestamp: result.timestamp.toISOString()
  };
}

function presentTrace(trace: TraceRecord) {
  return {
    request_id: trace.requestId,
    timestamp: trace.timestamp.toISOString(),
    query: trace.query,
    provider: trace.provider,
    decision: trace.decision,
    config: trace.config,
    services: presentResultSet(trace.resultSet),
    processing_time_ms: trace.processingTimeMs
  };
}

function presentResultSet(resultSet: ResultSet) {
  return Object.fromEntries(SERVICE_IDS.map((id) => [id, presentService(resultSet[id])]));
}

function presentService(result: ServiceResult<unknown> | undefined) {
  if (!result) {
    return { status: "pending" as const };
  }
  if (result.status === "success") {
    return { status: result.status, latency_ms: result.latencyMs };
  }
  return { status: result.status, latency_ms: result.latencyMs, error: result.error.message };
}
