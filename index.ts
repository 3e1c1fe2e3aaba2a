import path from "node:path";
import { createApp } from "./src/app";
import { ChatbotClient } from "./src/clients/chatbot";
import { VerifierClient } from "./src/clients/verifier";
import { createPool } from "./src/config/db";
import { loadConfigFromEnvironment } from "./src/config/env";
import { McpServer } from "./src/mcp/server";
import { Dispatcher } from "./src/orchestration/dispatcher";
import { Orchestrator } from "./src/orchestrator";
import { MemoryTraceStore } from "./src/traces/memoryStore";
import { PgTraceStore } from "./src/traces/pgStore";
import { TraceRecorder } from "./src/traces/recorder";
import type { TraceStore } from "./src/traces/store";

async function main(): Promise<void> {
  const config = loadConfigFromEnvironment();

  let store: TraceStore;
  let shutdownStore: () => Promise<void> = async () => undefined;
  if (config.traceStore === "postgres") {
    const pool = createPool(config.database);
    const pgStore = new PgTraceStore(pool);
    await pgStore.init();
    store = pgStore;
    shutdownStore = () => pool.end();
  } else {
    console.warn("TRACE_STORE=memory: traces are kept in process and lost on restart.");
    store = new MemoryTraceStore();
  }

  const verifier = new VerifierClient({ baseUrl: config.verifier.baseUrl });
  const chatbot = new ChatbotClient({
    baseUrl: config.chatbot.baseUrl,
    defaultProvider: config.chatbot.provider,
    defaultTopK: config.chatbot.topK
  });

  const orchestrator = new Orchestrator({
    dispatcher: new Dispatcher({ verifier, chatbot }),
    recorder: new TraceRecorder(store, { persistTimeoutMs: config.tracePersistTimeoutMs }),
    fusion: config.fusion,
    timeouts: config.timeouts,
    overallDeadlineMs: config.overallDeadlineMs
  });

  const app = createApp({
    orchestrator,
    store,
    mcp: new McpServer({ verifier, chatbot, timeouts: config.timeouts }),
    swaggerPath: path.resolve(__dirname, "..", "swagger.json")
  });

  const server = app.listen(config.port, () => {
    console.log(
      `Identity orchestrator listening on port ${config.port} (method=${config.fusion.method}, threshold=${config.fusion.threshold}, margin=${config.fusion.margin})`
    );
  });

  process.on("SIGTERM", () => {
    console.log("Received SIGTERM, shutting down.");
    server.close(() => {
      shutdownStore().then(
        () => process.exit(0),
        (error: unknown) => {
          console.error("Failed to close trace store", error);
          process.exit(1);
        }
      );
    });
  });
}

process.on("unhandledRejection", (reason: unknown) => {
  console.error("Unhandled promise rejection", reason);
});

main().catch((error) => {
  console.error("Failed to start identity orchestrator", error);
  process.exit(1);
});
