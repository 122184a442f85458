#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfigFromEnv } from "./config.js";
import { OpenAICompletionClient } from "./completion.js";
import { MemoryEngine } from "./engine.js";
import { LlmImportanceAssessor } from "./importance.js";
import { createLogger } from "./logger.js";
import { createServer } from "./server.js";
import { float32Cosine } from "./similarity.js";
import { DirectorySnapshotStorage, SqliteSnapshotStorage } from "./snapshot-storage.js";

async function main(): Promise<void> {
  const { config, runtime } = loadConfigFromEnv();
  const logger = createLogger("main", runtime.logLevel);

  const sqlite = runtime.storageKind === "sqlite" ? new SqliteSnapshotStorage(runtime.storagePath) : null;
  if (sqlite) await sqlite.init();
  const storage = sqlite ?? new DirectorySnapshotStorage(runtime.storagePath);

  const assessor = new LlmImportanceAssessor(new OpenAICompletionClient(runtime.llm));
  const engine = new MemoryEngine(config, {
    storage,
    assessor,
    similarity: float32Cosine,
    logLevel: runtime.logLevel,
  });

  try {
    const report = await engine.backup.recoverLatest();
    logger.info(`restored ${report.itemsRestored} memories from snapshot ${report.sequence}`);
  } catch (error) {
    logger.warn("starting with empty memory:", error instanceof Error ? error.message : error);
  }
  engine.start();

  const server = createServer(engine);
  const transport = new StdioServerTransport();
  await server.connect(transport);

  const shutdown = async (): Promise<void> => {
    await engine.stop();
    await engine.backup.snapshot();
    sqlite?.close();
    process.exit(0);
  };
  process.on("SIGINT", () => {
    shutdown().catch((error: unknown) => {
      logger.error("shutdown failed:", error);
      process.exit(1);
    });
  });
  process.on("SIGTERM", () => {
    shutdown().catch((error: unknown) => {
      logger.error("shutdown failed:", error);
      process.exit(1);
    });
  });
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
