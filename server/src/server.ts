import "dotenv/config";
import type { Server } from "http";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { log } from "./utils/logger";
import { ConnectionManager, weaviateConnector } from "./weaviate";

// ---------------------------------------------------------------------------
// Start
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const config = loadConfig();
  log.config("Loaded", {
    port: config.port,
    weaviate: `${config.backend.host}:${config.backend.port} (grpc ${config.backend.grpcPort})`,
    collection: config.backend.collection,
  });

  const connections = new ConnectionManager(weaviateConnector(config.backend));

  // Warm-up only: requests retry the connection if Weaviate is not up yet
  const warmup = await connections.getConnection();
  if (!warmup.ok) {
    log.error("weaviate", "Warm-up connection failed, will retry on first search", warmup.error);
  }

  const app = createApp(connections, config);
  const server: Server = app.listen(config.port, () => {
    log.server(`Listening on http://localhost:${config.port}`);
  });

  const shutdown = (signal: string) => {
    log.server(`${signal} received, shutting down`);
    server.close();
    connections
      .disconnect()
      .catch((err) => log.error("weaviate", "Disconnect failed", err))
      .finally(() => process.exit(0));
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  log.error("server", "Failed to start", err);
  process.exit(1);
});
