import { createServer } from "node:http";
import { AgentService, createApiHandler, loadSettings } from "@statement-agents/api";
import { MetadataStore } from "@statement-agents/db";
import { createRequestListener } from "./node-adapter.js";

function main() {
  const settings = loadSettings();
  const store = new MetadataStore(settings.databasePath);
  const agents = new AgentService(settings, store);
  const handler = createApiHandler({ settings, store, agents });

  const server = createServer(createRequestListener(handler));
  server.listen(settings.port, () => {
    console.log(
      `Statement agents backend (${settings.environment}) listening on :${settings.port}`,
    );
  });

  const shutdown = (signal: string) => {
    console.log(`Received ${signal}, shutting down...`);
    server.close((err) => {
      if (err) console.error("Server close failed:", err);
      store
        .drain()
        .then(() => process.exit(err ? 1 : 0))
        .catch((drainErr: unknown) => {
          console.error("Failed to flush metadata writes:", drainErr);
          process.exit(1);
        });
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

try {
  main();
} catch (err) {
  console.error("Startup failed:", err);
  process.exit(1);
}
