import { createServer } from "http";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { openDatabase } from "./db";
import { log } from "./logger";
import { DatabaseStorage } from "./storage";

async function main() {
  const config = loadConfig();
  const database = openDatabase(config.databasePath, { logQueries: config.logQueries });
  const storage = new DatabaseStorage(database.db);

  if (config.seedSampleData) {
    const added = await storage.seedSamplePrecedents();
    if (added > 0) {
      log(`Database initialized with ${added} sample precedents.`, "db");
    }
  }

  const app = createApp(storage, { logRequests: config.logRequests });
  const httpServer = createServer(app);

  const shutdown = () => {
    httpServer.close(() => {
      database.close();
      process.exit(0);
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  httpServer.listen(config.port, config.host, () => {
    log(`serving on port ${config.port} (${config.env})`);
  });
}

main().catch((error) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
