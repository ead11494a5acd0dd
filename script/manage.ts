/**
 * Precedent Finder database management tool.
 * Run: npx tsx script/manage.ts <add|list|delete|search|seed> [...]
 */

import { loadConfig } from "../server/config";
import { openDatabase } from "../server/db";
import { DatabaseStorage } from "../server/storage";
import { runManage } from "./commands";

async function main() {
  const config = loadConfig();
  const database = openDatabase(config.databasePath, { logQueries: config.logQueries });
  try {
    await runManage(process.argv.slice(2), new DatabaseStorage(database.db));
  } finally {
    database.close();
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
