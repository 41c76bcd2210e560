import "dotenv/config";

import { config } from "./server/config.js";
import { createApp } from "./server/app.js";
import { loadPlannerTables } from "./core/tables.js";
import { connectMongo, createMongoStore } from "./db/mongo.js";

async function main() {
  await connectMongo();

  const app = createApp({
    store: createMongoStore(),
    tables: loadPlannerTables(),
    limitPerCategory: config.vendorLimitPerCategory,
  });

  app.listen(config.port, () => {
    console.log(`API listening on http://localhost:${config.port}`);
  });
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
