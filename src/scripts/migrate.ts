import { Migrator } from "kysely";
import { closeSQLClient, getSQLClient } from "../db";
import * as createShopTables from "../db/migrations/0001_create_shop_tables";

const migrator = new Migrator({
  db: getSQLClient(),
  provider: {
    getMigrations: async () => ({
      "0001_create_shop_tables": createShopTables,
    }),
  },
});

async function migrate(direction: string | undefined) {
  const { error, results } =
    direction === "down"
      ? await migrator.migrateDown()
      : await migrator.migrateToLatest();

  for (const result of results ?? []) {
    if (result.status === "Success") {
      console.log(`Migration "${result.migrationName}" applied (${result.direction})`);
    } else if (result.status === "Error") {
      console.error(`Migration "${result.migrationName}" failed`);
    }
  }

  await closeSQLClient();

  if (error) {
    console.error("Migration failed:", error);
    process.exit(1);
  }
}

migrate(process.argv[2]).catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
