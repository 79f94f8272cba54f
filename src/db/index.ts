import { Kysely, PostgresDialect } from "kysely";
import { Pool, types } from "pg";
import { DB } from "../types/db";
import { AppConfig, loadConfig } from "../config/env";

const DATE_OID = 1082;

// keep DATE columns as plain YYYY-MM-DD strings
types.setTypeParser(DATE_OID, (value: string) => value);

let poolInstance: Pool | undefined;
let clientInstance: Kysely<DB> | undefined;

const createPool = (config: AppConfig) => {
  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is not set");
  }
  return new Pool({
    connectionString: config.databaseUrl,
    max: config.dbPoolMax,
    idleTimeoutMillis: config.dbIdleTimeoutMs,
  });
};

const getPoolInstance = (config: AppConfig) => {
  if (!poolInstance) {
    poolInstance = createPool(config);
  }
  return poolInstance;
};

export function getSQLClient(config: AppConfig = loadConfig()) {
  if (!clientInstance) {
    const dialect = new PostgresDialect({
      pool: async () => getPoolInstance(config),
    });
    clientInstance = new Kysely<DB>({ dialect });
  }
  return clientInstance;
}

export async function closeSQLClient() {
  if (clientInstance) {
    // destroying Kysely ends the pool as well
    await clientInstance.destroy();
    clientInstance = undefined;
    poolInstance = undefined;
  }
}
