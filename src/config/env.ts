import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

export const ZOrderTotalPolicy = z.enum(["manual", "auto"]);
export type OrderTotalPolicy = z.infer<typeof ZOrderTotalPolicy>;

const ZEnv = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().min(1).optional(),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  DB_IDLE_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(10000),
  ORDER_TOTAL_POLICY: ZOrderTotalPolicy.default("manual"),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),
});

export interface AppConfig {
  port: number;
  databaseUrl?: string;
  dbPoolMax: number;
  dbIdleTimeoutMs: number;
  orderTotalPolicy: OrderTotalPolicy;
  bcryptRounds: number;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = ZEnv.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    databaseUrl: vars.DATABASE_URL,
    dbPoolMax: vars.DB_POOL_MAX,
    dbIdleTimeoutMs: vars.DB_IDLE_TIMEOUT_MS,
    orderTotalPolicy: vars.ORDER_TOTAL_POLICY,
    bcryptRounds: vars.BCRYPT_ROUNDS,
  };
}
