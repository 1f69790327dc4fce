import "dotenv/config";
import { z } from "zod";
import { CurrencySchema } from "./types/schemas.js";
import type { Currency } from "./types/index.js";

export interface AppConfig {
  databasePath: string;
  storage: "sqlite" | "memory";
  port: number;
  defaultCurrency: Currency;
}

const EnvSchema = z.object({
  DATABASE_PATH: z.string().min(1).default("./data/tally.db"),
  LEDGER_STORAGE: z.enum(["sqlite", "memory"]).default("sqlite"),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  DEFAULT_CURRENCY: CurrencySchema.default("EUR"),
});

/**
 * Read configuration from the environment (`.env` is loaded on import).
 * @throws ZodError if a variable is set to an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);

  return {
    databasePath: parsed.DATABASE_PATH,
    storage: parsed.LEDGER_STORAGE,
    port: parsed.PORT,
    defaultCurrency: parsed.DEFAULT_CURRENCY,
  };
}
