import "dotenv/config";
import { z } from "zod/v4";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  PORT: z.coerce.number().default(3000),
  HOST: z.string().default("0.0.0.0"),
  DATA_DIR: z.string().default("data/api_specs"),
  CATALOG_BASE_URL: z.url().default("https://city-api-catalog.smartcity-pf.com/yaizu"),
  CATALOG_EMAIL: z.string().default(""),
  CATALOG_PASSWORD: z.string().default(""),
  ENTITY_API_URL: z.url().default("https://api.smartcity-yaizu.jp/v2/entities"),
  ENTITY_API_KEY: z.string().default(""),
  FIWARE_SERVICE: z.string().min(1).default("smartcity_yaizu"),
  ADMIN_API_KEY: z.string().default("change-me-in-production"),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  HTTP_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
  SCRAPE_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(4),
  CATALOG_REQUESTS_PER_MINUTE: z.coerce.number().int().positive().default(60),
});

export type AppConfig = z.infer<typeof envSchema>;

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment variables:\n${z.prettifyError(parsed.error)}`);
  }
  return parsed.data;
}

function loadConfig(): AppConfig {
  try {
    return parseConfig(process.env);
  } catch (err) {
    process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(1);
  }
}

export const config = loadConfig();
