import dotenv from "dotenv";
import { z } from "zod";

// Load base .env then override with .env.local if present
dotenv.config();
dotenv.config({ path: ".env.local", override: true });

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((v) => v === "true" || v === "1");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  HOST: z.string().min(1).default("127.0.0.1"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  // Reject loopback/private targets (and redirects to them) before fetching
  BLOCK_PRIVATE_NETWORKS: booleanFlag,
  // Let concurrent misses for the same URL share one fetch
  PREVIEW_SINGLE_FLIGHT: booleanFlag,
  CACHE_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),
  METRICS_TOKEN: z.string().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

const env: Env = envSchema.parse(process.env);

export default env;
