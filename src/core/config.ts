import path from "path";
import { config as dotenvConfig } from "dotenv";
import { z } from "zod";

const booleanFlag = (fallback: "true" | "false") =>
  z
    .string()
    .default(fallback)
    .transform((v) => ["1", "true", "yes", "on"].includes(v.trim().toLowerCase()));

const envSchema = z.object({
  HIKERAPI_KEY: z.string().optional(),
  HIKERAPI_TOKEN: z.string().optional(),
  HIKERAPI_BASE_URL: z.string().url().default("https://api.instagrapi.com"),
  HIKERAPI_TIMEOUT_MS: z.coerce.number().int().positive().default(25000),
  OPENROUTER_API_KEY: z.string().optional(),
  OPENROUTER_BASE_URL: z.string().url().default("https://openrouter.ai/api/v1"),
  OPENROUTER_CHAT_MODEL: z.string().default("google/gemini-2.5-flash"),
  OPENROUTER_HTTP_REFERER: z.string().default("http://localhost:3000"),
  OPENROUTER_APP_TITLE: z.string().default("reelscope"),
  AGENT_MAX_STEPS: z.coerce.number().int().min(1).max(12).default(6),
  OUTPUT_DIR: z.string().default("./output"),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("warn"),
  LOG_PRETTY: booleanFlag("true"),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig extends Env {
  envFile: string;
  envFileLoaded: boolean;
  /** HIKERAPI_TOKEN wins over HIKERAPI_KEY when both are set. */
  hikerAccessKey: string | null;
}

export function envFilePath(): string {
  const override = process.env.REELSCOPE_ENV_FILE;
  return path.resolve(override && override.trim() ? override : ".env");
}

export function loadConfig(): AppConfig {
  const envFile = envFilePath();
  const loaded = dotenvConfig({ path: envFile, override: true });
  const parsed = envSchema.parse(process.env);
  const accessKey = (parsed.HIKERAPI_TOKEN || parsed.HIKERAPI_KEY || "").trim();

  return {
    ...parsed,
    envFile,
    envFileLoaded: !loaded.error,
    hikerAccessKey: accessKey || null,
  };
}

export const env = loadConfig();
