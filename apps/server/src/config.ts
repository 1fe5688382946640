import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const env = {
  ...process.env,
  TIMEZONE: process.env.TIMEZONE ?? process.env.TZ_NAME,
  GITHUB_TOKEN: process.env.GITHUB_TOKEN ?? process.env.GITHUB_PAT,
  GOOGLE_CLIENT_ID: process.env.GOOGLE_CLIENT_ID,
  GOOGLE_CLIENT_SECRET: process.env.GOOGLE_CLIENT_SECRET
};

export function parseBooleanEnv(value: unknown): boolean | undefined {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (["1", "true", "yes", "on"].includes(normalized)) {
      return true;
    }
    if (["0", "false", "no", "off"].includes(normalized)) {
      return false;
    }
  }
  return undefined;
}

const schema = z.object({
  PORT: z.coerce.number().default(8787),
  TIMEZONE: z.string().default("America/New_York"),
  GITHUB_TOKEN: z.string().optional(),
  CLASSROOM_ID: z.string().optional(),
  GOOGLE_CLIENT_ID: z.string().optional(),
  GOOGLE_CLIENT_SECRET: z.string().optional(),
  GOOGLE_REDIRECT_URI: z.string().url().default("http://localhost:8787/auth/callback"),
  GOOGLE_CALENDAR_ID: z.string().default("primary"),
  WEBHOOK_SECRET: z.string().optional(),
  ASSIGNMENT_CACHE_TTL_SECONDS: z.coerce.number().int().min(1).default(600),
  SWEEP_INTERVAL_MINUTES: z.coerce.number().int().min(1).max(24 * 60).default(10),
  SWEEP_ENABLED: z
    .preprocess((value) => parseBooleanEnv(value), z.boolean())
    .default(true),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().min(500).max(120000).default(10000),
  EVENT_DISPLAY_DURATION_MINUTES: z.coerce.number().int().min(0).max(24 * 60).default(0),
  STUDENT_IDENTITY_STRATEGY: z.enum(["owner", "repo-suffix", "owner-then-suffix"]).default("owner"),
  STORE_BACKEND: z.enum(["memory", "sqlite"]).default("memory"),
  SQLITE_DB_PATH: z.string().default("deadline-sync.db"),
  DEBUG_ROUTES_ENABLED: z
    .preprocess((value) => parseBooleanEnv(value), z.boolean())
    .default(true)
});

export type AppConfig = z.infer<typeof schema>;

export const config: AppConfig = schema.parse(env);
