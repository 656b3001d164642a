import "dotenv/config";
import { z } from "zod";

function booleanFlag(defaultValue: boolean) {
  return z.preprocess((value) => {
    if (value === undefined || value === null || value === "") {
      return defaultValue;
    }

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

    return value;
  }, z.boolean());
}

function optionalString() {
  return z.preprocess((value) => {
    if (typeof value === "string" && value.trim() === "") {
      return undefined;
    }
    return value;
  }, z.string().optional());
}

const EnvSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().positive().default(3000),
  SQLITE_DB_PATH: z.string().default("./db/content.db"),
  CALENDAR_CONFIG_PATH: z.string().default("./config/calendar.json"),
  GENKIT_MODEL: z.string().default("googleai/gemini-2.5-flash"),
  GENKIT_BASEURL: z.preprocess(
    (value) => {
      if (typeof value === "string" && value.trim() === "") {
        return undefined;
      }
      return value;
    },
    z.string().url().optional(),
  ),
  GEMINI_API_KEY: optionalString(),
  OPENAI_API_KEY: optionalString(),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  GENERATION_SELF_TEST: booleanFlag(true),
  API_TOKEN: optionalString(),
  SHOPIFY_STORE_URL: optionalString(),
  SHOPIFY_ACCESS_TOKEN: optionalString(),
  SHOPIFY_BLOG_ID: optionalString(),
  SHOPIFY_API_VERSION: z.string().default("2024-01"),
  DB_BOOTSTRAP_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),
  DB_BOOTSTRAP_BACKOFF_MS: z.coerce.number().int().positive().default(500),
});

export type AppEnv = z.infer<typeof EnvSchema>;

let cachedEnv: AppEnv | null = null;

export function getEnv(): AppEnv {
  if (cachedEnv) {
    return cachedEnv;
  }

  const parsed = EnvSchema.safeParse(process.env);
  if (!parsed.success) {
    throw new Error(
      `Invalid environment variables: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join(", ")}`,
    );
  }

  cachedEnv = parsed.data;
  return cachedEnv;
}

export function resetEnvForTests(): void {
  cachedEnv = null;
}
