import { genkit } from "genkit";
import { googleAI } from "@genkit-ai/google-genai";
import { openAICompatible } from "@genkit-ai/compat-oai";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { getEnv, type AppEnv } from "../../common/src/env.js";

const compatProviderName = "compat";

export const PROMPT_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), "../prompts");

export type GenkitInstance = ReturnType<typeof genkit>;

let cachedAi: GenkitInstance | null = null;

export function hasRemoteCredentials(env: AppEnv = getEnv()): boolean {
  return Boolean(env.GENKIT_BASEURL) || Boolean(env.GEMINI_API_KEY);
}

export function resolveModelName(env: AppEnv = getEnv()): string {
  if (!env.GENKIT_BASEURL) {
    return env.GENKIT_MODEL;
  }
  return env.GENKIT_MODEL.includes("/")
    ? env.GENKIT_MODEL
    : `${compatProviderName}/${env.GENKIT_MODEL}`;
}

export function getAi(): GenkitInstance {
  if (cachedAi) {
    return cachedAi;
  }

  const env = getEnv();
  const plugins = env.GENKIT_BASEURL
    ? [
        openAICompatible({
          name: compatProviderName,
          apiKey: env.OPENAI_API_KEY ?? "compat-placeholder",
          baseURL: env.GENKIT_BASEURL,
        }),
      ]
    : [googleAI({ apiKey: env.GEMINI_API_KEY })];

  cachedAi = genkit({
    plugins,
    model: resolveModelName(env),
    promptDir: PROMPT_DIR,
  });
  return cachedAi;
}
