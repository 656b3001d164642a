import { getEnv } from "../../common/src/env.js";
import { normalizeError } from "../../common/src/errors.js";
import { logger as rootLogger, type Logger } from "../../common/src/logger.js";
import { createGenkitBackend, withTimeout, type TextBackend } from "./backend.js";
import {
  enforceOutputContract,
  type ContractDefaults,
  type GenerationResult,
} from "./contract.js";
import { FALLBACK_QUALITY_SCORE, renderFallback } from "./fallback.js";
import { hasRemoteCredentials, resolveModelName } from "./genkit.js";
import { parseRemoteResponse } from "./parse.js";
import { contentPromptInput, type GenerationRequest } from "./prompt.js";

export type GeneratorMode = "remote" | "fallback";

export interface GeneratorStatus {
  mode: GeneratorMode;
  configured: boolean;
  selfTestPassed: boolean;
  model: string | null;
}

export interface ContentGenerator {
  initialize(): Promise<GeneratorStatus>;
  status(): GeneratorStatus;
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

export interface ContentGeneratorOptions {
  /** Null when no credentials are configured; the generator then stays on fallback. */
  backend: TextBackend | null;
  timeoutMs: number;
  selfTest: boolean;
  logger?: Logger;
}

export const REMOTE_DEFAULT_QUALITY = 90;

function contractDefaults(request: GenerationRequest, qualityScore: number): ContractDefaults {
  return {
    title: request.title,
    mediaSuggestion: `${request.season} garden photo for ${request.platform}`,
    qualityScore,
  };
}

export function generateFallback(request: GenerationRequest): GenerationResult {
  return enforceOutputContract(
    renderFallback(request),
    contractDefaults(request, FALLBACK_QUALITY_SCORE),
  );
}

export function createContentGenerator(options: ContentGeneratorOptions): ContentGenerator {
  const log = (options.logger ?? rootLogger).withContext({ component: "generator" });
  const backend = options.backend;
  let selfTestPassed = false;

  const status = (): GeneratorStatus => ({
    mode: backend && selfTestPassed ? "remote" : "fallback",
    configured: backend !== null,
    selfTestPassed,
    model: backend?.name ?? null,
  });

  async function generateRemote(
    remote: TextBackend,
    request: GenerationRequest,
  ): Promise<GenerationResult> {
    const raw = await withTimeout(
      remote.generateContent(contentPromptInput(request)),
      options.timeoutMs,
      "remote generation",
    );
    if (raw.trim().length === 0) {
      throw new Error("remote backend returned empty text");
    }

    const parsed = parseRemoteResponse(raw, {
      title: request.title,
      season: request.season,
      brandName: request.brand.name,
      platform: request.platform,
    });

    log.debug("remote response parsed", { title: request.title, stage: parsed.stage });

    return enforceOutputContract(
      { ...parsed, source: "remote" },
      contractDefaults(request, REMOTE_DEFAULT_QUALITY),
    );
  }

  return {
    async initialize() {
      if (!backend) {
        log.info("remote backend not configured, using fallback templates");
        return status();
      }

      if (!options.selfTest) {
        selfTestPassed = true;
        log.info("remote backend self-test skipped", { model: backend.name });
        return status();
      }

      try {
        const reply = await withTimeout(
          backend.ping(),
          options.timeoutMs,
          "self-test",
        );
        selfTestPassed = reply.trim().length > 0;
      } catch (error) {
        selfTestPassed = false;
        log.warn("remote backend self-test failed", {
          model: backend.name,
          error: normalizeError(error),
        });
      }

      log.info("generator initialized", { ...status() });
      return status();
    },

    status,

    async generate(request) {
      const current = status();
      if (backend && current.mode === "remote") {
        try {
          return await generateRemote(backend, request);
        } catch (error) {
          log.warn("remote generation failed, using fallback", {
            title: request.title,
            platform: request.platform,
            error: normalizeError(error),
          });
        }
      }

      return generateFallback(request);
    },
  };
}

export function createDefaultGenerator(): ContentGenerator {
  const env = getEnv();
  const backend = hasRemoteCredentials(env) ? createGenkitBackend(resolveModelName(env)) : null;

  return createContentGenerator({
    backend,
    timeoutMs: env.GENERATION_TIMEOUT_MS,
    selfTest: env.GENERATION_SELF_TEST,
  });
}
