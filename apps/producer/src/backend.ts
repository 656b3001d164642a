import { getAi } from "./genkit.js";
import { CONTENT_PROMPT_NAME, SELF_TEST_PROMPT, type ContentPromptInput } from "./prompt.js";

/** Anything that turns a content prompt into raw model text. */
export interface TextBackend {
  readonly name: string;
  /** Connectivity check; any non-empty reply counts as a pass. */
  ping(): Promise<string>;
  generateContent(input: ContentPromptInput): Promise<string>;
}

export class TimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function createGenkitBackend(model: string): TextBackend {
  return {
    name: model,
    async ping() {
      const response = await getAi().generate({ prompt: SELF_TEST_PROMPT });
      return response.text;
    },
    async generateContent(input) {
      const contentPrompt = getAi().prompt(CONTENT_PROMPT_NAME);
      const response = await contentPrompt(input);
      return response.text;
    },
  };
}
