import { ContentStatus } from "./types.js";

// Forward chain; "failed" sits outside it.
const STATUS_ORDER: readonly ContentStatus[] = [
  "draft",
  "preview",
  "approved",
  "scheduled",
  "published",
];

const TERMINAL_STATUSES = new Set<ContentStatus>(["published", "failed"]);

export type TransitionCheck =
  | { allowed: true; noop: boolean }
  | { allowed: false; reason: string };

export function isTerminalStatus(status: ContentStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

/**
 * Moves are allowed forward along draft → preview → approved → scheduled →
 * published (steps may be skipped), and to failed from any non-terminal
 * status. Re-applying the current status is a no-op.
 */
export function checkTransition(from: ContentStatus, to: ContentStatus): TransitionCheck {
  if (from === to) {
    return { allowed: true, noop: true };
  }

  if (isTerminalStatus(from)) {
    return { allowed: false, reason: `status ${from} is terminal` };
  }

  if (to === "failed") {
    return { allowed: true, noop: false };
  }

  if (STATUS_ORDER.indexOf(to) < STATUS_ORDER.indexOf(from)) {
    return { allowed: false, reason: `cannot move from ${from} back to ${to}` };
  }

  return { allowed: true, noop: false };
}
