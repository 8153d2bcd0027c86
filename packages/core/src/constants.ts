export const HOOK_EVENT_NAME = "PreToolUse";

export const PERMISSION_DECISIONS = ["allow", "deny", "ask"] as const;

export const PERMISSION_MODES = ["default", "plan", "acceptEdits", "bypassPermissions"] as const;

// Oracle rounds per decision; the loop stops at the first schema-valid reply.
export const MAX_RETRY_ATTEMPTS = 3;

// Wall-clock budget for the whole retry loop of one decision.
export const DEFAULT_DECISION_TIMEOUT_MS = 120000;

// Largest delay a Node timer honours; anything above fires after 1 ms.
export const MAX_DECISION_TIMEOUT_MS = 2147483647;

// Only the tail of the agent transcript is shown to the oracle.
export const MAX_HISTORY_ENTRIES = 20;
