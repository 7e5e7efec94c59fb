// Execution loop defaults
export const DEFAULT_MAX_STEPS = 20;
export const DEFAULT_MAX_TOKENS = 4096;

// Tool dispatch defaults
export const DEFAULT_TOOL_TIMEOUT_MS = 60_000;
export const DEFAULT_TOOL_CONCURRENCY = 4;

// Context budget defaults
export const DEFAULT_CONTEXT_LIMIT = 65_536;
export const DEFAULT_SAFETY_MARGIN_TOKENS = 512;
export const DEFAULT_HEADROOM_FRACTION = 0.1;
export const DEFAULT_PRESERVE_RECENT_TURNS = 4;

// Circuit breaker defaults
export const DEFAULT_FAILURE_THRESHOLD = 5;
export const DEFAULT_RECOVERY_TIMEOUT_MS = 30_000;
