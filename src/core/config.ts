/**
 * Runtime configuration.
 *
 * One validated object carries every tunable of a run. Where it comes from
 * (a file, the environment, flags) is the host application's business; this
 * module only validates and fills in defaults.
 *
 * @module core/config
 */

import { z } from "zod";
import {
  DEFAULT_CONTEXT_LIMIT,
  DEFAULT_FAILURE_THRESHOLD,
  DEFAULT_HEADROOM_FRACTION,
  DEFAULT_MAX_STEPS,
  DEFAULT_PRESERVE_RECENT_TURNS,
  DEFAULT_RECOVERY_TIMEOUT_MS,
  DEFAULT_SAFETY_MARGIN_TOKENS,
  DEFAULT_TOOL_CONCURRENCY,
  DEFAULT_TOOL_TIMEOUT_MS,
} from "./constants.js";
import { ConfigurationError } from "./errors.js";
import { DEFAULT_RETRY_POLICY } from "./retry.js";

const retrySchema = z.object({
  maxRetries: z.number().int().min(0).default(DEFAULT_RETRY_POLICY.maxRetries),
  initialDelayMs: z.number().min(0).default(DEFAULT_RETRY_POLICY.initialDelayMs),
  maxDelayMs: z.number().min(0).default(DEFAULT_RETRY_POLICY.maxDelayMs),
  factor: z.number().min(1).default(DEFAULT_RETRY_POLICY.factor),
  jitter: z.boolean().default(DEFAULT_RETRY_POLICY.jitter),
  attemptTimeoutMs: z.number().int().positive().optional(),
});

const circuitBreakerSchema = z.object({
  failureThreshold: z.number().int().positive().default(DEFAULT_FAILURE_THRESHOLD),
  recoveryTimeoutMs: z.number().int().min(0).default(DEFAULT_RECOVERY_TIMEOUT_MS),
});

const compactionSchema = z.object({
  enabled: z.boolean().default(true),
  contextLimit: z.number().int().positive().default(DEFAULT_CONTEXT_LIMIT),
  safetyMarginTokens: z.number().int().min(0).default(DEFAULT_SAFETY_MARGIN_TOKENS),
  headroomFraction: z.number().min(0).lt(1).default(DEFAULT_HEADROOM_FRACTION),
  preserveRecentTurns: z.number().int().min(0).default(DEFAULT_PRESERVE_RECENT_TURNS),
});

const toolsSchema = z.object({
  maxConcurrency: z.number().int().positive().default(DEFAULT_TOOL_CONCURRENCY),
  defaultTimeoutMs: z.number().int().min(0).default(DEFAULT_TOOL_TIMEOUT_MS),
});

export const runtimeConfigSchema = z.object({
  maxSteps: z.number().int().positive().default(DEFAULT_MAX_STEPS),
  tokenBudget: z.number().int().positive().optional(),
  model: z.string().min(1).optional(),
  maxTokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
  retry: retrySchema.prefault({}),
  circuitBreaker: circuitBreakerSchema.prefault({}),
  compaction: compactionSchema.prefault({}),
  tools: toolsSchema.prefault({}),
});

export type RuntimeConfig = z.output<typeof runtimeConfigSchema>;
export type RuntimeConfigInput = z.input<typeof runtimeConfigSchema>;

/**
 * Validate a partial configuration and apply defaults.
 *
 * @throws {ConfigurationError} listing every invalid field
 *
 * @example
 * ```typescript
 * const config = resolveRuntimeConfig({ maxSteps: 8, retry: { maxRetries: 1 } });
 * config.retry.initialDelayMs; // 1000
 * ```
 */
export function resolveRuntimeConfig(input: unknown = {}): RuntimeConfig {
  const result = runtimeConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => ({
        path: issue.path.length > 0 ? issue.path.map(String).join(".") : "root",
        message: issue.message,
      })),
    );
  }
  return result.data;
}
