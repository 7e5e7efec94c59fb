import type { TokenUsage } from "../backends/backend.js";
import type { CircuitState } from "../core/circuit-breaker.js";
import type { ActionRequest, ActionResult } from "../core/messages.js";
import type { CompactionEvent } from "./compaction/config.js";

export type RunPhase = "AWAITING_MODEL" | "AWAITING_TOOLS" | "COMPRESSING" | "TERMINATED";

export type TerminalReason =
  | "completed"
  | "step_limit_exceeded"
  | "resource_budget_exhausted"
  | "fatal_error"
  | "cancelled";

/**
 * Mutable bookkeeping for one run. Never handed to tools or callers.
 */
export interface RunState {
  step: number;
  tokensUsed: number;
  usage: TokenUsage;
  phase: RunPhase;
  breakerState?: CircuitState;
  terminal?: TerminalReason;
  /** Last non-empty assistant text, returned as the best partial output */
  lastText: string;
}

/**
 * What a run hands back to its caller. Runs always end with one of these,
 * never with a thrown error.
 */
export interface AgentRunResult {
  /** Final assistant text, or the best partial text for non-completed runs */
  text: string;
  reason: TerminalReason;
  /** Completed tool rounds */
  steps: number;
  usage: TokenUsage;
  /** Cause of a run that did not complete */
  error?: Error;
}

// Events yielded by Agent.execute()
export type AgentEvent =
  | { type: "step_start"; step: number }
  | { type: "compaction"; event: CompactionEvent }
  | { type: "text"; step: number; content: string }
  | { type: "action_call"; step: number; request: ActionRequest }
  | { type: "action_result"; step: number; result: ActionResult };
