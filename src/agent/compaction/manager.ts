/**
 * CompactionManager - keeps the conversation under the context budget.
 *
 * Before each backend request the agent asks `shouldCompact`; when it says
 * yes, `compact` runs the strategies in escalating order (pruning,
 * summarization, truncation), each on the output of the previous one, and
 * stops as soon as the estimate is under the target.
 */

import type { ILogObj, Logger } from "tslog";
import { componentLogger } from "../../logging/logger.js";
import type { IConversation } from "../interfaces.js";
import {
  budgetTokens,
  type CompactionConfig,
  type CompactionEvent,
  type CompactionStats,
  perMessageTokenLimit,
  type ResolvedCompactionConfig,
  resolveCompactionConfig,
  targetTokens,
} from "./config.js";
import {
  SummarizationStrategy,
  ToolOutputPruningStrategy,
  TruncationStrategy,
} from "./strategies/index.js";
import type { CompactionContext, CompactionStrategy } from "./strategy.js";

export class CompactionManager {
  private readonly config: ResolvedCompactionConfig;
  private readonly logger: Logger<ILogObj>;
  private readonly strategies: readonly CompactionStrategy[];

  private totalCompactions = 0;
  private totalTokensSaved = 0;
  private lastEstimate?: number;

  constructor(config: CompactionConfig = {}, logger?: Logger<ILogObj>) {
    this.config = resolveCompactionConfig(config);
    this.logger = componentLogger("loopwright:compaction", logger);
    this.strategies = [
      new ToolOutputPruningStrategy(),
      new SummarizationStrategy(),
      new TruncationStrategy(),
    ];
  }

  isEnabled(): boolean {
    return this.config.enabled;
  }

  /**
   * Estimated tokens of the whole conversation, system messages included.
   */
  estimate(conversation: IConversation): number {
    const { estimator } = this.config;
    return (
      estimator.estimateMessages(conversation.getBaseMessages()) +
      estimator.estimateMessages(conversation.getHistoryMessages())
    );
  }

  shouldCompact(conversation: IConversation): boolean {
    if (!this.config.enabled) {
      return false;
    }
    const estimate = this.estimate(conversation);
    this.lastEstimate = estimate;
    return estimate + this.config.safetyMarginTokens > budgetTokens(this.config);
  }

  /**
   * Compacts the conversation history in place.
   *
   * @param step - Agent step, recorded on the event
   * @returns The event describing the compaction, or null when nothing
   *   could reduce the estimate (the history is then left untouched)
   */
  async compact(
    conversation: IConversation,
    step: number,
    signal?: AbortSignal,
  ): Promise<CompactionEvent | null> {
    const { estimator } = this.config;
    const original = conversation.getHistoryMessages();
    const baseTokens = estimator.estimateMessages(conversation.getBaseMessages());
    const tokensBefore = baseTokens + estimator.estimateMessages(original);
    this.lastEstimate = tokensBefore;

    const context: CompactionContext = {
      baseTokens,
      targetTokens: targetTokens(this.config),
      perMessageTokenLimit: perMessageTokenLimit(this.config),
      estimator,
      logger: this.logger,
      signal,
    };

    let history = original;
    let tokensAfter = tokensBefore;
    let summary: string | undefined;
    const applied: string[] = [];

    for (const strategy of this.strategies) {
      if (tokensAfter <= context.targetTokens) {
        break;
      }
      signal?.throwIfAborted();

      const result = await strategy.compact(history, this.config, context);
      if (!result.changed) {
        continue;
      }
      history = result.messages;
      tokensAfter = baseTokens + estimator.estimateMessages(history);
      summary = result.summary ?? summary;
      applied.push(strategy.name);
      this.logger.debug("Compaction strategy applied", { strategy: strategy.name, tokensAfter });
    }

    if (tokensAfter >= tokensBefore) {
      this.logger.warn("Compaction could not reduce the conversation", { tokensBefore });
      return null;
    }

    conversation.replaceHistory(history);

    const event: CompactionEvent = {
      strategies: applied,
      tokensBefore,
      tokensAfter,
      messagesBefore: original.length,
      messagesAfter: history.length,
      summary,
      withinBudget: tokensAfter <= context.targetTokens,
      step,
    };

    this.totalCompactions++;
    this.totalTokensSaved += tokensBefore - tokensAfter;
    this.lastEstimate = tokensAfter;

    this.logger.info("Conversation compacted", {
      strategies: applied,
      tokensBefore,
      tokensAfter,
      withinBudget: event.withinBudget,
    });

    this.config.onCompaction?.(event);
    return event;
  }

  getStats(): CompactionStats {
    return {
      totalCompactions: this.totalCompactions,
      totalTokensSaved: this.totalTokensSaved,
      lastEstimate: this.lastEstimate,
      budgetTokens: budgetTokens(this.config),
    };
  }
}
