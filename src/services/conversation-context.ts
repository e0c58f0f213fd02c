/**
 * Conversation Context Window
 *
 * Keeps recent user/assistant turns for context-bearing asks and selects
 * the newest ones that fit a token budget.
 */

import type { ChatMessage } from "../types.js";

export interface ContextWindowConfig {
  maxMessages: number;        // default: 20
  maxTokens: number;          // default: 1_500
  tokenEstimateDivisor: number; // default: 4
}

export interface SelectionStats {
  totalMessages: number;
  selectedMessages: number;
  estimatedTokens: number;
  budgetUsedPercent: number;
}

export const DEFAULT_CONTEXT_WINDOW: ContextWindowConfig = {
  maxMessages: 20,
  maxTokens: 1_500,
  tokenEstimateDivisor: 4,
};

/**
 * Estimate token count from text length
 */
export function estimateTokens(text: string, divisor: number = 4): number {
  return Math.ceil(text.length / divisor);
}

export class ConversationContext {
  private messages: ChatMessage[] = [];

  constructor(private readonly config: ContextWindowConfig = DEFAULT_CONTEXT_WINDOW) {}

  /** Record a finished exchange */
  record(prompt: string, answer: string): void {
    this.messages.push({ role: "user", content: prompt }, { role: "assistant", content: answer });
    if (this.messages.length > this.config.maxMessages) {
      this.messages = this.messages.slice(-this.config.maxMessages);
    }
  }

  /**
   * Select history within budget using reverse accumulation:
   * walk from newest to oldest until the next message would overflow.
   */
  select(reserveTokens: number = 0): { selected: ChatMessage[]; stats: SelectionStats } {
    const budget = Math.max(0, this.config.maxTokens - reserveTokens);
    const selected: ChatMessage[] = [];
    let tokenCount = 0;

    for (let i = this.messages.length - 1; i >= 0; i--) {
      const msg = this.messages[i];
      const msgTokens = estimateTokens(`${msg.role}: ${msg.content}`, this.config.tokenEstimateDivisor);
      if (tokenCount + msgTokens > budget) {
        break;
      }
      selected.unshift(msg);
      tokenCount += msgTokens;
    }

    return {
      selected,
      stats: {
        totalMessages: this.messages.length,
        selectedMessages: selected.length,
        estimatedTokens: tokenCount,
        budgetUsedPercent: budget > 0 ? Math.round((tokenCount / budget) * 100) : 0,
      },
    };
  }

  /**
   * Messages to send for a new prompt: selected history plus the prompt itself
   */
  build(prompt: string, useHistory: boolean): ChatMessage[] {
    const current: ChatMessage = { role: "user", content: prompt };
    if (!useHistory) {
      return [current];
    }
    const reserve = estimateTokens(`user: ${prompt}`, this.config.tokenEstimateDivisor);
    return [...this.select(reserve).selected, current];
  }

  get length(): number {
    return this.messages.length;
  }

  clear(): void {
    this.messages = [];
  }
}
