import type { TokenUsage } from './types.js';

/** Accumulates token usage across the model calls of one turn. */
export class TokenCounter {
  private usage: TokenUsage = { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
  private seen = false;

  add(usage: TokenUsage | undefined): void {
    if (!usage) return;
    this.seen = true;
    this.usage = {
      inputTokens: this.usage.inputTokens + usage.inputTokens,
      outputTokens: this.usage.outputTokens + usage.outputTokens,
      totalTokens: this.usage.totalTokens + usage.totalTokens,
    };
  }

  getUsage(): TokenUsage | undefined {
    return this.seen ? { ...this.usage } : undefined;
  }

  getTokensPerSecond(elapsedMs: number): number | undefined {
    if (!this.seen || elapsedMs <= 0) return undefined;
    return Math.round((this.usage.outputTokens / elapsedMs) * 1000 * 10) / 10;
  }
}
