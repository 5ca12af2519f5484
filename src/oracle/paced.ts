import type { CompletionOptions, TextOracle } from "./provider";

/**
 * Wraps an oracle so consecutive calls are at least `delayMs` apart.
 * Fixed spacing only; failures are passed through unchanged.
 */
export class PacedOracle implements TextOracle {
  private lastCallAt = 0;

  constructor(
    private inner: TextOracle,
    private delayMs: number,
    private now: () => number = Date.now,
  ) {}

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const wait = this.lastCallAt + this.delayMs - this.now();
    if (this.lastCallAt > 0 && wait > 0) {
      await new Promise((r) => setTimeout(r, wait));
    }

    try {
      return await this.inner.complete(prompt, options);
    } finally {
      this.lastCallAt = this.now();
    }
  }
}
