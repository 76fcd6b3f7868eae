import { BackoffConfig } from '../config/types';

/**
 * Doubling delay after consecutive failures, capped at maxDelayMs
 */
export class Backoff {
  private failures = 0;

  constructor(private readonly config: BackoffConfig) {}

  /** Delay to wait after one more failure */
  public next(): number {
    this.failures++;
    const delay = this.config.initialDelayMs * 2 ** (this.failures - 1);
    return Math.min(delay, this.config.maxDelayMs);
  }

  public reset(): void {
    this.failures = 0;
  }

  public get consecutiveFailures(): number {
    return this.failures;
  }
}
