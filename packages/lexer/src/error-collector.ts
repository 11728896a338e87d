import type { TokenizerConfig } from './config';
import type { ScanError } from './errors';

export type CollectorDecision = 'continue' | 'abort';

export type TolerancePolicy = Pick<TokenizerConfig, 'continueOnError' | 'errorToleranceLimit'>;

/**
 * Accumulates scan errors and decides whether scanning may go on.
 *
 * Every error is kept. Without continueOnError the first one aborts; with it,
 * the run aborts once the count exceeds errorToleranceLimit.
 */
export class ErrorCollector {
  private readonly errors: ScanError[] = [];

  constructor(private readonly policy: TolerancePolicy) {}

  record(error: ScanError): CollectorDecision {
    this.errors.push(error);

    if (!this.policy.continueOnError) {
      return 'abort';
    }
    return this.errors.length > this.policy.errorToleranceLimit ? 'abort' : 'continue';
  }

  get count(): number {
    return this.errors.length;
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }

  toArray(): ScanError[] {
    return [...this.errors];
  }
}
