import type { Logger, ScanOutcome, ScanReport } from './types.js';

/**
 * Collects per-item outcomes of a discovery pass.
 *
 * Failures are logged at error level and forwarded to `onError`; skips
 * are recorded without a log record unless a debug message is given.
 */
export class ScanRecorder {
  private readonly outcomes: ScanOutcome[] = [];

  constructor(
    private readonly logger: Logger,
    private readonly onError?: (error: Error) => void
  ) {}

  registeredModel(name: string): void {
    this.outcomes.push({ status: 'registered-model', name });
  }

  registeredSerializer(name: string): void {
    this.outcomes.push({ status: 'registered-serializer', name });
  }

  skipped(name: string, reason: string, debugMessage?: string): void {
    this.outcomes.push({ status: 'skipped', name, reason });
    if (debugMessage !== undefined) {
      this.logger.debug(debugMessage, { name, reason });
    }
  }

  failed(name: string, error: Error): void {
    this.outcomes.push({ status: 'failed', name, error });
    this.logger.error(error.message, { name, error: error.name, cause: error.cause });
    this.onError?.(error);
  }

  toReport(mode: ScanReport['mode'], locations: readonly string[]): ScanReport {
    return {
      mode,
      locations: [...locations],
      outcomes: [...this.outcomes],
    };
  }
}
