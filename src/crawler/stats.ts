import type { CrawlStatsSnapshot, FailureKind, RejectionReason } from '../types/index.js';

export class CrawlStats {
  private succeeded = 0;
  private readonly failures: Record<FailureKind, number> = {
    transport: 0,
    schema: 0,
    identity: 0,
    policy: 0,
    unexpected: 0,
  };
  private readonly rejected: Record<RejectionReason, number> = {
    duplicate: 0,
    invalid: 0,
    excluded: 0,
    distance: 0,
  };

  recordSuccess(): void {
    this.succeeded += 1;
  }

  recordFailure(kind: FailureKind): void {
    this.failures[kind] += 1;
  }

  recordRejection(reason: RejectionReason): void {
    this.rejected[reason] += 1;
  }

  snapshot(): CrawlStatsSnapshot {
    const failed = Object.values(this.failures).reduce((sum, count) => sum + count, 0);
    return {
      succeeded: this.succeeded,
      failed,
      failures: { ...this.failures },
      rejected: { ...this.rejected },
    };
  }
}
