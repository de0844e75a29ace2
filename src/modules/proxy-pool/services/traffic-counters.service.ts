import { Injectable } from '@nestjs/common';
import { TrafficSnapshot } from '../types/pool-stats.interface';

/**
 * Process-lifetime counters of outbound attempts, proxied and direct
 */
@Injectable()
export class TrafficCountersService {
  private dispatchCalls = 0;

  private issued = 0;

  private successful = 0;

  private failed = 0;

  dispatchStarted(): void {
    this.dispatchCalls += 1;
  }

  attemptIssued(): void {
    this.issued += 1;
  }

  attemptSucceeded(): void {
    this.successful += 1;
  }

  attemptFailed(): void {
    this.failed += 1;
  }

  snapshot(): TrafficSnapshot {
    return {
      dispatchCalls: this.dispatchCalls,
      issued: this.issued,
      successful: this.successful,
      failed: this.failed,
    };
  }
}
