export interface PoolStats {
  totalCandidates: number;
  workingCount: number;
  failedCount: number;
  untestedCount: number;
  totalAttempts: number;
  successfulAttempts: number;
  failedAttempts: number;
}

export interface TrafficSnapshot {
  dispatchCalls: number;
  issued: number;
  successful: number;
  failed: number;
}
