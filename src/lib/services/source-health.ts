/**
 * Source Health Tracking Service
 * Monitors feed source reliability and marks degraded sources.
 * State lives in memory for the lifetime of the engine.
 */

export type SourceStatus = 'active' | 'degraded';

export interface HealthMetrics {
  sourceId: string;
  status: SourceStatus;
  consecutiveFailures: number;
  lastFetchAt?: Date;
  lastSuccessAt?: Date;
  lastError?: string;
}

export const DEGRADED_THRESHOLD = 5; // Mark degraded after 5 consecutive failures

export class SourceHealthTracker {
  private readonly metrics = new Map<string, HealthMetrics>();

  constructor(private readonly threshold: number = DEGRADED_THRESHOLD) {}

  private current(sourceId: string): HealthMetrics {
    return this.metrics.get(sourceId) ?? { sourceId, status: 'active', consecutiveFailures: 0 };
  }

  /**
   * Track a successful fetch from a source
   * Resets consecutive failures and marks source as active
   */
  trackSuccess(sourceId: string, at: Date = new Date()): HealthMetrics {
    const next: HealthMetrics = {
      ...this.current(sourceId),
      status: 'active',
      consecutiveFailures: 0,
      lastFetchAt: at,
      lastSuccessAt: at,
      lastError: undefined,
    };
    this.metrics.set(sourceId, next);
    return { ...next };
  }

  /**
   * Track a failed fetch from a source
   * Increments consecutive failures and marks as degraded if threshold reached
   */
  trackFailure(sourceId: string, errorMessage: string, at: Date = new Date()): HealthMetrics {
    const previous = this.current(sourceId);
    const consecutiveFailures = previous.consecutiveFailures + 1;
    const next: HealthMetrics = {
      ...previous,
      consecutiveFailures,
      status: consecutiveFailures >= this.threshold ? 'degraded' : 'active',
      lastFetchAt: at,
      lastError: errorMessage,
    };
    this.metrics.set(sourceId, next);
    return { ...next };
  }

  /**
   * Get health status for a specific source, null if it was never fetched
   */
  getHealthStatus(sourceId: string): HealthMetrics | null {
    const metrics = this.metrics.get(sourceId);
    return metrics ? { ...metrics } : null;
  }

  /**
   * Get all degraded sources, worst first
   */
  getDegradedSources(): HealthMetrics[] {
    return this.snapshot()
      .filter((m) => m.status === 'degraded')
      .sort((a, b) => b.consecutiveFailures - a.consecutiveFailures);
  }

  snapshot(): HealthMetrics[] {
    return Array.from(this.metrics.values(), (m) => ({ ...m }));
  }
}
