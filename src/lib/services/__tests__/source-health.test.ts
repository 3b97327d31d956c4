/**
 * Tests for Source Health Tracking
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { SourceHealthTracker, DEGRADED_THRESHOLD } from '../source-health';

describe('Source Health Tracking', () => {
  let tracker: SourceHealthTracker;
  const at = new Date('2024-06-01T12:00:00.000Z');

  beforeEach(() => {
    tracker = new SourceHealthTracker();
  });

  describe('trackSuccess', () => {
    it('should reset consecutive failures and mark as active', () => {
      for (let i = 0; i < DEGRADED_THRESHOLD; i++) tracker.trackFailure('src-a', 'Network timeout');

      const result = tracker.trackSuccess('src-a', at);

      expect(result.status).toBe('active');
      expect(result.consecutiveFailures).toBe(0);
      expect(result.lastSuccessAt).toEqual(at);
      expect(result.lastFetchAt).toEqual(at);
      expect(result.lastError).toBeUndefined();
    });
  });

  describe('trackFailure', () => {
    it('should increment consecutive failures', () => {
      const result = tracker.trackFailure('src-a', 'Network timeout', at);

      expect(result.consecutiveFailures).toBe(1);
      expect(result.status).toBe('active'); // Not degraded yet
      expect(result.lastError).toBe('Network timeout');
      expect(result.lastSuccessAt).toBeUndefined();
    });

    it('should mark as degraded after 5 consecutive failures', () => {
      for (let i = 0; i < 4; i++) tracker.trackFailure('src-a', 'Network timeout');

      const result = tracker.trackFailure('src-a', 'Network timeout');

      expect(result.consecutiveFailures).toBe(5);
      expect(result.status).toBe('degraded');
    });

    it('should honour a custom threshold', () => {
      const strict = new SourceHealthTracker(2);
      strict.trackFailure('src-a', 'boom');
      expect(strict.trackFailure('src-a', 'boom').status).toBe('degraded');
    });
  });

  describe('getHealthStatus', () => {
    it('should return health metrics for a source', () => {
      tracker.trackSuccess('src-a', at);

      const metrics = tracker.getHealthStatus('src-a');

      expect(metrics).toEqual({
        sourceId: 'src-a',
        status: 'active',
        consecutiveFailures: 0,
        lastFetchAt: at,
        lastSuccessAt: at,
        lastError: undefined,
      });
    });

    it('should return null for a source never fetched', () => {
      expect(tracker.getHealthStatus('non-existent-id')).toBeNull();
    });
  });

  describe('getDegradedSources', () => {
    it('should return only degraded sources, worst first', () => {
      tracker.trackSuccess('healthy');
      for (let i = 0; i < 5; i++) tracker.trackFailure('flaky', 'HTTP 503');
      for (let i = 0; i < 7; i++) tracker.trackFailure('dead', 'HTTP 404');

      const sources = tracker.getDegradedSources();

      expect(sources.map((s) => s.sourceId)).toEqual(['dead', 'flaky']);
    });

    it('should return empty array when no degraded sources', () => {
      tracker.trackFailure('src-a', 'once');
      expect(tracker.getDegradedSources()).toHaveLength(0);
    });
  });

  it('should return copies rather than live state', () => {
    const snapshot = tracker.trackFailure('src-a', 'boom');
    snapshot.consecutiveFailures = 99;
    expect(tracker.getHealthStatus('src-a')?.consecutiveFailures).toBe(1);
  });
});
