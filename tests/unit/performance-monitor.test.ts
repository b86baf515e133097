/**
 * Unit tests for PerformanceMonitor service
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { PerformanceMonitor } from '../../src/services/performance-monitor.js';

describe('PerformanceMonitor', () => {
  let monitor: PerformanceMonitor;

  beforeEach(() => {
    monitor = new PerformanceMonitor(300);
  });

  describe('Timing tracking', () => {
    it('should track timing for a single phase', async () => {
      monitor.startTimer('vectorSearch');

      await new Promise(resolve => setTimeout(resolve, 10));

      const elapsed = monitor.stopTimer('vectorSearch');

      expect(elapsed).toBeGreaterThan(0);
      expect(monitor.getMetrics().vectorSearchTimeMs).toBe(elapsed);
    });

    it('should time overlapping phases independently', async () => {
      monitor.startTimer('total');
      monitor.startTimer('vectorSearch');
      monitor.startTimer('textSearch');

      await new Promise(resolve => setTimeout(resolve, 5));
      const text = monitor.stopTimer('textSearch');

      await new Promise(resolve => setTimeout(resolve, 10));
      const vector = monitor.stopTimer('vectorSearch');
      const total = monitor.stopTimer('total');

      expect(vector).toBeGreaterThan(text);
      expect(total).toBeGreaterThanOrEqual(vector);
    });

    it('should return 0 for a timer that never started', () => {
      expect(monitor.stopTimer('fusion')).toBe(0);
      expect(monitor.getMetrics().fusionTimeMs).toBe(0);
    });
  });

  describe('Metrics collection', () => {
    it('should report zeroed metrics before any search', () => {
      expect(monitor.getMetrics()).toEqual({
        vectorSearchTimeMs: 0,
        textSearchTimeMs: 0,
        fusionTimeMs: 0,
        totalTimeMs: 0,
        vectorCandidates: 0,
        textCandidates: 0,
        uniqueCandidates: 0,
        slowSearch: false,
        degradedSource: undefined,
      });
    });

    it('should record candidate counts', () => {
      monitor.recordCandidateCounts(20, 15, 28);

      const metrics = monitor.getMetrics();
      expect(metrics.vectorCandidates).toBe(20);
      expect(metrics.textCandidates).toBe(15);
      expect(metrics.uniqueCandidates).toBe(28);
    });

    it('should default unique candidates to the sum', () => {
      monitor.recordCandidateCounts(4, 3);
      expect(monitor.getMetrics().uniqueCandidates).toBe(7);
    });

    it('should record the degraded source', () => {
      monitor.setDegradedSource('text');
      expect(monitor.getMetrics().degradedSource).toBe('text');
    });
  });

  describe('Slow search detection', () => {
    it('should flag a search slower than the threshold', async () => {
      const fast = new PerformanceMonitor(1);
      fast.startTimer('total');
      await new Promise(resolve => setTimeout(resolve, 10));
      fast.stopTimer('total');

      expect(fast.getMetrics().slowSearch).toBe(true);
    });

    it('should not flag a fast search', () => {
      monitor.startTimer('total');
      monitor.stopTimer('total');

      expect(monitor.getMetrics().slowSearch).toBe(false);
    });

    it('should expose the threshold', () => {
      expect(monitor.getSlowThreshold()).toBe(300);
      expect(new PerformanceMonitor().getSlowThreshold()).toBe(500);
    });
  });
});
