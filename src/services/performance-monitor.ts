/**
 * Performance monitoring service for hybrid search
 *
 * @module performance-monitor
 */

import type { RetrievalSource } from '../models/ranked-hit.js';
import { DEFAULT_SLOW_SEARCH_THRESHOLD_MS } from '../constants/fusion-constants.js';

/**
 * Timed phases of one hybrid search
 */
export type SearchPhase = 'total' | 'vectorSearch' | 'textSearch' | 'fusion';

/**
 * Performance metrics for one hybrid search
 */
export interface SearchMetrics {
  /** Time spent on the vector source, embedding included */
  vectorSearchTimeMs: number;
  textSearchTimeMs: number;
  fusionTimeMs: number;
  /** Wall-clock time from dispatch to fused results */
  totalTimeMs: number;
  vectorCandidates: number;
  textCandidates: number;
  /** Distinct documents across both lists */
  uniqueCandidates: number;
  /** Total time exceeded the slow-search threshold */
  slowSearch: boolean;
  /** Source dropped by a degraded search */
  degradedSource?: RetrievalSource;
}

/**
 * PerformanceMonitor tracks timing and metrics for hybrid search operations
 *
 * Features:
 * - Per-source timing (the two sources overlap, so the total is wall-clock,
 *   not a sum of phases)
 * - Slow-search detection
 * - Degraded source tracking
 * - Candidate count tracking
 */
export class PerformanceMonitor {
  private slowThresholdMs: number;
  private timers: Map<SearchPhase, number>;
  private phaseTimes: Map<SearchPhase, number>;
  private vectorCandidates: number;
  private textCandidates: number;
  private uniqueCandidates: number;
  private degradedSource?: RetrievalSource;

  /**
   * Create a new PerformanceMonitor
   *
   * @param slowThresholdMs - Slow-search threshold in milliseconds (default: 500)
   */
  constructor(slowThresholdMs: number = DEFAULT_SLOW_SEARCH_THRESHOLD_MS) {
    this.slowThresholdMs = slowThresholdMs;
    this.timers = new Map();
    this.phaseTimes = new Map();
    this.vectorCandidates = 0;
    this.textCandidates = 0;
    this.uniqueCandidates = 0;
  }

  /**
   * Start timing a phase
   */
  startTimer(phase: SearchPhase): void {
    this.timers.set(phase, performance.now());
  }

  /**
   * Stop timing a phase and record elapsed time
   *
   * @returns Elapsed time in milliseconds (0 if the timer never started)
   */
  stopTimer(phase: SearchPhase): number {
    const startTime = this.timers.get(phase);

    if (startTime === undefined) {
      return 0;
    }

    const elapsed = performance.now() - startTime;
    this.phaseTimes.set(phase, elapsed);
    this.timers.delete(phase);

    return elapsed;
  }

  /**
   * Record candidate counts from both sources
   *
   * @param vector - Hits returned by the vector source
   * @param text - Hits returned by the text source
   * @param unique - Distinct documents after fusion (default: vector + text)
   */
  recordCandidateCounts(vector: number, text: number, unique?: number): void {
    this.vectorCandidates = vector;
    this.textCandidates = text;
    this.uniqueCandidates = unique !== undefined ? unique : vector + text;
  }

  /**
   * Mark a source as dropped by the degrade policy
   */
  setDegradedSource(source: RetrievalSource): void {
    this.degradedSource = source;
  }

  /**
   * Get complete performance metrics
   */
  getMetrics(): SearchMetrics {
    const totalTimeMs = this.phaseTimes.get('total') ?? 0;

    return {
      vectorSearchTimeMs: this.phaseTimes.get('vectorSearch') ?? 0,
      textSearchTimeMs: this.phaseTimes.get('textSearch') ?? 0,
      fusionTimeMs: this.phaseTimes.get('fusion') ?? 0,
      totalTimeMs,
      vectorCandidates: this.vectorCandidates,
      textCandidates: this.textCandidates,
      uniqueCandidates: this.uniqueCandidates,
      slowSearch: totalTimeMs > this.slowThresholdMs,
      degradedSource: this.degradedSource,
    };
  }

  /**
   * Slow-search threshold in milliseconds
   */
  getSlowThreshold(): number {
    return this.slowThresholdMs;
  }
}
