/**
 * Health Type Definitions
 */

import type { QueueStats } from '../plugin-engine/types.js';

export type HealthStatus = 'unknown' | 'healthy' | 'degraded' | 'unhealthy';

/**
 * Relative badness used for routing and for combining signals
 */
export const HEALTH_SEVERITY: Record<HealthStatus, number> = {
    unknown: 0,
    healthy: 0,
    degraded: 1,
    unhealthy: 2,
};

/**
 * Weight of each status in the aggregate score; unknown plugins are left out
 */
export const HEALTH_SCORE_WEIGHT: Record<Exclude<HealthStatus, 'unknown'>, number> = {
    healthy: 1,
    degraded: 0.5,
    unhealthy: 0,
};

/**
 * Per-plugin health state. Exactly one record exists per registered plugin.
 */
export interface HealthRecord {
    plugin: string;
    status: HealthStatus;
    /** Status derived from task outcomes alone */
    trafficStatus: HealthStatus;
    /** Status derived from health probes alone */
    probeStatus: HealthStatus;
    successCount: number;
    failureCount: number;
    /** Failure rate over the current window */
    failureRate: number;
    /** Outcomes currently in the window */
    windowSamples: number;
    /** Mean execution time over the window */
    averageLatencyMs: number;
    consecutiveProbeFailures: number;
    lastProbeLatencyMs?: number;
    lastProbeAt?: number;
    lastError?: string;
    lastUpdated: number;
}

/**
 * Aggregate view over every registered plugin plus queue occupancy
 */
export interface AggregateHealthSnapshot {
    takenAt: number;
    /** Worst classified plugin status; unknown when nothing is classified */
    status: HealthStatus;
    /** Weighted share of healthy plugins in [0, 1] */
    score: number;
    plugins: Record<string, HealthRecord>;
    queue: QueueStats;
    totals: SnapshotTotals;
}

export interface SnapshotTotals {
    /** Tasks accepted by the engine */
    submitted: number;
    succeeded: number;
    failed: number;
    timedOut: number;
    rejected: number;
}

export interface HealthChangedEvent {
    type: 'health:changed';
    plugin: string;
    from: HealthStatus;
    to: HealthStatus;
    reason: string;
}
