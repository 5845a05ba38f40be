/**
 * Health Monitor
 *
 * Keeps one health record per registered plugin and moves it between
 * unknown, healthy, degraded and unhealthy from two signals:
 *
 * - traffic: the failure rate of task outcomes over a trailing window
 * - probes: reachability and latency reported by periodic checkHealth() calls
 *
 * The published status is the worse of the two, ignoring a signal that is
 * still unknown. Every mutation runs synchronously, so a record never sees
 * two updates interleave.
 */

import { EventEmitter } from 'events';
import type {
    PluginRegistryEvent,
    ProbeReport,
    QueueStats,
    TaskOutcome,
} from '../plugin-engine/types.js';
import type { PluginRegistry } from '../plugin-engine/PluginRegistry.js';
import type { HostConfig } from '../config/HostConfig.js';
import { TaskMetrics } from '../metrics/TaskMetrics.js';
import { ConsoleLogger, type HostLogger } from '../utils/Logger.js';
import {
    HEALTH_SCORE_WEIGHT,
    HEALTH_SEVERITY,
    type AggregateHealthSnapshot,
    type HealthChangedEvent,
    type HealthRecord,
    type HealthStatus,
} from './types.js';

// =============================================================================
// Configuration
// =============================================================================

export type HealthMonitorConfig = Pick<
    HostConfig,
    | 'healthWindow'
    | 'healthThresholds'
    | 'minSamples'
    | 'probeLatencySoftLimitMs'
    | 'probeFailureLimit'
>;

export interface HealthMonitorOptions {
    logger?: HostLogger;
    metrics?: TaskMetrics;
    /** Clock, replaceable in tests of time-based windows */
    now?: () => number;
}

interface Sample {
    success: boolean;
    latencyMs: number;
    at: number;
}

interface PluginHealthState {
    record: HealthRecord;
    samples: Sample[];
    /** Outcomes recorded since traffic left healthy */
    samplesSinceLeftHealthy: number;
    leftHealthyAt: number;
    /** Good probes in a row, reset by any unreachable or slow probe */
    consecutiveGoodProbes: number;
}

/**
 * Worse of two signals; an unknown signal defers to the other one
 */
export function combineHealth(a: HealthStatus, b: HealthStatus): HealthStatus {
    if (a === 'unknown') return b;
    if (b === 'unknown') return a;
    return HEALTH_SEVERITY[b] > HEALTH_SEVERITY[a] ? b : a;
}

// =============================================================================
// Health Monitor
// =============================================================================

export class HealthMonitor extends EventEmitter {
    private states: Map<string, PluginHealthState> = new Map();
    private logger: HostLogger;
    private now: () => number;
    readonly metrics: TaskMetrics;

    constructor(
        private registry: PluginRegistry,
        private config: HealthMonitorConfig,
        options: HealthMonitorOptions = {}
    ) {
        super();
        this.logger = options.logger ?? new ConsoleLogger('HealthMonitor');
        this.metrics = options.metrics ?? new TaskMetrics();
        this.now = options.now ?? Date.now;

        for (const descriptor of registry.list()) {
            this.track(descriptor.name);
        }
        registry.on('plugin:registered', this.onRegistered);
        registry.on('plugin:unregistered', this.onUnregistered);
    }

    /**
     * Stop following the registry
     */
    dispose(): void {
        this.registry.off('plugin:registered', this.onRegistered);
        this.registry.off('plugin:unregistered', this.onUnregistered);
    }

    private onRegistered = (event: PluginRegistryEvent): void => {
        this.track(event.descriptor.name);
    };

    private onUnregistered = (event: PluginRegistryEvent): void => {
        this.states.delete(event.descriptor.name);
    };

    /**
     * Start (or restart) a plugin's record at unknown
     */
    track(plugin: string): void {
        this.states.set(plugin, {
            record: {
                plugin,
                status: 'unknown',
                trafficStatus: 'unknown',
                probeStatus: 'unknown',
                successCount: 0,
                failureCount: 0,
                failureRate: 0,
                windowSamples: 0,
                averageLatencyMs: 0,
                consecutiveProbeFailures: 0,
                lastUpdated: this.now(),
            },
            samples: [],
            samplesSinceLeftHealthy: 0,
            leftHealthyAt: 0,
            consecutiveGoodProbes: 0,
        });
    }

    // =========================================================================
    // Traffic Signal
    // =========================================================================

    /**
     * Record a task outcome. Every outcome lands in the metrics history; only
     * outcomes of tracked plugins that actually ran affect health.
     */
    recordOutcome(outcome: TaskOutcome): void {
        this.metrics.recordOutcome(outcome);

        const state = this.states.get(outcome.plugin);
        if (!state) return;

        const success = outcome.status === 'succeeded';
        const counted = success
            || outcome.status === 'timed_out'
            || (outcome.status === 'failed' && outcome.error?.code !== 'Cancelled');
        if (!counted) return;

        const now = this.now();
        const record = state.record;
        if (success) {
            record.successCount++;
        } else {
            record.failureCount++;
            record.lastError = outcome.error?.message ?? outcome.status;
        }

        state.samples.push({ success, latencyMs: outcome.executionMs, at: now });
        if (record.trafficStatus === 'degraded' || record.trafficStatus === 'unhealthy') {
            state.samplesSinceLeftHealthy++;
        }

        const samples = this.trimWindow(state, now);
        const failures = samples.filter(sample => !sample.success).length;
        record.windowSamples = samples.length;
        record.failureRate = samples.length > 0 ? failures / samples.length : 0;
        record.averageLatencyMs = samples.length > 0
            ? samples.reduce((sum, sample) => sum + sample.latencyMs, 0) / samples.length
            : 0;
        record.lastUpdated = now;

        const reason = this.evaluateTraffic(state, success, now);
        this.publish(state, reason);
    }

    private trimWindow(state: PluginHealthState, now: number): Sample[] {
        const window = this.config.healthWindow;
        if (window.kind === 'count') {
            if (state.samples.length > window.size) {
                state.samples = state.samples.slice(-window.size);
            }
        } else {
            const cutoff = now - window.ms;
            state.samples = state.samples.filter(sample => sample.at > cutoff);
        }
        return state.samples;
    }

    private fullWindowSinceLeftHealthy(state: PluginHealthState, now: number): boolean {
        const window = this.config.healthWindow;
        return window.kind === 'count'
            ? state.samplesSinceLeftHealthy >= window.size
            : now - state.leftHealthyAt >= window.ms;
    }

    /**
     * Apply the traffic transition rules until the state settles; returns the
     * reason of the last transition taken
     */
    private evaluateTraffic(state: PluginHealthState, lastSucceeded: boolean, now: number): string {
        const record = state.record;
        const { degradedRate, unhealthyRate } = this.config.healthThresholds;
        const rate = record.failureRate;
        const evaluated = record.windowSamples >= this.config.minSamples;
        const rateText = `failure rate ${Math.round(rate * 100)}% over ${record.windowSamples} outcomes`;
        let reason = rateText;

        for (;;) {
            const from = record.trafficStatus;
            let to = from;

            switch (from) {
                case 'unknown':
                    if (evaluated && rate >= degradedRate) {
                        to = 'degraded';
                    } else if (lastSucceeded) {
                        to = 'healthy';
                        reason = 'first successful execution';
                    }
                    break;
                case 'healthy':
                    if (evaluated && rate >= degradedRate) to = 'degraded';
                    break;
                case 'degraded':
                    if (evaluated && rate >= unhealthyRate) {
                        to = 'unhealthy';
                    } else if (rate < degradedRate && this.fullWindowSinceLeftHealthy(state, now)) {
                        to = 'healthy';
                    }
                    break;
                case 'unhealthy':
                    if (rate < degradedRate && this.fullWindowSinceLeftHealthy(state, now)) {
                        to = 'healthy';
                    }
                    break;
            }

            if (to === from) return reason;
            if (to === 'degraded' && (from === 'healthy' || from === 'unknown')) {
                state.samplesSinceLeftHealthy = 0;
                state.leftHealthyAt = now;
            }
            record.trafficStatus = to;
        }
    }

    // =========================================================================
    // Probe Signal
    // =========================================================================

    /**
     * Merge the result of a health probe. A probe that threw or timed out is
     * recorded as unreachable with its error. A degraded or unhealthy probe
     * signal returns to healthy only after `probeFailureLimit` good probes in
     * a row.
     */
    recordProbe(plugin: string, report: ProbeReport, error?: string): void {
        const state = this.states.get(plugin);
        if (!state) return;

        const record = state.record;
        const now = this.now();
        record.lastProbeAt = now;
        record.lastUpdated = now;

        let reason: string;
        if (!report.reachable) {
            state.consecutiveGoodProbes = 0;
            record.consecutiveProbeFailures++;
            record.lastError = error ?? 'Health probe reported unreachable';
            reason = `${record.consecutiveProbeFailures} consecutive failed probe(s)`;
            record.probeStatus = record.consecutiveProbeFailures >= this.config.probeFailureLimit
                ? 'unhealthy'
                : 'degraded';
        } else {
            record.consecutiveProbeFailures = 0;
            record.lastProbeLatencyMs = report.latencyMs;
            const latency = report.latencyMs ?? 0;
            if (latency > this.config.probeLatencySoftLimitMs) {
                state.consecutiveGoodProbes = 0;
                record.probeStatus = 'degraded';
                reason = `probe latency ${latency}ms above ${this.config.probeLatencySoftLimitMs}ms`;
            } else {
                state.consecutiveGoodProbes++;
                const required = this.config.probeFailureLimit;
                const recovering = record.probeStatus === 'degraded' || record.probeStatus === 'unhealthy';
                if (!recovering || state.consecutiveGoodProbes >= required) {
                    record.probeStatus = 'healthy';
                    reason = recovering ? `${required} consecutive good probes` : 'probe succeeded';
                } else {
                    reason = `${state.consecutiveGoodProbes} of ${required} good probes to recover`;
                }
            }
        }

        this.publish(state, reason);
    }

    /**
     * Seed the probe signal from persisted state, only while no probe has
     * been recorded. Returns whether the seed was applied.
     */
    seedProbeStatus(plugin: string, status: HealthStatus): boolean {
        const state = this.states.get(plugin);
        if (!state || status === 'unknown' || state.record.probeStatus !== 'unknown') {
            return false;
        }
        state.record.probeStatus = status;
        this.publish(state, 'restored from saved state');
        return true;
    }

    // =========================================================================
    // Queries
    // =========================================================================

    getRecord(plugin: string): HealthRecord | undefined {
        const state = this.states.get(plugin);
        return state ? { ...state.record } : undefined;
    }

    getStatus(plugin: string): HealthStatus {
        return this.states.get(plugin)?.record.status ?? 'unknown';
    }

    /**
     * Recent outcomes across all plugins, oldest first
     */
    getHistory(limit?: number): TaskOutcome[] {
        return this.metrics.getRecentOutcomes(limit);
    }

    /**
     * Aggregate view over the registered plugins. The score averages plugin
     * weights (unknown plugins left out) and is 1 when none is classified.
     */
    buildSnapshot(queue: QueueStats): AggregateHealthSnapshot {
        const plugins: Record<string, HealthRecord> = {};
        let classified = 0;
        let weight = 0;
        let status: HealthStatus = 'unknown';

        for (const descriptor of this.registry.list()) {
            const record = this.getRecord(descriptor.name);
            if (!record) continue;
            plugins[descriptor.name] = record;
            if (record.status === 'unknown') continue;

            classified++;
            weight += HEALTH_SCORE_WEIGHT[record.status];
            if (status === 'unknown' || HEALTH_SEVERITY[record.status] > HEALTH_SEVERITY[status]) {
                status = record.status;
            }
        }

        const totals = this.metrics.getTotals();
        return {
            takenAt: this.now(),
            status,
            score: classified > 0 ? weight / classified : 1,
            plugins,
            queue: { ...queue },
            totals: {
                submitted: queue.accepted,
                succeeded: totals.succeeded,
                failed: totals.failed,
                timedOut: totals.timed_out,
                rejected: totals.rejected,
            },
        };
    }

    // =========================================================================
    // Transitions
    // =========================================================================

    private publish(state: PluginHealthState, reason: string): void {
        const record = state.record;
        const from = record.status;
        const to = combineHealth(record.trafficStatus, record.probeStatus);
        if (from === to) return;

        record.status = to;
        const message = `Plugin '${record.plugin}' ${from} -> ${to} (${reason})`;
        if (to === 'healthy') {
            this.logger.info(message);
        } else {
            this.logger.warn(message);
        }
        this.emitEvent({ type: 'health:changed', plugin: record.plugin, from, to, reason });
    }

    private emitEvent(event: HealthChangedEvent): void {
        this.emit(event.type, event);
    }
}
