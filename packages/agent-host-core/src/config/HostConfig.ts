/**
 * Host Configuration
 *
 * Typed configuration for the agent host, its defaults and validation.
 * Sources are merged by `resolveHostConfig` in ConfigParser.
 */

import { ConfigError } from '../errors.js';

/**
 * Trailing window used to compute a plugin's failure rate.
 * - count: the last `size` task outcomes
 * - duration: the outcomes of the last `ms` milliseconds
 */
export type HealthWindow =
    | { kind: 'count'; size: number }
    | { kind: 'duration'; ms: number };

export interface HealthThresholds {
    /** Failure rate at which a healthy plugin becomes degraded */
    degradedRate: number;
    /** Failure rate at which a degraded plugin becomes unhealthy */
    unhealthyRate: number;
}

export interface RetryPolicy {
    /** Total attempts including the first one (1 disables retries) */
    maxAttempts: number;
    /** Delay before the first retry */
    backoffMs: number;
    /** Delay multiplier per further retry */
    multiplier: number;
    /** Upper bound for a single delay */
    maxBackoffMs: number;
}

export interface HostConfig {
    /** Concurrent plugin executions */
    workerPoolSize: number;
    /** Tasks allowed to wait for a worker before submissions are rejected */
    taskQueueCapacity: number;
    /** Per-task execution timeout */
    taskTimeoutMs: number;
    healthWindow: HealthWindow;
    healthThresholds: HealthThresholds;
    /** Outcomes needed in the window before failure rates are evaluated */
    minSamples: number;
    probeIntervalMs: number;
    /** Bound on a single checkHealth() call; exceeding it counts as unreachable */
    probeTimeoutMs: number;
    /** Concurrent probes, separate from the worker pool */
    probeConcurrency: number;
    /** Probe latency above which a reachable plugin is reported degraded */
    probeLatencySoftLimitMs: number;
    /** Consecutive failed probes after which a plugin is unhealthy */
    probeFailureLimit: number;
    retryPolicy: RetryPolicy;
    /** Refuse tasks when every candidate plugin is unhealthy */
    strictHealth: boolean;
    /** Bound on plugin initialize() + identify() during registration */
    identifyTimeoutMs: number;
    shutdownGracePeriodMs: number;
    /** JSON state snapshot location; no snapshot is kept when unset */
    statePath?: string;
}

/**
 * Partial configuration as read from a file, the environment or a caller.
 * Nested objects may be given partially.
 */
export type HostConfigInput = Partial<Omit<HostConfig, 'healthThresholds' | 'retryPolicy'>> & {
    healthThresholds?: Partial<HealthThresholds>;
    retryPolicy?: Partial<RetryPolicy>;
};

export const DEFAULT_HOST_CONFIG: HostConfig = {
    workerPoolSize: 8,
    taskQueueCapacity: 100,
    taskTimeoutMs: 30000,
    healthWindow: { kind: 'count', size: 10 },
    healthThresholds: { degradedRate: 0.3, unhealthyRate: 0.6 },
    minSamples: 5,
    probeIntervalMs: 30000,
    probeTimeoutMs: 5000,
    probeConcurrency: 2,
    probeLatencySoftLimitMs: 2000,
    probeFailureLimit: 3,
    retryPolicy: { maxAttempts: 3, backoffMs: 500, multiplier: 2, maxBackoffMs: 10000 },
    strictHealth: false,
    identifyTimeoutMs: 5000,
    shutdownGracePeriodMs: 10000,
};

/**
 * Merge configuration layers over the defaults, later layers winning
 */
export function mergeHostConfig(...layers: Array<HostConfigInput | undefined>): HostConfig {
    let merged: HostConfig = {
        ...DEFAULT_HOST_CONFIG,
        healthThresholds: { ...DEFAULT_HOST_CONFIG.healthThresholds },
        retryPolicy: { ...DEFAULT_HOST_CONFIG.retryPolicy },
    };

    for (const layer of layers) {
        if (!layer) continue;
        const { healthThresholds, retryPolicy, ...rest } = layer;
        merged = {
            ...merged,
            ...stripUndefined(rest),
            healthThresholds: { ...merged.healthThresholds, ...stripUndefined(healthThresholds ?? {}) },
            retryPolicy: { ...merged.retryPolicy, ...stripUndefined(retryPolicy ?? {}) },
        };
    }

    return merged;
}

/**
 * Validate a complete configuration, throwing ConfigError on the first problem
 */
export function validateHostConfig(config: HostConfig, source?: string): HostConfig {
    const positiveInts: Array<keyof HostConfig> = [
        'workerPoolSize',
        'minSamples',
        'probeConcurrency',
        'probeFailureLimit',
    ];
    for (const key of positiveInts) {
        const value = config[key];
        if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
            throw new ConfigError(`${key} must be a positive integer`, source);
        }
    }

    if (!Number.isInteger(config.taskQueueCapacity) || config.taskQueueCapacity < 0) {
        throw new ConfigError('taskQueueCapacity must be a non-negative integer', source);
    }

    const positiveDurations: Array<keyof HostConfig> = [
        'taskTimeoutMs',
        'probeIntervalMs',
        'probeTimeoutMs',
        'probeLatencySoftLimitMs',
        'identifyTimeoutMs',
    ];
    for (const key of positiveDurations) {
        const value = config[key];
        if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
            throw new ConfigError(`${key} must be a positive duration`, source);
        }
    }

    if (!Number.isFinite(config.shutdownGracePeriodMs) || config.shutdownGracePeriodMs < 0) {
        throw new ConfigError('shutdownGracePeriodMs must not be negative', source);
    }

    const window = config.healthWindow;
    if (window.kind === 'count' && (!Number.isInteger(window.size) || window.size < 1)) {
        throw new ConfigError('healthWindow.size must be a positive integer', source);
    }
    if (window.kind === 'duration' && (!Number.isFinite(window.ms) || window.ms <= 0)) {
        throw new ConfigError('healthWindow.ms must be a positive duration', source);
    }

    const { degradedRate, unhealthyRate } = config.healthThresholds;
    if (!isRate(degradedRate) || !isRate(unhealthyRate)) {
        throw new ConfigError('healthThresholds rates must be within (0, 1]', source);
    }
    if (degradedRate > unhealthyRate) {
        throw new ConfigError('healthThresholds.degradedRate must not exceed unhealthyRate', source);
    }

    const retry = config.retryPolicy;
    if (!Number.isInteger(retry.maxAttempts) || retry.maxAttempts < 1) {
        throw new ConfigError('retryPolicy.maxAttempts must be a positive integer', source);
    }
    if (retry.backoffMs < 0 || retry.maxBackoffMs < 0 || retry.multiplier < 1) {
        throw new ConfigError('retryPolicy backoff must be non-negative with a multiplier >= 1', source);
    }

    return config;
}

function isRate(value: number): boolean {
    return Number.isFinite(value) && value > 0 && value <= 1;
}

function stripUndefined<T extends object>(value: T): Partial<T> {
    const result: Partial<T> = { ...value };
    for (const key in result) {
        if (result[key] === undefined) {
            delete result[key];
        }
    }
    return result;
}
