import dotenv from 'dotenv';
import type { HostConfigInput } from './HostConfig.js';
import { isLogLevel, type LogLevel } from '../utils/Logger.js';

dotenv.config();

export interface EnvConfig {
    /** Path to the YAML host configuration file (optional) */
    AGENT_HOST_CONFIG?: string;

    /** Concurrent plugin executions (default 8) */
    WORKER_POOL_SIZE?: number;

    /** Tasks allowed to wait for a worker (default 100) */
    TASK_QUEUE_CAPACITY?: number;

    /** Per-task timeout in milliseconds (default 30000) */
    TASK_TIMEOUT_MS?: number;

    /** Health probe interval in milliseconds (default 30000) */
    PROBE_INTERVAL_MS?: number;

    /** Path of the JSON state snapshot (optional, no snapshot when unset) */
    STATE_PATH?: string;

    /** Refuse tasks when every candidate plugin is unhealthy (default false) */
    STRICT_HEALTH?: boolean;

    /** Console log level: debug, info, warn, error or silent (default 'info') */
    LOG_LEVEL: LogLevel;
}

function parseIntEnv(value: string | undefined): number | undefined {
    if (value === undefined || value.trim() === '') {
        return undefined;
    }
    // NaN is kept so that validation reports the offending variable
    return parseInt(value, 10);
}

function parseBoolEnv(value: string | undefined): boolean | undefined {
    if (value === undefined || value.trim() === '') {
        return undefined;
    }
    return value === 'true' || value === '1';
}

/**
 * Read the host's environment variables
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
    const logLevel = env.LOG_LEVEL?.toLowerCase() ?? 'info';
    if (!isLogLevel(logLevel)) {
        console.warn(`[EnvConfig] Unknown LOG_LEVEL '${env.LOG_LEVEL}', using 'info'`);
    }

    return {
        AGENT_HOST_CONFIG: env.AGENT_HOST_CONFIG || undefined,
        WORKER_POOL_SIZE: parseIntEnv(env.WORKER_POOL_SIZE),
        TASK_QUEUE_CAPACITY: parseIntEnv(env.TASK_QUEUE_CAPACITY),
        TASK_TIMEOUT_MS: parseIntEnv(env.TASK_TIMEOUT_MS),
        PROBE_INTERVAL_MS: parseIntEnv(env.PROBE_INTERVAL_MS),
        STATE_PATH: env.STATE_PATH || undefined,
        STRICT_HEALTH: parseBoolEnv(env.STRICT_HEALTH),
        LOG_LEVEL: isLogLevel(logLevel) ? logLevel : 'info',
    };
}

/**
 * Host configuration layer contributed by the environment
 */
export function envToHostConfig(env: EnvConfig): HostConfigInput {
    return {
        workerPoolSize: env.WORKER_POOL_SIZE,
        taskQueueCapacity: env.TASK_QUEUE_CAPACITY,
        taskTimeoutMs: env.TASK_TIMEOUT_MS,
        probeIntervalMs: env.PROBE_INTERVAL_MS,
        statePath: env.STATE_PATH,
        strictHealth: env.STRICT_HEALTH,
    };
}

export const envConfig: EnvConfig = readEnvConfig();
