/**
 * Host Configuration Parser
 *
 * Parses the YAML host configuration file and merges it with the environment
 * and caller overrides into a validated HostConfig.
 *
 * ```yaml
 * version: '1.0'
 * host:
 *   workerPoolSize: 8
 *   taskTimeout: 30s
 *   healthWindow: { count: 10 }
 *   retryPolicy: { maxAttempts: 3, backoff: 500ms }
 * plugins:
 *   echo:
 *     enabled: true
 * ```
 */

import * as fs from 'fs/promises';
import YAML from 'yaml';
import { ConfigError } from '../errors.js';
import {
    mergeHostConfig,
    validateHostConfig,
    type HealthThresholds,
    type HealthWindow,
    type HostConfig,
    type HostConfigInput,
    type RetryPolicy,
} from './HostConfig.js';
import { envToHostConfig, type EnvConfig } from './EnvConfig.js';

/**
 * Auto-registration entry for a built-in plugin
 */
export interface PluginEntryConfig {
    enabled: boolean;
    /** Options handed to the plugin factory */
    config: Record<string, unknown>;
}

export interface HostConfigFile {
    version: string;
    host: HostConfigInput;
    plugins: Record<string, PluginEntryConfig>;
}

const DEFAULT_VERSION = '1.0';

const DURATION_UNITS: Record<string, number> = {
    ms: 1,
    s: 1000,
    m: 60000,
    h: 3600000,
};

function isRecord(value: unknown): value is Record<string, unknown> {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Substitute environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}
 */
function substituteEnvVars(value: string): string {
    const envPattern = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

    return value.replace(envPattern, (_match: string, varName: string, defaultValue: string | undefined) => {
        const envValue = process.env[varName];
        if (envValue !== undefined && envValue !== '') {
            return envValue;
        }
        return defaultValue ?? '';
    });
}

/**
 * Recursively substitute env vars in a parsed document
 */
function substituteEnvVarsInObject(obj: unknown): unknown {
    if (typeof obj === 'string') {
        return substituteEnvVars(obj);
    }

    if (Array.isArray(obj)) {
        return obj.map(item => substituteEnvVarsInObject(item));
    }

    if (isRecord(obj)) {
        const result: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(obj)) {
            result[key] = substituteEnvVarsInObject(value);
        }
        return result;
    }

    return obj;
}

/**
 * Parse a duration given as milliseconds or as a string like '500ms', '30s', '1m'
 */
export function parseDuration(value: unknown, field: string): number {
    if (typeof value === 'number' && Number.isFinite(value)) {
        return value;
    }
    if (typeof value === 'string') {
        const match = /^\s*(\d+(?:\.\d+)?)\s*(ms|s|m|h)?\s*$/.exec(value);
        if (match) {
            return parseFloat(match[1]) * DURATION_UNITS[match[2] ?? 'ms'];
        }
    }
    throw new Error(`${field} must be a duration such as 500ms, 30s or 1m`);
}

function readNumber(section: Record<string, unknown>, key: string, path: string): number | undefined {
    const value = section[key];
    if (value === undefined) return undefined;
    const parsed = typeof value === 'string' ? Number(value) : value;
    if (typeof parsed !== 'number' || Number.isNaN(parsed)) {
        throw new Error(`${path}${key} must be a number`);
    }
    return parsed;
}

function readDuration(section: Record<string, unknown>, key: string, path: string): number | undefined {
    const value = section[key];
    return value === undefined ? undefined : parseDuration(value, `${path}${key}`);
}

function readBoolean(section: Record<string, unknown>, key: string, path: string): boolean | undefined {
    const value = section[key];
    if (value === undefined) return undefined;
    if (typeof value === 'boolean') return value;
    if (value === 'true' || value === 'false') return value === 'true';
    throw new Error(`${path}${key} must be a boolean`);
}

function parseHealthWindow(value: unknown): HealthWindow | undefined {
    if (value === undefined) return undefined;
    if (!isRecord(value)) {
        throw new Error('host.healthWindow must be an object with either count or duration');
    }
    if (value.count !== undefined && value.duration !== undefined) {
        throw new Error('host.healthWindow takes either count or duration, not both');
    }
    if (value.duration !== undefined) {
        return { kind: 'duration', ms: parseDuration(value.duration, 'host.healthWindow.duration') };
    }
    const size = readNumber(value, 'count', 'host.healthWindow.');
    if (size === undefined) {
        throw new Error('host.healthWindow must define count or duration');
    }
    return { kind: 'count', size };
}

function parseThresholds(value: unknown): Partial<HealthThresholds> | undefined {
    if (value === undefined) return undefined;
    if (!isRecord(value)) {
        throw new Error('host.healthThresholds must be an object');
    }
    return {
        degradedRate: readNumber(value, 'degradedRate', 'host.healthThresholds.'),
        unhealthyRate: readNumber(value, 'unhealthyRate', 'host.healthThresholds.'),
    };
}

function parseRetryPolicy(value: unknown): Partial<RetryPolicy> | undefined {
    if (value === undefined) return undefined;
    if (!isRecord(value)) {
        throw new Error('host.retryPolicy must be an object');
    }
    return {
        maxAttempts: readNumber(value, 'maxAttempts', 'host.retryPolicy.'),
        backoffMs: readDuration(value, 'backoff', 'host.retryPolicy.'),
        multiplier: readNumber(value, 'multiplier', 'host.retryPolicy.'),
        maxBackoffMs: readDuration(value, 'maxBackoff', 'host.retryPolicy.'),
    };
}

function parseHostSection(value: unknown): HostConfigInput {
    if (value === undefined) return {};
    if (!isRecord(value)) {
        throw new Error("'host' section must be an object");
    }
    const path = 'host.';
    const statePath = value.statePath;
    if (statePath !== undefined && typeof statePath !== 'string') {
        throw new Error('host.statePath must be a string');
    }

    return {
        workerPoolSize: readNumber(value, 'workerPoolSize', path),
        taskQueueCapacity: readNumber(value, 'taskQueueCapacity', path),
        taskTimeoutMs: readDuration(value, 'taskTimeout', path),
        healthWindow: parseHealthWindow(value.healthWindow),
        healthThresholds: parseThresholds(value.healthThresholds),
        minSamples: readNumber(value, 'minSamples', path),
        probeIntervalMs: readDuration(value, 'probeInterval', path),
        probeTimeoutMs: readDuration(value, 'probeTimeout', path),
        probeConcurrency: readNumber(value, 'probeConcurrency', path),
        probeLatencySoftLimitMs: readDuration(value, 'probeLatencySoftLimit', path),
        probeFailureLimit: readNumber(value, 'probeFailureLimit', path),
        retryPolicy: parseRetryPolicy(value.retryPolicy),
        strictHealth: readBoolean(value, 'strictHealth', path),
        identifyTimeoutMs: readDuration(value, 'identifyTimeout', path),
        shutdownGracePeriodMs: readDuration(value, 'shutdownGracePeriod', path),
        statePath,
    };
}

function parsePluginEntries(value: unknown): Record<string, PluginEntryConfig> {
    if (value === undefined || value === null) return {};
    if (!isRecord(value)) {
        throw new Error("'plugins' section must be an object");
    }

    const plugins: Record<string, PluginEntryConfig> = {};
    for (const [name, entry] of Object.entries(value)) {
        if (!/^[a-z][a-z0-9-]*$/.test(name)) {
            throw new Error(
                `Invalid plugin name '${name}': must be lowercase alphanumeric with hyphens, starting with a letter`
            );
        }
        const raw = entry ?? {};
        if (!isRecord(raw)) {
            throw new Error(`Plugin '${name}' must be an object`);
        }
        const options = raw.config ?? {};
        if (!isRecord(options)) {
            throw new Error(`Plugin '${name}': config must be an object`);
        }
        plugins[name] = {
            enabled: readBoolean(raw, 'enabled', `plugins.${name}.`) ?? true,
            config: options,
        };
    }
    return plugins;
}

/**
 * Parse and validate a host configuration document
 */
export function parseConfig(rawConfig: unknown, filePath: string): HostConfigFile {
    if (rawConfig === null || rawConfig === undefined) {
        return { version: DEFAULT_VERSION, host: {}, plugins: {} };
    }
    if (!isRecord(rawConfig)) {
        throw new ConfigError('Configuration must be an object', filePath);
    }

    try {
        return {
            version: typeof rawConfig.version === 'string' ? rawConfig.version : DEFAULT_VERSION,
            host: parseHostSection(rawConfig.host),
            plugins: parsePluginEntries(rawConfig.plugins),
        };
    } catch (error) {
        throw new ConfigError(
            error instanceof Error ? error.message : String(error),
            filePath,
            { cause: error }
        );
    }
}

/**
 * Load and parse a YAML host configuration file
 */
export async function loadConfig(configPath: string): Promise<HostConfigFile> {
    let content: string;
    try {
        content = await fs.readFile(configPath, 'utf-8');
    } catch (error) {
        throw new ConfigError('Configuration file not found or not readable', configPath, { cause: error });
    }

    let rawConfig: unknown;
    try {
        rawConfig = YAML.parse(content);
    } catch (error) {
        throw new ConfigError('Invalid YAML syntax', configPath, { cause: error });
    }

    return parseConfig(substituteEnvVarsInObject(rawConfig), configPath);
}

/**
 * Enabled plugin entries of a configuration file's `plugins` section
 */
export function getEnabledPlugins(
    plugins: Record<string, PluginEntryConfig>
): Array<{ name: string; config: Record<string, unknown> }> {
    return Object.entries(plugins)
        .filter(([, entry]) => entry.enabled)
        .map(([name, entry]) => ({ name, config: entry.config }));
}

export interface ResolvedHostConfig {
    config: HostConfig;
    plugins: Record<string, PluginEntryConfig>;
}

/**
 * Merge defaults, the YAML file named by AGENT_HOST_CONFIG, the environment
 * and explicit overrides, in that order of precedence, and validate the result
 */
export async function resolveHostConfig(
    env: EnvConfig,
    overrides?: HostConfigInput
): Promise<ResolvedHostConfig> {
    const file = env.AGENT_HOST_CONFIG
        ? await loadConfig(env.AGENT_HOST_CONFIG)
        : { version: DEFAULT_VERSION, host: {}, plugins: {} };

    const config = mergeHostConfig(file.host, envToHostConfig(env), overrides);
    return {
        config: validateHostConfig(config, env.AGENT_HOST_CONFIG ?? 'environment'),
        plugins: file.plugins,
    };
}
