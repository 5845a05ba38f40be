/**
 * State Store
 *
 * JSON snapshot of the registered plugins and their last health category,
 * written on shutdown and read back on the next initialization.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { HealthStatus } from '../health/types.js';

export const STATE_VERSION = 1;

export interface PluginStateEntry {
    version: string;
    capabilities: string[];
    health: HealthStatus;
}

export interface HostStateSnapshot {
    version: typeof STATE_VERSION;
    agentId: string;
    savedAt: string;
    plugins: Record<string, PluginStateEntry>;
}

const HEALTH_VALUES: readonly string[] = ['unknown', 'healthy', 'degraded', 'unhealthy'];

function isRecord(value: unknown): value is Record<string, unknown> {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isHealthStatus(value: unknown): value is HealthStatus {
    return typeof value === 'string' && HEALTH_VALUES.includes(value);
}

function parseEntry(name: string, value: unknown): PluginStateEntry {
    if (
        !isRecord(value)
        || typeof value.version !== 'string'
        || !Array.isArray(value.capabilities)
        || !isHealthStatus(value.health)
    ) {
        throw new Error(`Malformed state entry for plugin '${name}'`);
    }
    const capabilities = value.capabilities.filter((item): item is string => typeof item === 'string');
    return { version: value.version, capabilities, health: value.health };
}

/**
 * Validate a parsed snapshot
 */
export function parseHostState(raw: unknown): HostStateSnapshot {
    if (!isRecord(raw)) {
        throw new Error('State snapshot must be an object');
    }
    if (raw.version !== STATE_VERSION) {
        throw new Error(`Unsupported state snapshot version: ${String(raw.version)}`);
    }
    if (typeof raw.agentId !== 'string' || typeof raw.savedAt !== 'string' || !isRecord(raw.plugins)) {
        throw new Error('State snapshot is missing agentId, savedAt or plugins');
    }

    const plugins: Record<string, PluginStateEntry> = {};
    for (const [name, entry] of Object.entries(raw.plugins)) {
        plugins[name] = parseEntry(name, entry);
    }
    return { version: STATE_VERSION, agentId: raw.agentId, savedAt: raw.savedAt, plugins };
}

export class StateStore {
    constructor(private readonly statePath: string) {}

    get path(): string {
        return this.statePath;
    }

    /**
     * Read the snapshot
     * @returns null when no snapshot exists
     * @throws on unreadable or malformed content
     */
    async load(): Promise<HostStateSnapshot | null> {
        let content: string;
        try {
            content = await fs.readFile(this.statePath, 'utf8');
        } catch (error) {
            if (isRecord(error) && error.code === 'ENOENT') {
                return null;
            }
            throw error;
        }
        return parseHostState(JSON.parse(content));
    }

    /**
     * Write the snapshot to a temporary file, then rename it into place
     */
    async save(state: HostStateSnapshot): Promise<void> {
        await fs.mkdir(path.dirname(this.statePath), { recursive: true });
        const tmpPath = `${this.statePath}.tmp`;
        await fs.writeFile(tmpPath, JSON.stringify(state, null, 2), 'utf8');
        await fs.rename(tmpPath, this.statePath);
    }
}
