/**
 * Echo Plugin
 *
 * Returns each task's payload unchanged. Handles `ping` unless configured
 * otherwise; useful as a liveness check of the whole dispatch path.
 */

import { BasePlugin } from '../plugin-engine/BasePlugin.js';
import type { ExecutionContext, Task } from '../plugin-engine/types.js';
import { ConfigError, PluginTimeoutError } from '../errors.js';
import { delay } from '../utils/TimeoutWrapper.js';

export interface EchoPluginOptions {
    /** Task types to answer (default: ['ping']) */
    capabilities?: string[];
    /** Artificial latency per task in milliseconds */
    delayMs?: number;
}

export class EchoPlugin extends BasePlugin {
    private capabilities: string[];
    private delayMs: number;

    constructor(options: EchoPluginOptions = {}, name: string = 'echo') {
        super(name, '1.0.0');
        this.capabilities = options.capabilities ?? ['ping'];
        this.delayMs = options.delayMs ?? 0;
    }

    describeCapabilities(): readonly string[] {
        return this.capabilities;
    }

    async execute(task: Task, context: ExecutionContext): Promise<unknown> {
        if (this.delayMs > 0) {
            await delay(this.delayMs);
            if (context.signal.aborted) {
                throw new PluginTimeoutError(`Echo of task ${task.id} aborted`);
            }
        }
        context.log.debug(`Echoing task ${task.id}`);
        return task.payload;
    }
}

function isStringList(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Build an EchoPlugin from a YAML `config` block
 */
export function createEchoPlugin(config: Record<string, unknown>): EchoPlugin {
    const { capabilities, delayMs } = config;
    const options: EchoPluginOptions = {};

    if (capabilities !== undefined) {
        if (!isStringList(capabilities)) {
            throw new ConfigError('capabilities must be a list of task types', 'plugins.echo.config');
        }
        options.capabilities = capabilities;
    }
    if (delayMs !== undefined) {
        if (typeof delayMs !== 'number' || delayMs < 0) {
            throw new ConfigError('delayMs must be a non-negative number', 'plugins.echo.config');
        }
        options.delayMs = delayMs;
    }

    return new EchoPlugin(options);
}
