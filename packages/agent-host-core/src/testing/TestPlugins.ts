/**
 * Plugins and helpers shared by the test suites
 */

import { BasePlugin } from '../plugin-engine/BasePlugin.js';
import { PluginRegistry, createDescriptor } from '../plugin-engine/PluginRegistry.js';
import type { AgentPlugin, ExecutionContext, ProbeReport, Task } from '../plugin-engine/types.js';
import { HealthMonitor } from '../health/HealthMonitor.js';
import { TaskEngine } from '../tasks/TaskEngine.js';
import { DEFAULT_HOST_CONFIG, type HostConfig } from '../config/HostConfig.js';
import { UpstreamUnavailableError } from '../errors.js';
import { silentLogger } from '../utils/Logger.js';

export type Behavior = (task: Task, context: ExecutionContext, call: number) => unknown;

/**
 * Plugin whose execute() runs a caller-supplied behavior
 */
export class ScriptedPlugin extends BasePlugin {
    calls = 0;
    shutDownCount = 0;
    contexts: ExecutionContext[] = [];
    probe: () => Promise<ProbeReport> = async () => ({ reachable: true, latencyMs: 1 });

    constructor(
        name: string,
        private capabilities: string[],
        private behavior: Behavior = (task) => task.payload,
        version: string = '1.0.0'
    ) {
        super(name, version);
    }

    describeCapabilities(): readonly string[] {
        return this.capabilities;
    }

    async execute(task: Task, context: ExecutionContext): Promise<unknown> {
        this.calls++;
        this.contexts.push(context);
        return this.behavior(task, context, this.calls);
    }

    async checkHealth(): Promise<ProbeReport> {
        return this.probe();
    }

    protected async onShutDown(): Promise<void> {
        this.shutDownCount++;
    }
}

/**
 * Behavior failing every n-th call with UpstreamUnavailable
 */
export function failEvery(n: number): Behavior {
    return (task, _context, call) => {
        if (call % n === 0) {
            throw new UpstreamUnavailableError(`call ${call} failed`);
        }
        return task.payload;
    };
}

/**
 * Holds callers until opened; a waiter rejects when its signal aborts
 */
export class Gate {
    private waiters: Array<() => void> = [];
    private opened = false;

    wait(signal?: AbortSignal): Promise<void> {
        if (this.opened) return Promise.resolve();
        return new Promise<void>((resolve, reject) => {
            this.waiters.push(resolve);
            signal?.addEventListener('abort', () => reject(signal.reason), { once: true });
        });
    }

    open(): void {
        this.opened = true;
        for (const resolve of this.waiters.splice(0)) {
            resolve();
        }
    }
}

/**
 * Resolve with whatever the promise rejects with; fail if it resolves
 */
export async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (error) {
        return error;
    }
    throw new Error('Expected the promise to reject');
}

/**
 * Call fn and return what it throws; fail if it returns
 */
export function captureThrow(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    throw new Error('Expected the call to throw');
}

export async function registerAll(registry: PluginRegistry, plugins: AgentPlugin[]): Promise<void> {
    for (const plugin of plugins) {
        registry.register(await createDescriptor(plugin, { timeoutMs: 1000 }));
    }
}

/**
 * Registry, monitor and engine wired with silent loggers
 */
export async function createEngine(
    config: Partial<HostConfig> = {},
    plugins: AgentPlugin[] = []
): Promise<{ registry: PluginRegistry; monitor: HealthMonitor; engine: TaskEngine }> {
    const merged: HostConfig = { ...DEFAULT_HOST_CONFIG, ...config };
    const registry = new PluginRegistry(silentLogger);
    const monitor = new HealthMonitor(registry, merged, { logger: silentLogger });
    const engine = new TaskEngine(registry, monitor, merged, {
        logger: silentLogger,
        pluginLogger: silentLogger,
    });
    await registerAll(registry, plugins);
    return { registry, monitor, engine };
}
