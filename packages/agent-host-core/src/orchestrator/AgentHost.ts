/**
 * Agent Host
 *
 * Owns the host lifecycle and wires the registry, health monitor, prober and
 * task engine together:
 *
 *   created -> initializing -> running -> draining -> stopped
 *
 * Only an InitializationError keeps the host from reaching `running`.
 */

import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import type {
    AgentPlugin,
    PluginDescriptor,
    QueueStats,
    TaskInput,
    TaskOutcome,
} from '../plugin-engine/types.js';
import { PluginRegistry, createDescriptor } from '../plugin-engine/PluginRegistry.js';
import { HealthMonitor } from '../health/HealthMonitor.js';
import { HealthProber } from '../health/HealthProber.js';
import type { AggregateHealthSnapshot, HealthStatus, SnapshotTotals } from '../health/types.js';
import { TaskEngine, type RetryChain, type TaskHandle } from '../tasks/TaskEngine.js';
import type { TaskMetricsData, TimingStats } from '../metrics/TaskMetrics.js';
import {
    mergeHostConfig,
    validateHostConfig,
    type HostConfig,
    type HostConfigInput,
    type RetryPolicy,
} from '../config/HostConfig.js';
import { InitializationError, NotAcceptingError, errorMessage } from '../errors.js';
import { StateStore, STATE_VERSION, type HostStateSnapshot } from './StateStore.js';
import { ConsoleLogger, type HostLogger, type LogLevel } from '../utils/Logger.js';

// =============================================================================
// Types
// =============================================================================

export type LifecycleState = 'created' | 'initializing' | 'running' | 'draining' | 'stopped';

/**
 * A plugin to register during initialization, given as an instance or as a
 * factory that builds one
 */
export type PluginSpec =
    | { name: string; instance: AgentPlugin }
    | { name: string; factory: () => AgentPlugin | Promise<AgentPlugin> };

export interface AgentHostOptions {
    /** Stable identifier; restored from the state snapshot when omitted */
    agentId?: string;
    logger?: HostLogger;
    /** Parent of the loggers handed to plugins (default: `[plugin:<name>]`) */
    pluginLogger?: HostLogger;
    logLevel?: LogLevel;
}

export interface HostHealthSnapshot extends AggregateHealthSnapshot {
    agentId: string;
    state: LifecycleState;
    uptimeMs: number;
}

export interface PluginStatus {
    name: string;
    version: string;
    capabilities: string[];
    health: HealthStatus;
    registeredAt: number;
    /** Execution time of the tasks it ran; null before the first one */
    executionTiming: TimingStats | null;
}

export interface HostStatus {
    agentId: string;
    state: LifecycleState;
    uptimeMs: number;
    plugins: PluginStatus[];
    tasks: QueueStats & SnapshotTotals;
}

export interface StateChangedEvent {
    type: 'state:changed';
    from: LifecycleState;
    to: LifecycleState;
}

interface HostComponents {
    config: HostConfig;
    registry: PluginRegistry;
    monitor: HealthMonitor;
    prober: HealthProber;
    engine: TaskEngine;
    stateStore: StateStore | null;
}

// =============================================================================
// Agent Host
// =============================================================================

export class AgentHost extends EventEmitter {
    private state: LifecycleState = 'created';
    private agentIdValue: string;
    private agentIdGiven: boolean;
    private components: HostComponents | null = null;
    private logger: HostLogger;
    private pluginLogger: HostLogger;
    private startedAt: number | null = null;
    private shutdownPromise: Promise<void> | null = null;
    private stopped: Promise<void>;
    private markStopped: () => void = () => {};

    constructor(options: AgentHostOptions = {}) {
        super();
        this.agentIdGiven = options.agentId !== undefined;
        this.agentIdValue = options.agentId ?? randomUUID();
        this.logger = options.logger ?? new ConsoleLogger('AgentHost', options.logLevel);
        this.pluginLogger = options.pluginLogger
            ?? (options.logger ? options.logger.child('plugin') : new ConsoleLogger('plugin', options.logLevel));
        this.stopped = new Promise<void>((resolve) => {
            this.markStopped = resolve;
        });
    }

    get agentId(): string {
        return this.agentIdValue;
    }

    get lifecycleState(): LifecycleState {
        return this.state;
    }

    // =========================================================================
    // Lifecycle
    // =========================================================================

    /**
     * Build the host's components and register the given plugins. Plugins
     * that fail to load are logged and skipped.
     * @throws InitializationError on invalid configuration, or when plugins were
     * given and none of them registered; the host is then stopped
     */
    async initialize(config: HostConfigInput = {}, plugins: PluginSpec[] = []): Promise<void> {
        if (this.state !== 'created') {
            throw new InitializationError(`Cannot initialize a host that is ${this.state}`);
        }
        this.setState('initializing');

        let resolved: HostConfig;
        try {
            resolved = validateHostConfig(mergeHostConfig(config));
        } catch (error) {
            this.setState('stopped');
            throw new InitializationError(`Invalid configuration: ${errorMessage(error)}`, { cause: error });
        }

        const registry = new PluginRegistry(this.logger.child('PluginRegistry'));
        const monitor = new HealthMonitor(registry, resolved, { logger: this.logger.child('HealthMonitor') });
        const prober = new HealthProber(registry, monitor, resolved, this.logger.child('HealthProber'));
        const engine = new TaskEngine(registry, monitor, resolved, {
            logger: this.logger.child('TaskEngine'),
            pluginLogger: this.pluginLogger,
        });
        const stateStore = resolved.statePath ? new StateStore(resolved.statePath) : null;
        this.components = { config: resolved, registry, monitor, prober, engine, stateStore };

        let registered = 0;
        for (const spec of plugins) {
            try {
                const instance = 'instance' in spec ? spec.instance : await spec.factory();
                await this.registerPlugin(spec.name, instance);
                registered++;
            } catch (error) {
                this.logger.error(`Skipping plugin '${spec.name}': ${errorMessage(error)}`);
            }
        }

        if (plugins.length > 0 && registered === 0) {
            this.disposeComponents();
            this.setState('stopped');
            throw new InitializationError(`None of the ${plugins.length} configured plugin(s) could be registered`);
        }

        await this.restoreState();
        this.logger.info(`Initialized agent ${this.agentId} with ${registry.size} plugin(s)`);
    }

    /**
     * Enter `running` and start health probing
     */
    start(): void {
        if (this.state === 'running') return;
        if (this.state !== 'initializing') {
            throw new InitializationError(`Cannot start a host that is ${this.state}`);
        }
        const core = this.core();
        this.startedAt = Date.now();
        this.setState('running');
        core.prober.start();
    }

    /**
     * Start if needed and resolve once the host has stopped, either through
     * shutdown() or because the signal fired
     */
    async runForever(signal?: AbortSignal): Promise<void> {
        this.start();

        if (signal) {
            const onAbort = () => {
                this.shutdown().catch((error: unknown) => {
                    this.logger.error(`Shutdown failed: ${errorMessage(error)}`);
                });
            };
            if (signal.aborted) {
                onAbort();
            } else {
                signal.addEventListener('abort', onAbort, { once: true });
            }
        }

        await this.stopped;
    }

    /**
     * Stop accepting tasks, wait up to the grace period for accepted ones,
     * cancel the rest, unload every plugin and save the state snapshot.
     * Concurrent and repeated calls share one shutdown.
     */
    shutdown(gracePeriodMs?: number): Promise<void> {
        if (!this.shutdownPromise) {
            this.shutdownPromise = this.performShutdown(gracePeriodMs);
        }
        return this.shutdownPromise;
    }

    private async performShutdown(gracePeriodMs?: number): Promise<void> {
        if (this.state === 'stopped') return;
        const core = this.components;
        if (!core) {
            this.setState('stopped');
            return;
        }

        this.setState('draining');
        const grace = gracePeriodMs ?? core.config.shutdownGracePeriodMs;

        const drained = await core.engine.drain(grace);
        if (!drained) {
            this.logger.warn(`Grace period of ${grace}ms elapsed, cancelling remaining tasks`);
            core.engine.cancelAll();
        }
        await core.prober.stop();

        const snapshot = this.captureState(core);
        for (const name of core.registry.names()) {
            await core.registry.unregister(name);
        }

        if (core.stateStore) {
            try {
                await core.stateStore.save(snapshot);
                this.logger.info(`Saved state to ${core.stateStore.path}`);
            } catch (error) {
                this.logger.error(`Failed to save state: ${errorMessage(error)}`);
            }
        }

        this.disposeComponents();
        this.setState('stopped');
    }

    // =========================================================================
    // Plugins
    // =========================================================================

    /**
     * Load a plugin; it receives tasks as soon as this resolves
     * @throws DuplicateNameError, NotAcceptingError once shutdown has begun,
     * or the plugin's own initialize/identify error
     */
    async registerPlugin(name: string, instance: AgentPlugin): Promise<PluginDescriptor> {
        this.requireState('initializing', 'running');
        const core = this.core();

        try {
            const descriptor = await createDescriptor(instance, { name, timeoutMs: core.config.identifyTimeoutMs });
            // Shutdown may have started while the plugin was initializing
            this.requireState('initializing', 'running');
            return core.registry.register(descriptor);
        } catch (error) {
            await this.releaseInstance(name, instance);
            throw error;
        }
    }

    /**
     * Unload a plugin; tasks already dispatched to it finish normally
     * @throws NotFoundError
     */
    async unregisterPlugin(name: string): Promise<void> {
        this.requireState('initializing', 'running');
        await this.core().registry.unregister(name);
    }

    private async releaseInstance(name: string, instance: AgentPlugin): Promise<void> {
        try {
            await instance.shutDown();
        } catch (error) {
            this.logger.warn(`Plugin '${name}' failed to shut down after a failed load: ${errorMessage(error)}`);
        }
    }

    // =========================================================================
    // Tasks
    // =========================================================================

    async submit(input: TaskInput): Promise<TaskOutcome> {
        return this.runningEngine().submit(input);
    }

    /**
     * Fire-and-forget submission; the outcome is also available later
     * through getTaskOutcome()
     */
    dispatch(input: TaskInput): TaskHandle {
        return this.runningEngine().dispatch(input);
    }

    async submitWithRetry(input: TaskInput, policy?: RetryPolicy): Promise<RetryChain> {
        return this.runningEngine().submitWithRetry(input, policy);
    }

    getTaskOutcome(taskId: string): TaskOutcome | undefined {
        return this.components?.engine.getOutcome(taskId);
    }

    private runningEngine(): TaskEngine {
        if (this.state !== 'running') {
            throw new NotAcceptingError(this.state);
        }
        return this.core().engine;
    }

    // =========================================================================
    // Status
    // =========================================================================

    getHealthSnapshot(): HostHealthSnapshot {
        const core = this.core();
        return {
            ...core.monitor.buildSnapshot(core.engine.getQueueStats()),
            agentId: this.agentId,
            state: this.state,
            uptimeMs: this.uptimeMs(),
        };
    }

    /**
     * Outcome counters, per-plugin timings and recent failures
     */
    getMetrics(): TaskMetricsData {
        return this.core().monitor.metrics.getMetrics();
    }

    getStatus(): HostStatus {
        const core = this.core();
        const snapshot = core.monitor.buildSnapshot(core.engine.getQueueStats());
        const plugins: PluginStatus[] = [];
        for (const descriptor of core.registry.list()) {
            plugins.push({
                name: descriptor.name,
                version: descriptor.version,
                capabilities: [...descriptor.capabilities],
                health: core.monitor.getStatus(descriptor.name),
                registeredAt: descriptor.registeredAt,
                executionTiming: core.monitor.metrics.getPluginTiming(descriptor.name),
            });
        }

        return {
            agentId: this.agentId,
            state: this.state,
            uptimeMs: this.uptimeMs(),
            plugins,
            tasks: { ...snapshot.queue, ...snapshot.totals },
        };
    }

    /**
     * Registry, monitor and engine of an initialized host
     */
    get internals(): Readonly<Pick<HostComponents, 'registry' | 'monitor' | 'engine' | 'prober'>> {
        return this.core();
    }

    // =========================================================================
    // State Snapshot
    // =========================================================================

    private async restoreState(): Promise<void> {
        const core = this.core();
        if (!core.stateStore) return;

        let saved: HostStateSnapshot | null;
        try {
            saved = await core.stateStore.load();
        } catch (error) {
            this.logger.warn(`Ignoring unreadable state at ${core.stateStore.path}: ${errorMessage(error)}`);
            return;
        }
        if (!saved) return;

        if (!this.agentIdGiven) {
            this.agentIdValue = saved.agentId;
        }

        let restored = 0;
        for (const [name, entry] of Object.entries(saved.plugins)) {
            const descriptor = core.registry.get(name);
            if (descriptor?.version !== entry.version) continue;
            if (core.monitor.seedProbeStatus(name, entry.health)) {
                restored++;
            }
        }
        this.logger.info(`Restored health of ${restored} plugin(s) from ${core.stateStore.path}`);
    }

    private captureState(core: HostComponents): HostStateSnapshot {
        const snapshot: HostStateSnapshot = {
            version: STATE_VERSION,
            agentId: this.agentId,
            savedAt: new Date().toISOString(),
            plugins: {},
        };
        for (const descriptor of core.registry.list()) {
            snapshot.plugins[descriptor.name] = {
                version: descriptor.version,
                capabilities: [...descriptor.capabilities],
                health: core.monitor.getStatus(descriptor.name),
            };
        }
        return snapshot;
    }

    // =========================================================================
    // Helpers
    // =========================================================================

    private core(): HostComponents {
        if (!this.components) {
            throw new InitializationError('Host has not been initialized');
        }
        return this.components;
    }

    private requireState(...allowed: LifecycleState[]): void {
        if (!allowed.includes(this.state)) {
            throw new NotAcceptingError(this.state);
        }
    }

    private uptimeMs(): number {
        return this.startedAt === null ? 0 : Date.now() - this.startedAt;
    }

    private disposeComponents(): void {
        this.components?.monitor.dispose();
        this.components?.engine.dispose();
    }

    private setState(to: LifecycleState): void {
        const from = this.state;
        if (from === to) return;
        this.state = to;
        this.logger.info(`State ${from} -> ${to}`);
        this.emitEvent({ type: 'state:changed', from, to });
        if (to === 'stopped') {
            this.markStopped();
        }
    }

    private emitEvent(event: StateChangedEvent): void {
        this.emit(event.type, event);
    }
}
