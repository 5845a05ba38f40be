/**
 * Base Plugin
 *
 * Common lifecycle handling for plugins: one-time setup, idempotent shutdown
 * and a default health self-report. Subclasses implement execute() and
 * describeCapabilities().
 */

import type {
    AgentPlugin,
    ExecutionContext,
    PluginIdentity,
    ProbeReport,
    Task,
} from './types.js';

export abstract class BasePlugin implements AgentPlugin {
    private setupPromise: Promise<void> | null = null;
    private shutdownPromise: Promise<void> | null = null;

    protected constructor(
        public readonly name: string,
        public readonly version: string = '1.0.0'
    ) {}

    identify(): PluginIdentity {
        return { name: this.name, version: this.version };
    }

    abstract execute(task: Task, context: ExecutionContext): Promise<unknown>;

    abstract describeCapabilities(): readonly string[];

    /**
     * Reports reachable unless the plugin was shut down, with the time the
     * ping() hook took as latency.
     */
    async checkHealth(): Promise<ProbeReport> {
        if (this.isShutDown) {
            return { reachable: false };
        }
        const start = Date.now();
        const reachable = await this.ping();
        return { reachable, latencyMs: Date.now() - start };
    }

    async initialize(): Promise<void> {
        if (!this.setupPromise) {
            this.setupPromise = this.setup();
        }
        return this.setupPromise;
    }

    async shutDown(): Promise<void> {
        if (!this.shutdownPromise) {
            this.shutdownPromise = this.onShutDown();
        }
        return this.shutdownPromise;
    }

    get isShutDown(): boolean {
        return this.shutdownPromise !== null;
    }

    /**
     * Plugin-specific setup, run once
     */
    protected async setup(): Promise<void> {}

    /**
     * Reachability check of the plugin's upstream
     */
    protected async ping(): Promise<boolean> {
        return true;
    }

    /**
     * Plugin-specific resource release, run once
     */
    protected async onShutDown(): Promise<void> {}
}
