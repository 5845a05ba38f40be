/**
 * Health Prober
 *
 * Periodically calls checkHealth() on every registered plugin and feeds the
 * results into the health monitor. Probes run on their own small queue,
 * independent of the task worker pool, each bounded by a timeout.
 */

import PQueue from 'p-queue';
import type { PluginDescriptor, ProbeReport } from '../plugin-engine/types.js';
import type { PluginRegistry } from '../plugin-engine/PluginRegistry.js';
import type { HealthMonitor } from './HealthMonitor.js';
import type { HostConfig } from '../config/HostConfig.js';
import { errorMessage } from '../errors.js';
import { withTimeout } from '../utils/TimeoutWrapper.js';
import { ConsoleLogger, type HostLogger } from '../utils/Logger.js';

export type HealthProberConfig = Pick<HostConfig, 'probeIntervalMs' | 'probeTimeoutMs' | 'probeConcurrency'>;

export class HealthProber {
    private queue: PQueue;
    private interval: NodeJS.Timeout | null = null;
    private sweep: Promise<void> | null = null;
    private logger: HostLogger;

    constructor(
        private registry: PluginRegistry,
        private monitor: HealthMonitor,
        private config: HealthProberConfig,
        logger?: HostLogger
    ) {
        this.queue = new PQueue({ concurrency: config.probeConcurrency });
        this.logger = logger ?? new ConsoleLogger('HealthProber');
    }

    get running(): boolean {
        return this.interval !== null;
    }

    /**
     * Probe now, then on every interval tick
     */
    start(): void {
        if (this.interval) return;

        const tick = () => {
            this.probeAll().catch((error: unknown) => {
                this.logger.error(`Probe sweep failed: ${errorMessage(error)}`);
            });
        };

        this.interval = setInterval(tick, this.config.probeIntervalMs);
        this.logger.info(`Probing plugins every ${this.config.probeIntervalMs}ms`);
        tick();
    }

    /**
     * Stop the timer and wait for a sweep in progress
     */
    async stop(): Promise<void> {
        if (this.interval) {
            clearInterval(this.interval);
            this.interval = null;
        }
        if (this.sweep) {
            await this.sweep;
        }
    }

    /**
     * Probe every registered plugin once. A sweep requested while another is
     * still running joins the running one.
     */
    probeAll(): Promise<void> {
        if (!this.sweep) {
            this.sweep = this.runSweep().finally(() => {
                this.sweep = null;
            });
        }
        return this.sweep;
    }

    private async runSweep(): Promise<void> {
        const probes: Array<Promise<void>> = [];
        for (const descriptor of this.registry.list()) {
            probes.push(this.queue.add(() => this.probe(descriptor)));
        }
        await Promise.all(probes);
    }

    /**
     * Probe one plugin and record the result. Never rejects.
     */
    async probe(descriptor: PluginDescriptor): Promise<void> {
        let report: ProbeReport;
        let error: string | undefined;

        try {
            report = await withTimeout(
                () => descriptor.instance.checkHealth(),
                this.config.probeTimeoutMs,
                `Health probe of '${descriptor.name}'`
            );
        } catch (err) {
            error = errorMessage(err);
            report = { reachable: false };
            this.logger.debug(`Probe of '${descriptor.name}' failed: ${error}`);
        }

        // The plugin may have been unloaded while the probe ran
        if (this.registry.get(descriptor.name) !== descriptor) return;
        this.monitor.recordProbe(descriptor.name, report, error);
    }
}
