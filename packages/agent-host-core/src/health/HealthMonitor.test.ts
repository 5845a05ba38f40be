/**
 * Health Monitor Unit Tests
 */

import { expect } from 'chai';

import { HealthMonitor, combineHealth } from './HealthMonitor.js';
import type { HealthChangedEvent } from './types.js';
import { PluginRegistry } from '../plugin-engine/PluginRegistry.js';
import type { QueueStats, TaskOutcome, TaskStatus } from '../plugin-engine/types.js';
import { DEFAULT_HOST_CONFIG, type HostConfig } from '../config/HostConfig.js';
import type { ErrorCode } from '../errors.js';
import { silentLogger } from '../utils/Logger.js';
import { ScriptedPlugin, registerAll } from '../testing/TestPlugins.js';

// =============================================================================
// Test Helpers
// =============================================================================

let taskCounter = 0;

function outcome(plugin: string, status: TaskStatus, code?: ErrorCode): TaskOutcome {
    taskCounter++;
    return {
        taskId: `task-${taskCounter}`,
        type: 'ping',
        plugin,
        status,
        error: code ? { code, message: `${code} in task-${taskCounter}` } : undefined,
        durationMs: 10,
        executionMs: 8,
        completedAt: Date.now(),
        attempt: 1,
    };
}

function record(monitor: HealthMonitor, plugin: string, pattern: string): void {
    for (const mark of pattern) {
        monitor.recordOutcome(
            mark === 'S' ? outcome(plugin, 'succeeded') : outcome(plugin, 'failed', 'UpstreamUnavailable')
        );
    }
}

const QUEUE: QueueStats = {
    waiting: 2,
    running: 3,
    capacity: 100,
    workerPoolSize: 8,
    utilization: 0.375,
    accepted: 12,
    accepting: true,
};

async function setup(
    config: Partial<HostConfig> = {},
    names: string[] = ['echo'],
    now?: () => number
): Promise<{ registry: PluginRegistry; monitor: HealthMonitor; events: HealthChangedEvent[] }> {
    const registry = new PluginRegistry(silentLogger);
    const monitor = new HealthMonitor(registry, { ...DEFAULT_HOST_CONFIG, ...config }, { logger: silentLogger, now });
    await registerAll(registry, names.map(name => new ScriptedPlugin(name, ['ping'])));
    const events: HealthChangedEvent[] = [];
    monitor.on('health:changed', (event: HealthChangedEvent) => events.push(event));
    return { registry, monitor, events };
}

// =============================================================================
// Traffic Signal
// =============================================================================

describe('HealthMonitor', () => {
    describe('traffic signal', () => {
        it('should start registered plugins as unknown', async () => {
            const { monitor } = await setup();

            expect(monitor.getStatus('echo')).to.equal('unknown');
            expect(monitor.getRecord('echo')?.successCount).to.equal(0);
        });

        it('should become healthy on the first success', async () => {
            const { monitor, events } = await setup();

            record(monitor, 'echo', 'S');

            expect(monitor.getStatus('echo')).to.equal('healthy');
            expect(events).to.have.length(1);
            expect(events[0]).to.include({ plugin: 'echo', from: 'unknown', to: 'healthy' });
        });

        it('should degrade when 3 of the last 10 outcomes failed', async () => {
            const { monitor, events } = await setup();

            record(monitor, 'echo', 'SSSSSSSFF');
            expect(monitor.getStatus('echo')).to.equal('healthy');

            record(monitor, 'echo', 'F');

            expect(monitor.getStatus('echo')).to.equal('degraded');
            expect(monitor.getRecord('echo')?.failureRate).to.equal(0.3);
            expect(events.map(e => e.to)).to.deep.equal(['healthy', 'degraded']);
        });

        it('should recover only after a full window below the threshold', async () => {
            const { monitor } = await setup();
            record(monitor, 'echo', 'SSSSSSSFFF');

            record(monitor, 'echo', 'SSSSSSSSS');
            expect(monitor.getStatus('echo')).to.equal('degraded');

            record(monitor, 'echo', 'S');
            expect(monitor.getStatus('echo')).to.equal('healthy');
        });

        it('should cascade to unhealthy on a sharp spike', async () => {
            const { monitor, events } = await setup();

            record(monitor, 'echo', 'SFFFF');

            expect(monitor.getStatus('echo')).to.equal('unhealthy');
            expect(events.map(e => `${e.from}->${e.to}`)).to.deep.equal(['unknown->healthy', 'healthy->unhealthy']);
        });

        it('should not evaluate rates below the minimum sample count', async () => {
            const { monitor } = await setup();

            record(monitor, 'echo', 'FFFF');

            expect(monitor.getStatus('echo')).to.equal('unknown');
            expect(monitor.getRecord('echo')?.failureCount).to.equal(4);
        });

        it('should ignore rejected and cancelled outcomes', async () => {
            const { monitor } = await setup();

            monitor.recordOutcome(outcome('echo', 'rejected', 'Cancelled'));
            monitor.recordOutcome(outcome('echo', 'failed', 'Cancelled'));

            const health = monitor.getRecord('echo');
            expect(health?.successCount).to.equal(0);
            expect(health?.failureCount).to.equal(0);
            expect(monitor.metrics.getTotals()).to.deep.include({ rejected: 1, failed: 1, completed: 2 });
        });

        it('should count timeouts as failures and keep the last error', async () => {
            const { monitor } = await setup();

            monitor.recordOutcome(outcome('echo', 'timed_out', 'Timeout'));

            const health = monitor.getRecord('echo');
            expect(health?.failureCount).to.equal(1);
            expect(health?.lastError).to.equal(`Timeout in task-${taskCounter}`);
        });

        it('should ignore outcomes of unregistered plugins', async () => {
            const { monitor } = await setup();

            record(monitor, 'ghost', 'SF');

            expect(monitor.getRecord('ghost')).to.equal(undefined);
            expect(monitor.getStatus('ghost')).to.equal('unknown');
            expect(monitor.getHistory()).to.have.length(2);
        });

        it('should reset a re-registered plugin to unknown', async () => {
            const { registry, monitor } = await setup();
            record(monitor, 'echo', 'S');

            await registry.unregister('echo');
            expect(monitor.getRecord('echo')).to.equal(undefined);

            await registerAll(registry, [new ScriptedPlugin('echo', ['ping'])]);
            expect(monitor.getStatus('echo')).to.equal('unknown');
        });

        it('should use a time-based window when configured', async () => {
            let now = 0;
            const { monitor } = await setup({ healthWindow: { kind: 'duration', ms: 1000 } }, ['echo'], () => now);

            record(monitor, 'echo', 'FFFFF');
            expect(monitor.getStatus('echo')).to.equal('unhealthy');

            now = 1500;
            record(monitor, 'echo', 'S');

            expect(monitor.getStatus('echo')).to.equal('healthy');
            expect(monitor.getRecord('echo')?.windowSamples).to.equal(1);
        });
    });

    // =========================================================================
    // Probe Signal
    // =========================================================================

    describe('probe signal', () => {
        it('should mark an idle plugin healthy after a fast probe', async () => {
            const { monitor } = await setup();

            monitor.recordProbe('echo', { reachable: true, latencyMs: 15 });

            expect(monitor.getStatus('echo')).to.equal('healthy');
            expect(monitor.getRecord('echo')?.lastProbeLatencyMs).to.equal(15);
        });

        it('should degrade on slow probes', async () => {
            const { monitor } = await setup();

            monitor.recordProbe('echo', { reachable: true, latencyMs: 2500 });

            expect(monitor.getStatus('echo')).to.equal('degraded');
        });

        it('should become unhealthy after consecutive failed probes', async () => {
            const { monitor } = await setup();

            monitor.recordProbe('echo', { reachable: false }, 'connection refused');
            monitor.recordProbe('echo', { reachable: false }, 'connection refused');
            expect(monitor.getStatus('echo')).to.equal('degraded');

            monitor.recordProbe('echo', { reachable: false }, 'connection refused');
            expect(monitor.getStatus('echo')).to.equal('unhealthy');
            expect(monitor.getRecord('echo')).to.include({
                consecutiveProbeFailures: 3,
                lastError: 'connection refused',
            });
        });

        it('should recover only after as many good probes in a row as the failure limit', async () => {
            const { monitor, events } = await setup();
            for (let i = 0; i < 3; i++) {
                monitor.recordProbe('echo', { reachable: false });
            }

            monitor.recordProbe('echo', { reachable: true, latencyMs: 5 });
            monitor.recordProbe('echo', { reachable: true, latencyMs: 5 });
            expect(monitor.getStatus('echo')).to.equal('unhealthy');
            expect(monitor.getRecord('echo')?.consecutiveProbeFailures).to.equal(0);

            monitor.recordProbe('echo', { reachable: true, latencyMs: 5 });
            expect(monitor.getStatus('echo')).to.equal('healthy');
            expect(events[events.length - 1]).to.include({
                from: 'unhealthy',
                to: 'healthy',
                reason: '3 consecutive good probes',
            });
        });

        it('should restart recovery after a slow probe', async () => {
            const { monitor } = await setup();
            monitor.recordProbe('echo', { reachable: true, latencyMs: 2500 });

            monitor.recordProbe('echo', { reachable: true, latencyMs: 5 });
            monitor.recordProbe('echo', { reachable: true, latencyMs: 5 });
            monitor.recordProbe('echo', { reachable: true, latencyMs: 2500 });
            monitor.recordProbe('echo', { reachable: true, latencyMs: 5 });
            monitor.recordProbe('echo', { reachable: true, latencyMs: 5 });
            expect(monitor.getStatus('echo')).to.equal('degraded');

            monitor.recordProbe('echo', { reachable: true, latencyMs: 5 });
            expect(monitor.getStatus('echo')).to.equal('healthy');
        });

        it('should publish the worse of traffic and probe signals', async () => {
            const { monitor } = await setup();
            record(monitor, 'echo', 'SSSSSSSFFF');

            monitor.recordProbe('echo', { reachable: true, latencyMs: 5 });

            const health = monitor.getRecord('echo');
            expect(health).to.include({ trafficStatus: 'degraded', probeStatus: 'healthy', status: 'degraded' });
        });

        it('should seed the probe signal only before the first probe', async () => {
            const { monitor } = await setup();

            expect(monitor.seedProbeStatus('echo', 'degraded')).to.equal(true);
            expect(monitor.getStatus('echo')).to.equal('degraded');
            expect(monitor.seedProbeStatus('echo', 'healthy')).to.equal(false);
            expect(monitor.seedProbeStatus('ghost', 'healthy')).to.equal(false);
        });
    });

    // =========================================================================
    // Snapshot
    // =========================================================================

    describe('buildSnapshot', () => {
        it('should score only classified plugins', async () => {
            const { monitor } = await setup({}, ['a', 'b']);
            record(monitor, 'a', 'S');

            const snapshot = monitor.buildSnapshot(QUEUE);

            expect(snapshot.status).to.equal('healthy');
            expect(snapshot.score).to.equal(1);
            expect(Object.keys(snapshot.plugins)).to.deep.equal(['a', 'b']);
            expect(snapshot.plugins.b.status).to.equal('unknown');
        });

        it('should weigh degraded plugins at one half', async () => {
            const { monitor } = await setup({}, ['a', 'b']);
            record(monitor, 'a', 'S');
            monitor.recordProbe('b', { reachable: true, latencyMs: 3000 });

            const snapshot = monitor.buildSnapshot(QUEUE);

            expect(snapshot.status).to.equal('degraded');
            expect(snapshot.score).to.equal(0.75);
        });

        it('should report score 1 and unknown status when nothing is classified', async () => {
            const { monitor } = await setup({}, []);

            const snapshot = monitor.buildSnapshot(QUEUE);

            expect(snapshot.status).to.equal('unknown');
            expect(snapshot.score).to.equal(1);
            expect(snapshot.plugins).to.deep.equal({});
        });

        it('should carry queue occupancy and outcome totals', async () => {
            const { monitor } = await setup();
            record(monitor, 'echo', 'SSF');
            monitor.recordOutcome(outcome('echo', 'timed_out', 'Timeout'));

            const snapshot = monitor.buildSnapshot(QUEUE);

            expect(snapshot.queue).to.deep.equal(QUEUE);
            expect(snapshot.totals).to.deep.equal({
                submitted: 12,
                succeeded: 2,
                failed: 1,
                timedOut: 1,
                rejected: 0,
            });
        });
    });
});

describe('combineHealth', () => {
    it('should ignore an unknown signal', () => {
        expect(combineHealth('unknown', 'degraded')).to.equal('degraded');
        expect(combineHealth('healthy', 'unknown')).to.equal('healthy');
        expect(combineHealth('unknown', 'unknown')).to.equal('unknown');
    });

    it('should pick the worse signal', () => {
        expect(combineHealth('healthy', 'unhealthy')).to.equal('unhealthy');
        expect(combineHealth('degraded', 'healthy')).to.equal('degraded');
    });
});
