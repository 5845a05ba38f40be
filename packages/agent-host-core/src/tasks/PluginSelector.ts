/**
 * Plugin Selector
 *
 * Picks one plugin among the candidates for a task type. Candidates are
 * grouped by health (healthy, then unknown or degraded, then unhealthy) and
 * the least recently used plugin of the best non-empty group wins.
 */

import { NoHealthyHandlerError } from '../errors.js';
import type { HealthMonitor } from '../health/HealthMonitor.js';
import type { HealthStatus } from '../health/types.js';

const SELECTION_TIER: Record<HealthStatus, number> = {
    healthy: 0,
    unknown: 1,
    degraded: 1,
    unhealthy: 2,
};

export class PluginSelector {
    // Plugin name -> selection sequence; absent means never used
    private lastUsed: Map<string, number> = new Map();
    private sequence = 0;

    constructor(
        private monitor: HealthMonitor,
        private strictHealth: boolean
    ) {}

    /**
     * Select and stamp a plugin
     * @param candidates - Names in registration order, at least one
     * @throws NoHealthyHandlerError under strict health when all candidates are unhealthy
     */
    select(taskType: string, candidates: readonly string[]): string {
        const ranked = candidates.map((name, order) => ({
            name,
            order,
            tier: SELECTION_TIER[this.monitor.getStatus(name)],
            lastUsed: this.lastUsed.get(name) ?? -1,
        }));

        const bestTier = Math.min(...ranked.map(candidate => candidate.tier));
        if (bestTier === SELECTION_TIER.unhealthy && this.strictHealth) {
            throw new NoHealthyHandlerError(taskType, [...candidates]);
        }

        const tier = ranked.filter(candidate => candidate.tier === bestTier);
        if (bestTier === SELECTION_TIER.unhealthy) {
            // Least bad first
            tier.sort((a, b) =>
                this.failureRate(a.name) - this.failureRate(b.name)
                || a.lastUsed - b.lastUsed
                || a.order - b.order
            );
        } else {
            tier.sort((a, b) => a.lastUsed - b.lastUsed || a.order - b.order);
        }

        const chosen = tier[0].name;
        this.lastUsed.set(chosen, this.sequence++);
        return chosen;
    }

    /**
     * Drop usage history of an unloaded plugin
     */
    forget(name: string): void {
        this.lastUsed.delete(name);
    }

    private failureRate(name: string): number {
        return this.monitor.getRecord(name)?.failureRate ?? 0;
    }
}
