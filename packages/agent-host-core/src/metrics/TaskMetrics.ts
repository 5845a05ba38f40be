/**
 * Task metrics tracker
 * Keeps running statistics over task outcomes: per-plugin timing, totals per
 * status and a bounded history of recent outcomes and failures.
 */

import type { TaskOutcome, TaskStatus } from '../plugin-engine/types.js';

export interface TimingStats {
  total: number;
  count: number;
  average: number;
  min: number;
  max: number;
}

export interface FailedTaskEntry {
  taskId: string;
  plugin: string;
  type: string;
  status: TaskStatus;
  reason: string;
  timestamp: number;
}

export type OutcomeTotals = Record<TaskStatus, number> & { completed: number };

export interface TaskMetricsData {
  totals: OutcomeTotals;
  pluginExecutionTimes: Record<string, TimingStats>;
  recentOutcomes: TaskOutcome[];
  recentFailures: FailedTaskEntry[];
  uptime: number;
  startTime: number;
  lastActivityTime: number;
  tasksPerSecond: number;
}

interface RunningStats {
  sum: number;
  count: number;
  min: number;
  max: number;
}

function emptyTotals(): OutcomeTotals {
  return { completed: 0, succeeded: 0, failed: 0, timed_out: 0, rejected: 0 };
}

function toTimingStats(stats: RunningStats): TimingStats {
  return {
    total: stats.sum,
    count: stats.count,
    average: stats.count > 0 ? stats.sum / stats.count : 0,
    min: stats.min === Infinity ? 0 : stats.min,
    max: stats.max
  };
}

export class TaskMetrics {
  private readonly startTime: number;
  private lastActivityTime: number;

  private readonly totals: OutcomeTotals = emptyTotals();

  // Per-plugin execution time, tasks that never started excluded
  private readonly pluginTimings: Record<string, RunningStats> = {};

  private readonly recentOutcomes: TaskOutcome[] = [];
  private recentFailures: FailedTaskEntry[] = [];

  constructor(
    private maxRecentEntries: number = 100,
    private maxFailureHistory: number = 50
  ) {
    this.startTime = Date.now();
    this.lastActivityTime = this.startTime;
  }

  /**
   * Record a task outcome
   */
  recordOutcome(outcome: TaskOutcome): void {
    this.totals[outcome.status]++;
    this.totals.completed++;

    if (outcome.status !== 'rejected') {
      if (!this.pluginTimings[outcome.plugin]) {
        this.pluginTimings[outcome.plugin] = { sum: 0, count: 0, min: Infinity, max: 0 };
      }
      const stats = this.pluginTimings[outcome.plugin];
      stats.sum += outcome.executionMs;
      stats.count++;
      stats.min = Math.min(stats.min, outcome.executionMs);
      stats.max = Math.max(stats.max, outcome.executionMs);
    }

    this.recentOutcomes.push(outcome);
    if (this.recentOutcomes.length > this.maxRecentEntries) {
      this.recentOutcomes.shift();
    }

    if (outcome.status !== 'succeeded') {
      // Most recent first
      this.recentFailures.unshift({
        taskId: outcome.taskId,
        plugin: outcome.plugin,
        type: outcome.type,
        status: outcome.status,
        reason: outcome.error?.message ?? outcome.status,
        timestamp: outcome.completedAt
      });
      if (this.recentFailures.length > this.maxFailureHistory) {
        this.recentFailures = this.recentFailures.slice(0, this.maxFailureHistory);
      }
    }

    this.lastActivityTime = Date.now();
  }

  /**
   * Get timing stats for a specific plugin
   * @returns Plugin timing stats or null if no data
   */
  getPluginTiming(plugin: string): TimingStats | null {
    const stats = this.pluginTimings[plugin];
    if (!stats || stats.count === 0) {
      return null;
    }
    return toTimingStats(stats);
  }

  getTotals(): OutcomeTotals {
    return { ...this.totals };
  }

  /**
   * Most recent outcomes, oldest first
   */
  getRecentOutcomes(limit?: number): TaskOutcome[] {
    return limit === undefined ? [...this.recentOutcomes] : this.recentOutcomes.slice(-limit);
  }

  getMetrics(): TaskMetricsData {
    const uptime = Date.now() - this.startTime;

    return {
      totals: this.getTotals(),
      pluginExecutionTimes: Object.fromEntries(
        Object.entries(this.pluginTimings).map(([plugin, stats]) => [plugin, toTimingStats(stats)])
      ),
      recentOutcomes: this.getRecentOutcomes(20),
      recentFailures: [...this.recentFailures],
      uptime,
      startTime: this.startTime,
      lastActivityTime: this.lastActivityTime,
      tasksPerSecond: uptime > 0 ? this.totals.completed / (uptime / 1000) : 0
    };
  }
}
