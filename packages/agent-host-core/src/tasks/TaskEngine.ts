/**
 * Task Engine
 *
 * Accepts tasks, resolves each to one plugin and runs it on a bounded worker
 * pool under a per-task timeout. Every accepted task ends in exactly one
 * outcome, which is recorded in the health monitor and handed back to the
 * caller.
 */

import { EventEmitter } from 'events';
import PQueue from 'p-queue';
import { randomUUID } from 'crypto';
import {
    TASK_PRIORITY_ORDER,
    type PluginDescriptor,
    type PluginRegistryEvent,
    type QueueStats,
    type Task,
    type TaskErrorDetail,
    type TaskInput,
    type TaskOutcome,
    type TaskStatus,
} from '../plugin-engine/types.js';
import type { PluginRegistry } from '../plugin-engine/PluginRegistry.js';
import type { HealthMonitor } from '../health/HealthMonitor.js';
import type { HostConfig, RetryPolicy } from '../config/HostConfig.js';
import {
    BackpressureError,
    NoHandlerError,
    NotAcceptingError,
    PluginTimeoutError,
    errorMessage,
    toPluginError,
} from '../errors.js';
import { PluginSelector } from './PluginSelector.js';
import { retryDelay, shouldRetry } from './RetryPolicy.js';
import { delay, withTimeout } from '../utils/TimeoutWrapper.js';
import { ConsoleLogger, type HostLogger } from '../utils/Logger.js';

// =============================================================================
// Types
// =============================================================================

export type TaskEngineConfig = Pick<
    HostConfig,
    'workerPoolSize' | 'taskQueueCapacity' | 'taskTimeoutMs' | 'retryPolicy' | 'strictHealth'
>;

export interface TaskEngineOptions {
    logger?: HostLogger;
    /** Parent of the per-plugin loggers handed to execute() */
    pluginLogger?: HostLogger;
    /** Outcomes kept for getOutcome() (default: 1000) */
    maxRetainedOutcomes?: number;
}

/**
 * A dispatched task and its eventual outcome
 */
export interface TaskHandle {
    task: Task;
    outcome: Promise<TaskOutcome>;
}

/**
 * Outcomes of every attempt of a retried task, first attempt first
 */
export interface RetryChain {
    outcomes: TaskOutcome[];
    final: TaskOutcome;
}

/**
 * Where a task currently is
 */
export type TaskState = 'waiting' | 'running' | TaskStatus;

export type TaskEngineEvent =
    | { type: 'task:accepted'; task: Task; plugin: string }
    | { type: 'task:started'; task: Task; plugin: string }
    | { type: 'task:completed'; task: Task; outcome: TaskOutcome };

interface TrackedTask {
    task: Task;
    descriptor: PluginDescriptor;
    controller: AbortController;
    state: 'waiting' | 'running';
    dispatchedAt: number;
    startedAt?: number;
    finalized: boolean;
    settle: (outcome: TaskOutcome) => void;
}

type OutcomeDetail = { result?: unknown; error?: TaskErrorDetail };

const CANCELLED: TaskErrorDetail = { code: 'Cancelled', message: 'Task cancelled during shutdown' };

function evictOldest<K, V>(map: Map<K, V>, max: number): void {
    for (const key of map.keys()) {
        if (map.size <= max) break;
        map.delete(key);
    }
}

// =============================================================================
// Task Engine
// =============================================================================

export class TaskEngine extends EventEmitter {
    private queue: PQueue;
    private selector: PluginSelector;
    private logger: HostLogger;
    private pluginLogger: HostLogger;
    private maxRetainedOutcomes: number;

    // Accepted tasks without an outcome
    private active: Map<string, TrackedTask> = new Map();
    // Recent tasks and outcomes, oldest first
    private tasks: Map<string, Task> = new Map();
    private outcomes: Map<string, TaskOutcome> = new Map();

    private waiting = 0;
    private running = 0;
    private accepted = 0;
    private accepting = true;

    constructor(
        private registry: PluginRegistry,
        private monitor: HealthMonitor,
        private config: TaskEngineConfig,
        options: TaskEngineOptions = {}
    ) {
        super();
        this.queue = new PQueue({ concurrency: config.workerPoolSize });
        this.selector = new PluginSelector(monitor, config.strictHealth);
        this.logger = options.logger ?? new ConsoleLogger('TaskEngine');
        this.pluginLogger = options.pluginLogger ?? new ConsoleLogger('plugin');
        this.maxRetainedOutcomes = options.maxRetainedOutcomes ?? 1000;

        registry.on('plugin:unregistered', this.onUnregistered);
    }

    dispose(): void {
        this.registry.off('plugin:unregistered', this.onUnregistered);
    }

    private onUnregistered = (event: PluginRegistryEvent): void => {
        this.selector.forget(event.descriptor.name);
    };

    // =========================================================================
    // Submission
    // =========================================================================

    /**
     * Accept a task without waiting for it. Rejections are thrown before any
     * state changes.
     * @throws NotAcceptingError, NoHandlerError, BackpressureError, NoHealthyHandlerError
     */
    dispatch(input: TaskInput): TaskHandle {
        return this.admit(input, 1);
    }

    /**
     * Accept a task and wait for its outcome
     */
    async submit(input: TaskInput): Promise<TaskOutcome> {
        return this.dispatch(input).outcome;
    }

    /**
     * Submit a task and retry retryable failures as new tasks, waiting with
     * exponential backoff between attempts. A rejection on a retry attempt is
     * thrown.
     */
    async submitWithRetry(input: TaskInput, policy: RetryPolicy = this.config.retryPolicy): Promise<RetryChain> {
        const outcomes: TaskOutcome[] = [];
        let handle = this.dispatch(input);

        for (;;) {
            const outcome = await handle.outcome;
            outcomes.push(outcome);
            if (!shouldRetry(outcome, policy)) {
                return { outcomes, final: outcome };
            }

            const wait = retryDelay(outcome.attempt, policy);
            this.logger.info(
                `Retrying task ${outcome.taskId} after ${outcome.error?.code ?? outcome.status} ` +
                `in ${wait}ms (attempt ${outcome.attempt + 1}/${policy.maxAttempts})`
            );
            await delay(wait);
            handle = this.admit(input, outcome.attempt + 1, outcome.taskId);
        }
    }

    private admit(input: TaskInput, attempt: number, retryOf?: string): TaskHandle {
        if (!this.accepting) {
            throw new NotAcceptingError('draining');
        }

        const candidates = this.registry.resolve(input.type);
        if (candidates.length === 0) {
            throw new NoHandlerError(input.type);
        }

        if (this.waiting + this.running >= this.config.workerPoolSize + this.config.taskQueueCapacity) {
            throw new BackpressureError(this.config.taskQueueCapacity);
        }

        const plugin = this.selector.select(input.type, candidates);
        const descriptor = this.registry.get(plugin);
        if (!descriptor) {
            throw new NoHandlerError(input.type);
        }

        const task: Task = Object.freeze({
            id: randomUUID(),
            type: input.type,
            payload: input.payload,
            submittedAt: Date.now(),
            priority: input.priority ?? 'normal',
            attempt,
            retryOf,
        });

        let settle: (outcome: TaskOutcome) => void = () => {};
        const outcome = new Promise<TaskOutcome>((resolve) => {
            settle = resolve;
        });

        const tracked: TrackedTask = {
            task,
            descriptor,
            controller: new AbortController(),
            state: 'waiting',
            dispatchedAt: Date.now(),
            finalized: false,
            settle,
        };

        this.active.set(task.id, tracked);
        this.tasks.set(task.id, task);
        evictOldest(this.tasks, this.maxRetainedOutcomes);
        this.waiting++;
        this.accepted++;

        this.logger.debug(`Accepted task ${task.id} (${task.type}) for '${plugin}'`);
        this.emitEvent({ type: 'task:accepted', task, plugin });

        this.queue
            .add(() => this.run(tracked), { priority: TASK_PRIORITY_ORDER[task.priority] })
            .catch((error: unknown) => {
                this.logger.error(`Worker failed on task ${task.id}: ${errorMessage(error)}`);
            });

        return { task, outcome };
    }

    // =========================================================================
    // Execution
    // =========================================================================

    private async run(tracked: TrackedTask): Promise<void> {
        if (tracked.finalized) return;

        const { task, descriptor, controller } = tracked;
        tracked.state = 'running';
        tracked.startedAt = Date.now();
        this.waiting--;
        this.running++;
        this.emitEvent({ type: 'task:started', task, plugin: descriptor.name });

        const context = {
            signal: controller.signal,
            log: this.pluginLogger.child(descriptor.name),
        };

        // Settles only when the task is aborted
        const aborted = new Promise<never>((_, reject) => {
            controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
        });

        const label = `Task ${task.id} on '${descriptor.name}'`;
        const timeoutMs = this.config.taskTimeoutMs;

        try {
            const result = await Promise.race([
                withTimeout(
                    () => descriptor.instance.execute(task, context),
                    timeoutMs,
                    label,
                    () => controller.abort(new PluginTimeoutError(`${label} timed out after ${timeoutMs}ms`))
                ),
                aborted,
            ]);
            this.finalize(tracked, 'succeeded', { result });
        } catch (error) {
            const pluginError = toPluginError(error);
            this.finalize(tracked, pluginError.code === 'Timeout' ? 'timed_out' : 'failed', {
                error: { code: pluginError.code, message: pluginError.message },
            });
        } finally {
            this.running--;
        }
    }

    /**
     * Produce the single outcome of a task; later calls are ignored
     */
    private finalize(tracked: TrackedTask, status: TaskStatus, detail: OutcomeDetail): void {
        if (tracked.finalized) return;
        tracked.finalized = true;

        const { task, descriptor } = tracked;
        const now = Date.now();
        const outcome: TaskOutcome = Object.freeze({
            taskId: task.id,
            type: task.type,
            plugin: descriptor.name,
            status,
            ...detail,
            durationMs: now - tracked.dispatchedAt,
            executionMs: tracked.startedAt !== undefined ? now - tracked.startedAt : 0,
            completedAt: now,
            attempt: task.attempt,
            retryOf: task.retryOf,
        });

        this.active.delete(task.id);
        this.outcomes.set(task.id, outcome);
        evictOldest(this.outcomes, this.maxRetainedOutcomes);

        if (status === 'succeeded') {
            this.logger.debug(`Task ${task.id} succeeded on '${descriptor.name}' in ${outcome.durationMs}ms`);
        } else {
            this.logger.warn(
                `Task ${task.id} ${status} on '${descriptor.name}': ${outcome.error?.message ?? status}`
            );
        }

        // The caller gets its outcome even if a listener below throws
        tracked.settle(outcome);

        try {
            this.monitor.recordOutcome(outcome);
        } catch (error) {
            this.logger.error(`Recording the outcome of task ${task.id} failed: ${errorMessage(error)}`);
        }
        try {
            this.emitEvent({ type: 'task:completed', task, outcome });
        } catch (error) {
            this.logger.error(`A task:completed listener failed for task ${task.id}: ${errorMessage(error)}`);
        }
    }

    // =========================================================================
    // Shutdown
    // =========================================================================

    /**
     * Refuse new submissions; accepted tasks keep running
     */
    stopAccepting(): void {
        if (this.accepting) {
            this.accepting = false;
            this.logger.info('Stopped accepting tasks');
        }
    }

    /**
     * Stop accepting and wait for accepted tasks, up to the grace period
     * @returns true if every accepted task finished in time
     */
    async drain(gracePeriodMs: number): Promise<boolean> {
        this.stopAccepting();
        if (this.active.size === 0) return true;

        this.logger.info(`Draining ${this.active.size} task(s), grace period ${gracePeriodMs}ms`);
        let timer: NodeJS.Timeout | undefined;
        const expired = new Promise<boolean>((resolve) => {
            timer = setTimeout(() => resolve(false), gracePeriodMs);
        });

        try {
            return await Promise.race([this.queue.onIdle().then(() => true), expired]);
        } finally {
            clearTimeout(timer);
        }
    }

    /**
     * Force-cancel every accepted task: waiting ones end rejected, running ones
     * are aborted and end failed, both with code Cancelled
     * @returns Number of cancelled tasks
     */
    cancelAll(): number {
        const pending = [...this.active.values()];
        this.queue.clear();

        for (const tracked of pending) {
            if (tracked.state === 'waiting') {
                this.waiting--;
                this.finalize(tracked, 'rejected', { error: CANCELLED });
            } else {
                this.finalize(tracked, 'failed', { error: CANCELLED });
                tracked.controller.abort(new Error(CANCELLED.message));
            }
        }

        if (pending.length > 0) {
            this.logger.warn(`Cancelled ${pending.length} task(s)`);
        }
        return pending.length;
    }

    // =========================================================================
    // Queries
    // =========================================================================

    getOutcome(taskId: string): TaskOutcome | undefined {
        return this.outcomes.get(taskId);
    }

    getTask(taskId: string): Task | undefined {
        return this.tasks.get(taskId);
    }

    getTaskState(taskId: string): TaskState | undefined {
        return this.active.get(taskId)?.state ?? this.outcomes.get(taskId)?.status;
    }

    getQueueStats(): QueueStats {
        return {
            waiting: this.waiting,
            running: this.running,
            capacity: this.config.taskQueueCapacity,
            workerPoolSize: this.config.workerPoolSize,
            utilization: this.running / this.config.workerPoolSize,
            accepted: this.accepted,
            accepting: this.accepting,
        };
    }

    get isAccepting(): boolean {
        return this.accepting;
    }

    private emitEvent(event: TaskEngineEvent): void {
        this.emit(event.type, event);
    }
}
