/**
 * Plugin System Type Definitions
 *
 * The capability contract every plugin implements, plus the task and outcome
 * records exchanged between the task engine and plugins.
 */

import type { ErrorCode } from '../errors.js';
import type { HostLogger } from '../utils/Logger.js';

// =============================================================================
// Task Types
// =============================================================================

/**
 * Task priority; higher priorities leave the queue first
 */
export type TaskPriority = 'low' | 'normal' | 'high' | 'critical';

export const TASK_PRIORITY_ORDER: Record<TaskPriority, number> = {
    low: 0,
    normal: 1,
    high: 2,
    critical: 3,
};

/**
 * A unit of work. Frozen once created by the task engine.
 */
export interface Task<TPayload = unknown> {
    /** Generated at submission */
    readonly id: string;
    /** Selects the target plugin through its capabilities */
    readonly type: string;
    readonly payload: TPayload;
    readonly submittedAt: number;
    readonly priority: TaskPriority;
    /** 1 for a first submission, n for the n-th retry attempt */
    readonly attempt: number;
    /** Task this one retries */
    readonly retryOf?: string;
}

/**
 * What a caller hands to submit()/dispatch()
 */
export interface TaskInput<TPayload = unknown> {
    type: string;
    payload: TPayload;
    priority?: TaskPriority;
}

/**
 * Terminal status of a task
 * - succeeded: execute() returned
 * - failed: execute() threw, or the task was cancelled while running
 * - timed_out: the task timeout fired or the plugin reported a timeout
 * - rejected: the task was cancelled before it started
 */
export type TaskStatus = 'succeeded' | 'failed' | 'timed_out' | 'rejected';

export interface TaskErrorDetail {
    code: ErrorCode;
    message: string;
}

/**
 * The single terminal record of a task. Frozen once created.
 */
export interface TaskOutcome<TResult = unknown> {
    readonly taskId: string;
    readonly type: string;
    /** Plugin the task was dispatched to */
    readonly plugin: string;
    readonly status: TaskStatus;
    readonly result?: TResult;
    readonly error?: TaskErrorDetail;
    /** Time from dispatch to completion, queue wait included */
    readonly durationMs: number;
    /** Time spent inside execute(); 0 when the task never started */
    readonly executionMs: number;
    readonly completedAt: number;
    readonly attempt: number;
    readonly retryOf?: string;
}

// =============================================================================
// Plugin Contract
// =============================================================================

export interface PluginIdentity {
    name: string;
    version: string;
}

/**
 * Lightweight self-report used by periodic probing
 */
export interface ProbeReport {
    reachable: boolean;
    latencyMs?: number;
}

/**
 * Context passed to execute()
 */
export interface ExecutionContext {
    /** Aborted when the task times out or is force-cancelled */
    signal: AbortSignal;
    /** Logger tagged with the plugin name */
    log: HostLogger;
}

/**
 * Interface that all plugins must implement
 */
export interface AgentPlugin {
    /**
     * Name and version, stable for the plugin's lifetime
     */
    identify(): PluginIdentity | Promise<PluginIdentity>;

    /**
     * Execute a task. Resolve with the result payload or reject with one of the
     * plugin errors (InvalidPayloadError, UpstreamUnavailableError,
     * PluginTimeoutError, InternalFaultError). Anything else thrown becomes an
     * InternalFault.
     */
    execute(task: Task, context: ExecutionContext): Promise<unknown>;

    /**
     * Task types this plugin handles
     */
    describeCapabilities(): readonly string[];

    /**
     * Self-report for health probes. Must return quickly; the host bounds it
     * with a timeout and treats a timeout as unreachable.
     */
    checkHealth(): Promise<ProbeReport>;

    /**
     * Release held resources. Must be idempotent.
     */
    shutDown(): Promise<void>;

    /**
     * Optional one-time setup, awaited before the plugin becomes visible.
     */
    initialize?(): Promise<void>;
}

// =============================================================================
// Registry Types
// =============================================================================

/**
 * Registered plugin. Only the registry creates and removes descriptors.
 */
export interface PluginDescriptor {
    readonly name: string;
    readonly version: string;
    readonly capabilities: ReadonlySet<string>;
    readonly instance: AgentPlugin;
    readonly registeredAt: number;
}

/**
 * Plugin registry events
 */
export type PluginRegistryEvent =
    | { type: 'plugin:registered'; descriptor: PluginDescriptor }
    | { type: 'plugin:unregistered'; descriptor: PluginDescriptor };

// =============================================================================
// Engine Status Types
// =============================================================================

/**
 * Worker pool and queue occupancy
 */
export interface QueueStats {
    /** Accepted tasks waiting for a worker */
    waiting: number;
    /** Tasks currently executing */
    running: number;
    /** Waiting tasks allowed before submissions are rejected */
    capacity: number;
    workerPoolSize: number;
    /** running / workerPoolSize */
    utilization: number;
    /** Tasks accepted since start */
    accepted: number;
    /** Whether new submissions are accepted */
    accepting: boolean;
}
