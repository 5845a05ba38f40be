/**
 * Agent Host Errors
 *
 * Registry and engine errors are thrown to the caller of the offending
 * operation. Plugin errors are thrown by plugins from `execute()` and end up
 * as the error detail of a task outcome.
 */

export type HostErrorCode =
    | 'DuplicateName'
    | 'NotFound'
    | 'NoHandler'
    | 'NoHealthyHandler'
    | 'Backpressure'
    | 'NotAccepting'
    | 'InitializationError'
    | 'ConfigError';

export type PluginErrorCode =
    | 'InvalidPayload'
    | 'UpstreamUnavailable'
    | 'Timeout'
    | 'InternalFault';

/** Codes that only appear in outcomes of cancelled tasks */
export type CancellationCode = 'Cancelled';

export type ErrorCode = HostErrorCode | PluginErrorCode | CancellationCode;

// =============================================================================
// Host Errors
// =============================================================================

export class AgentHostError extends Error {
    constructor(
        message: string,
        public readonly code: HostErrorCode,
        options?: ErrorOptions
    ) {
        super(message, options);
        this.name = 'AgentHostError';
    }
}

export class DuplicateNameError extends AgentHostError {
    constructor(public readonly pluginName: string) {
        super(`Plugin '${pluginName}' is already registered`, 'DuplicateName');
        this.name = 'DuplicateNameError';
    }
}

export class NotFoundError extends AgentHostError {
    constructor(public readonly pluginName: string) {
        super(`Plugin '${pluginName}' not found`, 'NotFound');
        this.name = 'NotFoundError';
    }
}

export class NoHandlerError extends AgentHostError {
    constructor(public readonly taskType: string) {
        super(`No plugin handles task type '${taskType}'`, 'NoHandler');
        this.name = 'NoHandlerError';
    }
}

export class NoHealthyHandlerError extends AgentHostError {
    constructor(
        public readonly taskType: string,
        public readonly candidates: string[]
    ) {
        super(
            `Every plugin handling '${taskType}' is unhealthy: ${candidates.join(', ')}`,
            'NoHealthyHandler'
        );
        this.name = 'NoHealthyHandlerError';
    }
}

export class BackpressureError extends AgentHostError {
    constructor(public readonly capacity: number) {
        super(`Task queue is full (capacity ${capacity})`, 'Backpressure');
        this.name = 'BackpressureError';
    }
}

export class NotAcceptingError extends AgentHostError {
    constructor(public readonly state: string) {
        super(`Not accepting tasks while ${state}`, 'NotAccepting');
        this.name = 'NotAcceptingError';
    }
}

export class InitializationError extends AgentHostError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'InitializationError', options);
        this.name = 'InitializationError';
    }
}

export class ConfigError extends AgentHostError {
    constructor(
        message: string,
        public readonly source?: string,
        options?: ErrorOptions
    ) {
        super(source ? `${message} (source: ${source})` : message, 'ConfigError', options);
        this.name = 'ConfigError';
    }
}

// =============================================================================
// Plugin Errors
// =============================================================================

export class PluginError extends Error {
    constructor(
        message: string,
        public readonly code: PluginErrorCode,
        options?: ErrorOptions
    ) {
        super(message, options);
        this.name = 'PluginError';
    }
}

export class InvalidPayloadError extends PluginError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'InvalidPayload', options);
        this.name = 'InvalidPayloadError';
    }
}

export class UpstreamUnavailableError extends PluginError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'UpstreamUnavailable', options);
        this.name = 'UpstreamUnavailableError';
    }
}

export class PluginTimeoutError extends PluginError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'Timeout', options);
        this.name = 'PluginTimeoutError';
    }
}

export class InternalFaultError extends PluginError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'InternalFault', options);
        this.name = 'InternalFaultError';
    }
}

/**
 * Normalize anything a plugin threw into a typed plugin error
 */
export function toPluginError(error: unknown): PluginError {
    if (error instanceof PluginError) {
        return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new InternalFaultError(message, { cause: error });
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
