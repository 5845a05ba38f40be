/**
 * Public API of the agent host
 */

export * from './errors.js';
export * from './plugin-engine/types.js';
export { BasePlugin } from './plugin-engine/BasePlugin.js';
export { PluginRegistry, createDescriptor, type CreateDescriptorOptions } from './plugin-engine/PluginRegistry.js';
export * from './health/types.js';
export { HealthMonitor, combineHealth, type HealthMonitorConfig, type HealthMonitorOptions } from './health/HealthMonitor.js';
export { HealthProber, type HealthProberConfig } from './health/HealthProber.js';
export { TaskMetrics, type TaskMetricsData, type TimingStats, type OutcomeTotals } from './metrics/TaskMetrics.js';
export {
    TaskEngine,
    type TaskEngineConfig,
    type TaskEngineEvent,
    type TaskEngineOptions,
    type TaskHandle,
    type TaskState,
    type RetryChain,
} from './tasks/TaskEngine.js';
export { PluginSelector } from './tasks/PluginSelector.js';
export { RETRYABLE_CODES, retryDelay, shouldRetry } from './tasks/RetryPolicy.js';
export * from './orchestrator/AgentHost.js';
export { StateStore, parseHostState, type HostStateSnapshot, type PluginStateEntry } from './orchestrator/StateStore.js';
export * from './config/HostConfig.js';
export * from './config/ConfigParser.js';
export { readEnvConfig, envToHostConfig, type EnvConfig } from './config/EnvConfig.js';
export { BUILTIN_PLUGINS, EchoPlugin, createEchoPlugin, type EchoPluginOptions, type PluginFactory } from './plugins/index.js';
export { ConsoleLogger, silentLogger, type HostLogger, type LogLevel } from './utils/Logger.js';
export { withTimeout, calculateBackoff, delay, type BackoffConfig } from './utils/TimeoutWrapper.js';
