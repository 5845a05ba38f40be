import {envConfig} from "./config/EnvConfig.js";
import {getEnabledPlugins, resolveHostConfig} from "./config/ConfigParser.js";
import {AgentHost, type PluginSpec} from "./orchestrator/AgentHost.js";
import {BUILTIN_PLUGINS} from "./plugins/index.js";
import {ConsoleLogger} from "./utils/Logger.js";
import {errorMessage} from "./errors.js";

const logger = new ConsoleLogger('Startup', envConfig.LOG_LEVEL);

console.log(`BUILD_VERSION: ${process.env.BUILD_VERSION || 'dev'}`);

let host: AgentHost | null = null;

// Global error handlers: log and keep running
process.on('uncaughtException', (error: Error) => {
    console.error('[CRITICAL] Uncaught Exception:', error);
    console.error('Stack:', error.stack);
});

process.on('unhandledRejection', (reason: unknown) => {
    console.error('[CRITICAL] Unhandled Rejection:', reason);
});

// Graceful shutdown
const shutdown = async (signal: string) => {
    console.log(`\n[Shutdown] Received ${signal}, shutting down...`);
    if (host) {
        await host.shutdown();
    }
    process.exit(0);
};

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
        shutdown(signal).catch((error: unknown) => {
            console.error('[Shutdown] Failed:', error);
            process.exit(1);
        });
    });
}

(async () => {
    try {
        const {config, plugins} = await resolveHostConfig(envConfig);

        const specs: PluginSpec[] = [];
        for (const {name, config: pluginConfig} of getEnabledPlugins(plugins)) {
            const factory = BUILTIN_PLUGINS[name];
            if (!factory) {
                logger.warn(`No built-in plugin named '${name}', skipping`);
                continue;
            }
            specs.push({name, factory: () => factory(pluginConfig)});
        }

        host = new AgentHost({logLevel: envConfig.LOG_LEVEL});
        await host.initialize(config, specs);
        host.start();

        logger.info(
            `Agent ${host.agentId} running: ${config.workerPoolSize} workers, ` +
            `queue capacity ${config.taskQueueCapacity}, probing every ${config.probeIntervalMs}ms`
        );
        await host.runForever();
        logger.info('Stopped');
    } catch (error) {
        logger.error(`Failed to start: ${errorMessage(error)}`);
        process.exit(1);
    }
})();
