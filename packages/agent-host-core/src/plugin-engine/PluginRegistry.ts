/**
 * Plugin Registry
 *
 * Owns plugin descriptors and their load/unload lifecycle. Registration is
 * visible to task resolution immediately; no restart is needed.
 */

import { EventEmitter } from 'events';
import type {
    AgentPlugin,
    PluginDescriptor,
    PluginRegistryEvent,
} from './types.js';
import { DuplicateNameError, NotFoundError, errorMessage } from '../errors.js';
import { withTimeout } from '../utils/TimeoutWrapper.js';
import { ConsoleLogger, type HostLogger } from '../utils/Logger.js';

// =============================================================================
// Descriptor Creation
// =============================================================================

export interface CreateDescriptorOptions {
    /** Registry key; defaults to the name the plugin identifies with */
    name?: string;
    /** Bound on initialize() + identify() */
    timeoutMs: number;
}

/**
 * Run a plugin's setup and identification under a timeout and build its
 * descriptor.
 */
export async function createDescriptor(
    instance: AgentPlugin,
    options: CreateDescriptorOptions
): Promise<PluginDescriptor> {
    const label = `Plugin '${options.name ?? 'anonymous'}' identify`;
    const identity = await withTimeout(async () => {
        await instance.initialize?.();
        return instance.identify();
    }, options.timeoutMs, label);

    const name = options.name ?? identity.name;
    if (!name) {
        throw new Error('Plugin name must not be empty');
    }

    return {
        name,
        version: identity.version,
        capabilities: new Set(instance.describeCapabilities()),
        instance,
        registeredAt: Date.now(),
    };
}

// =============================================================================
// Plugin Registry
// =============================================================================

export class PluginRegistry extends EventEmitter {
    private descriptors: Map<string, PluginDescriptor> = new Map();
    private logger: HostLogger;

    constructor(logger?: HostLogger) {
        super();
        this.logger = logger ?? new ConsoleLogger('PluginRegistry');
    }

    /**
     * Store a descriptor
     * @throws DuplicateNameError if a plugin with the same name is registered
     */
    register(descriptor: PluginDescriptor): PluginDescriptor {
        if (this.descriptors.has(descriptor.name)) {
            throw new DuplicateNameError(descriptor.name);
        }

        this.descriptors.set(descriptor.name, descriptor);
        this.logger.info(
            `Registered plugin: ${descriptor.name}@${descriptor.version} ` +
            `(${[...descriptor.capabilities].join(', ') || 'no capabilities'})`
        );
        this.emitEvent({ type: 'plugin:registered', descriptor });

        return descriptor;
    }

    /**
     * Remove a plugin and shut it down. The descriptor is removed before the
     * shutdown is awaited, so new tasks stop resolving to it right away; tasks
     * already dispatched to it are left to finish.
     * @throws NotFoundError if no plugin has that name
     */
    async unregister(name: string): Promise<PluginDescriptor> {
        const descriptor = this.descriptors.get(name);
        if (!descriptor) {
            throw new NotFoundError(name);
        }

        this.descriptors.delete(name);
        this.emitEvent({ type: 'plugin:unregistered', descriptor });

        try {
            await descriptor.instance.shutDown();
        } catch (error) {
            this.logger.warn(`Plugin '${name}' failed to shut down cleanly: ${errorMessage(error)}`);
        }

        this.logger.info(`Unregistered plugin: ${name}`);
        return descriptor;
    }

    /**
     * Names of the plugins whose capabilities contain the task type, in
     * registration order. Empty when nothing handles it.
     */
    resolve(taskType: string): string[] {
        const names: string[] = [];
        this.descriptors.forEach((descriptor, name) => {
            if (descriptor.capabilities.has(taskType)) {
                names.push(name);
            }
        });
        return names;
    }

    /**
     * Lazy, restartable sequence of descriptors. Each iteration walks the
     * descriptors registered when that iteration started.
     */
    list(): Iterable<PluginDescriptor> {
        const descriptors = this.descriptors;
        return {
            *[Symbol.iterator]() {
                yield* [...descriptors.values()];
            },
        };
    }

    get(name: string): PluginDescriptor | undefined {
        return this.descriptors.get(name);
    }

    has(name: string): boolean {
        return this.descriptors.has(name);
    }

    names(): string[] {
        return [...this.descriptors.keys()];
    }

    get size(): number {
        return this.descriptors.size;
    }

    private emitEvent(event: PluginRegistryEvent): void {
        this.emit(event.type, event);
    }
}
