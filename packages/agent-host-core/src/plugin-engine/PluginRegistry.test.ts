/**
 * Plugin Registry Unit Tests
 */

import { expect } from 'chai';

import { PluginRegistry, createDescriptor } from './PluginRegistry.js';
import { BasePlugin } from './BasePlugin.js';
import type { AgentPlugin, PluginDescriptor, PluginIdentity, PluginRegistryEvent, Task } from './types.js';
import { DuplicateNameError, NotFoundError, PluginTimeoutError } from '../errors.js';
import { silentLogger } from '../utils/Logger.js';
import { ScriptedPlugin, captureRejection, captureThrow } from '../testing/TestPlugins.js';

// =============================================================================
// Test Helpers
// =============================================================================

async function descriptorFor(name: string, capabilities: string[]): Promise<PluginDescriptor> {
    return createDescriptor(new ScriptedPlugin(name, capabilities), { timeoutMs: 1000 });
}

class FailingShutdownPlugin extends ScriptedPlugin {
    protected async onShutDown(): Promise<void> {
        throw new Error('socket already closed');
    }
}

// =============================================================================
// createDescriptor
// =============================================================================

describe('createDescriptor', () => {
    it('should build a descriptor from identify() and describeCapabilities()', async () => {
        const descriptor = await createDescriptor(
            new ScriptedPlugin('search', ['query', 'index'], undefined, '2.1.0'),
            { timeoutMs: 1000 }
        );

        expect(descriptor.name).to.equal('search');
        expect(descriptor.version).to.equal('2.1.0');
        expect([...descriptor.capabilities]).to.deep.equal(['query', 'index']);
    });

    it('should prefer the given name over the identified one', async () => {
        const descriptor = await createDescriptor(new ScriptedPlugin('search', ['query']), {
            name: 'search-eu',
            timeoutMs: 1000,
        });

        expect(descriptor.name).to.equal('search-eu');
    });

    it('should time out a plugin that never identifies', async () => {
        const plugin: AgentPlugin = {
            identify: () => new Promise<PluginIdentity>(() => {}),
            execute: async () => null,
            describeCapabilities: () => ['noop'],
            checkHealth: async () => ({ reachable: true }),
            shutDown: async () => {},
        };

        const error = await captureRejection(createDescriptor(plugin, { name: 'stuck', timeoutMs: 20 }));

        expect(error)
            .to.be.instanceOf(PluginTimeoutError)
            .and.have.property('message', "Plugin 'stuck' identify timed out after 20ms");
    });
});

// =============================================================================
// PluginRegistry
// =============================================================================

describe('PluginRegistry', () => {
    let registry: PluginRegistry;

    beforeEach(() => {
        registry = new PluginRegistry(silentLogger);
    });

    it('should resolve task types in registration order', async () => {
        registry.register(await descriptorFor('b-plugin', ['ping', 'swap']));
        registry.register(await descriptorFor('a-plugin', ['ping']));

        expect(registry.resolve('ping')).to.deep.equal(['b-plugin', 'a-plugin']);
        expect(registry.resolve('swap')).to.deep.equal(['b-plugin']);
        expect(registry.resolve('unknown')).to.deep.equal([]);
    });

    it('should reject a duplicate name and keep the first descriptor', async () => {
        const first = await descriptorFor('echo', ['ping']);
        registry.register(first);
        const second = await descriptorFor('echo', ['other']);

        const error = captureThrow(() => registry.register(second));

        expect(error).to.be.instanceOf(DuplicateNameError);
        expect(registry.size).to.equal(1);
        expect(registry.get('echo')).to.equal(first);
        expect(registry.resolve('other')).to.deep.equal([]);
    });

    it('should emit registration events', async () => {
        const events: string[] = [];
        registry.on('plugin:registered', (event: PluginRegistryEvent) => events.push(`+${event.descriptor.name}`));
        registry.on('plugin:unregistered', (event: PluginRegistryEvent) => events.push(`-${event.descriptor.name}`));

        registry.register(await descriptorFor('echo', ['ping']));
        await registry.unregister('echo');

        expect(events).to.deep.equal(['+echo', '-echo']);
    });

    it('should shut a plugin down on unregister and stop resolving it', async () => {
        const plugin = new ScriptedPlugin('echo', ['ping']);
        registry.register(await createDescriptor(plugin, { timeoutMs: 1000 }));

        await registry.unregister('echo');

        expect(plugin.shutDownCount).to.equal(1);
        expect(registry.has('echo')).to.equal(false);
        expect(registry.resolve('ping')).to.deep.equal([]);
    });

    it('should throw NotFoundError for an unknown name', async () => {
        const error = await captureRejection(registry.unregister('missing'));

        expect(error).to.be.instanceOf(NotFoundError).and.have.property('code', 'NotFound');
    });

    it('should remove a plugin even when its shutdown fails', async () => {
        registry.register(
            await createDescriptor(new FailingShutdownPlugin('flaky', ['ping']), { timeoutMs: 1000 })
        );

        await registry.unregister('flaky');

        expect(registry.size).to.equal(0);
    });

    it('should iterate over a snapshot taken when each iteration starts', async () => {
        registry.register(await descriptorFor('one', ['ping']));
        const listing = registry.list();
        const seen: string[] = [];

        for (const descriptor of listing) {
            seen.push(descriptor.name);
            if (!registry.has('two')) {
                registry.register(await descriptorFor('two', ['ping']));
            }
        }

        expect(seen).to.deep.equal(['one']);
        expect([...listing].map(d => d.name)).to.deep.equal(['one', 'two']);
    });
});

// =============================================================================
// BasePlugin
// =============================================================================

class PingPlugin extends BasePlugin {
    setupCount = 0;
    shutDownCount = 0;

    constructor() {
        super('echo');
    }

    describeCapabilities(): readonly string[] {
        return ['ping'];
    }

    async execute(task: Task): Promise<unknown> {
        return task.payload;
    }

    protected async setup(): Promise<void> {
        this.setupCount++;
    }

    protected async onShutDown(): Promise<void> {
        this.shutDownCount++;
    }
}

describe('BasePlugin', () => {
    it('should identify with its name and default version', () => {
        expect(new PingPlugin().identify()).to.deep.equal({ name: 'echo', version: '1.0.0' });
    });

    it('should run setup once', async () => {
        const plugin = new PingPlugin();

        await Promise.all([plugin.initialize(), plugin.initialize()]);

        expect(plugin.setupCount).to.equal(1);
    });

    it('should report unreachable once shut down', async () => {
        const plugin = new PingPlugin();

        const before = await plugin.checkHealth();
        await plugin.shutDown();
        await plugin.shutDown();
        const after = await plugin.checkHealth();

        expect(before.reachable).to.equal(true);
        expect(after).to.deep.equal({ reachable: false });
        expect(plugin.shutDownCount).to.equal(1);
    });
});
