/**
 * Built-in plugin catalog, keyed by the name used under `plugins:` in the
 * host configuration file
 */

import type { AgentPlugin } from '../plugin-engine/types.js';
import { createEchoPlugin } from './EchoPlugin.js';

export type PluginFactory = (config: Record<string, unknown>) => AgentPlugin;

export const BUILTIN_PLUGINS: Readonly<Record<string, PluginFactory>> = {
    echo: createEchoPlugin,
};

export { EchoPlugin, createEchoPlugin, type EchoPluginOptions } from './EchoPlugin.js';
