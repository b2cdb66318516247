export { default as registryPlugin } from './registry-plugin.js';
export type { RegistryPluginOptions } from './registry-plugin.js';
export { default as enginePlugin } from './engine-plugin.js';
export type { Engine, EnginePluginOptions } from './engine-plugin.js';
