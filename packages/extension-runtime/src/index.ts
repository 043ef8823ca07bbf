export { ExtensionClient } from './extension-client.js';
export type { IExtensionClientOptions, IExtensionSource } from './extension-client.js';
export { ExtensionLoader } from './extension-loader.js';
export type { IExtensionLoaderOptions, ILoadedExtension } from './extension-loader.js';
export { instantiateExtension } from './instantiate.js';
export type { IExtensionComponent, IExtensionScope } from './instantiate.js';
export { ExtensionRuntimeError } from './errors.js';
