/**
 * Extensions module public API.
 */

export { ExtensionsModule } from './ExtensionsModule.js';
export type { IExtensionsModuleDependencies } from './ExtensionsModule.js';
export { ExtensionService } from './services/extension.service.js';
export { ExtensionCompiler, scopeHash } from './compiler/extension-compiler.js';
export { ExtensionRepository, EXTENSION_COLLECTION } from './repositories/extension.repository.js';
export { ExtensionsController } from './api/extensions.controller.js';
export { RuntimeController } from './api/runtime.controller.js';
