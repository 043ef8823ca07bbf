export type {
    ExtensionType,
    IExtension,
    IExtensionCreateInput,
    IExtensionUpdateInput,
    IExtensionListFilter,
    IExtensionStats
} from './IExtension.js';
export type { IResolvedExtension } from './IResolvedExtension.js';
export type { IExtensionCompileIssue, IExtensionCompileResult, IExtensionCompiler } from './IExtensionCompiler.js';
export type { IExtensionRepository } from './IExtensionRepository.js';
export type { IExtensionService } from './IExtensionService.js';
