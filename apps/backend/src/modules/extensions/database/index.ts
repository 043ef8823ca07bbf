export type { IExtensionDocument } from './IExtensionDocument.js';
