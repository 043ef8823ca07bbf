/**
 * Menu module database documents.
 */
export type { IMenuDocument } from './IMenuDocument.js';
