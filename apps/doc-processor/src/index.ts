export { createDocumentProcessor } from './lib/documentProcessor.js';
export type { DocumentProcessor } from './lib/documentProcessor.js';
export { createPathResolver } from './lib/pathResolver.js';
export type { PathResolver } from './lib/pathResolver.js';
export { PathNotFoundError } from './lib/errors.js';
