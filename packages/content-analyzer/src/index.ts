export { ContentAnalyzerError } from './errors.js';
export { extractTopics } from './topics.js';
export { analyzeContent, emptyContentMetrics } from './metrics.js';
export type { ContentMetrics } from './metrics.js';
export { analyzeDocument, analyzeDocumentFile, mergeDocumentAnalyses } from './document.js';
export type { DocumentAnalysis } from './document.js';
