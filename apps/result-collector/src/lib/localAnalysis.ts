import {
  analyzeDocumentFile,
  mergeDocumentAnalyses,
  type DocumentAnalysis,
} from '@doc-analytics/content-analyzer';
import type { TopicMetrics } from '@doc-analytics/interface';
import type { SF } from '@doc-analytics/service-framework-node';

/** Same merged view as the distributed path, computed in this process. */
export async function analyzeLocally(
  files: string[],
  topicsOfInterest: string[] | undefined,
  logger: SF.Logger,
): Promise<Record<string, TopicMetrics>> {
  const analyses: DocumentAnalysis[] = [];

  for (const file of files) {
    try {
      analyses.push(await analyzeDocumentFile(file, topicsOfInterest));
    } catch (error) {
      logger.error(error, 'Skipping document', { file });
    }
  }

  return mergeDocumentAnalyses(analyses);
}
