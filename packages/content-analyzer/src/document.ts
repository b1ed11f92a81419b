import { readFile } from 'node:fs/promises';
import type { TopicMetrics } from '@doc-analytics/interface';
import { ContentAnalyzerError } from './errors.js';
import { analyzeContent, type ContentMetrics } from './metrics.js';
import { extractTopics } from './topics.js';

export type DocumentAnalysis = Map<string, ContentMetrics>;

/**
 * Per-topic metrics for one document. When `topicsOfInterest` is given and
 * not empty, only topics matching one of them case-insensitively are kept.
 */
export function analyzeDocument(content: string, topicsOfInterest?: string[]): DocumentAnalysis {
  const wanted =
    topicsOfInterest && topicsOfInterest.length > 0
      ? new Set(topicsOfInterest.map((topic) => topic.toLowerCase()))
      : undefined;

  const analysis: DocumentAnalysis = new Map();

  for (const [topic, text] of extractTopics(content)) {
    if (wanted && !wanted.has(topic.toLowerCase())) {
      continue;
    }
    analysis.set(topic, analyzeContent(text));
  }

  return analysis;
}

export async function analyzeDocumentFile(
  filePath: string,
  topicsOfInterest?: string[],
): Promise<DocumentAnalysis> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ContentAnalyzerError(
      `Error reading file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
    );
  }

  return analyzeDocument(content, topicsOfInterest);
}

/**
 * Sums per-topic metrics across documents. `docCount` is the number of
 * documents that contributed to the topic.
 */
export function mergeDocumentAnalyses(
  analyses: Iterable<DocumentAnalysis>,
): Record<string, TopicMetrics> {
  const merged = new Map<string, TopicMetrics>();

  for (const analysis of analyses) {
    for (const [topic, metrics] of analysis) {
      const current = merged.get(topic) ?? {
        topic,
        lineCount: 0,
        wordCount: 0,
        charCount: 0,
        docCount: 0,
      };
      merged.set(topic, {
        topic,
        lineCount: current.lineCount + metrics.lineCount,
        wordCount: current.wordCount + metrics.wordCount,
        charCount: current.charCount + metrics.charCount,
        docCount: current.docCount + 1,
      });
    }
  }

  return Object.fromEntries(merged);
}
