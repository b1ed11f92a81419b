import { readFile } from 'node:fs/promises';
import { ContentAnalyzerError, extractTopics } from '@doc-analytics/content-analyzer';
import {
  PROCESS_ACTION,
  processRequestSchema,
  type ErrorResponse,
  type ProcessResponse,
} from '@doc-analytics/interface';
import type { TopicPublisher } from '@doc-analytics/messaging-node';
import type { SF } from '@doc-analytics/service-framework-node';
import { previewText } from '@doc-analytics/utils';
import type { DocProcessorMetrics } from '../context.js';
import { PathNotFoundError } from './errors.js';
import type { PathResolver } from './pathResolver.js';

interface DocumentProcessorOptions {
  diagnosticContext: SF.DiagnosticContext;
  metrics: DocProcessorMetrics;
  pathResolver: PathResolver;
  publisher: TopicPublisher;
  readDocument?: (path: string) => Promise<string>;
}

function errorReply(message: string): ErrorResponse {
  return { status: 'error', message };
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createDocumentProcessor(options: DocumentProcessorOptions) {
  const { diagnosticContext, metrics, pathResolver, publisher } = options;
  const readDocument = options.readDocument ?? ((path: string) => readFile(path, 'utf8'));
  const logger = diagnosticContext.logger;

  /** Broadcasts each topic in order and returns the ones that went out. */
  async function publishTopics(item: string, topics: Map<string, string>): Promise<string[]> {
    const published: string[] = [];
    for (const [topic, content] of topics) {
      try {
        await publisher.publish(topic, content);
        published.push(topic);
        metrics.topicsPublishedTotal.inc();
        logger.debug('Published topic', { item, topic, preview: previewText(content, 50) });
      } catch (error) {
        logger.error(error, 'Failed to publish topic', { item, topic });
      }
    }
    return published;
  }

  /** Reads one document, broadcasts each of its topics and reports what it found. */
  async function processDocument(item: string): Promise<ProcessResponse> {
    let path: string;
    try {
      path = await pathResolver.resolve(item);
    } catch (error) {
      if (error instanceof PathNotFoundError) {
        logger.warn('Document not found', { item, candidates: error.candidates });
        return errorReply(error.message);
      }
      throw error;
    }

    let content: string;
    try {
      content = await readDocument(path);
    } catch (error) {
      logger.error(error, 'Error reading document', { item, path });
      return errorReply(`Error reading file: ${messageOf(error)}`);
    }

    let topics: Map<string, string>;
    try {
      topics = extractTopics(content);
    } catch (error) {
      if (error instanceof ContentAnalyzerError) {
        logger.warn('Error extracting topics', { item, path, error: error.message });
        return errorReply(`Error extracting topics: ${error.message}`);
      }
      throw error;
    }

    logger.info('Extracted topics', { item, path, topics: [...topics.keys()] });
    const published = await publishTopics(item, topics);

    return {
      status: 'success',
      topics: published,
      topicsFound: published.length,
      item: path,
    };
  }

  /** Entry point for the reply socket: validates the request and never rejects. */
  async function handleRequest(request: unknown): Promise<ProcessResponse> {
    const endTimer = metrics.documentProcessingDuration.startTimer();
    const reply = await answer(request);

    endTimer();
    metrics.documentsProcessedTotal.inc({ status: reply.status });
    return reply;
  }

  async function answer(request: unknown): Promise<ProcessResponse> {
    const parsed = processRequestSchema.safeParse(request);

    if (!parsed.success || parsed.data.action !== PROCESS_ACTION) {
      logger.warn('Invalid action', { request });
      return errorReply('Invalid action');
    }

    const { item } = parsed.data;
    if (!item) {
      return errorReply('Missing item parameter');
    }

    try {
      return await processDocument(item);
    } catch (error) {
      logger.error(error, 'Unexpected error processing document', { item });
      return errorReply(`Unexpected error: ${messageOf(error)}`);
    }
  }

  return {
    processDocument,
    handleRequest,
  };
}

export type DocumentProcessor = ReturnType<typeof createDocumentProcessor>;
