import { z } from 'zod';

export const workItemSchema = z.string().min(1);

export const workerSchema = z.object({
  id: z.string().min(1),
  endpoint: z.string().regex(/^(tcp|ipc|inproc):\/\/.+/, 'Expected a tcp://, ipc:// or inproc:// address'),
});

export type WorkItem = z.infer<typeof workItemSchema>;
export type Worker = z.infer<typeof workerSchema>;

// Control surface of the work dispatcher

export const registerDocumentsBodySchema = z.object({
  documents: z.array(workItemSchema),
});

export const registerWorkerBodySchema = z.object({
  worker: workerSchema,
});

export const workerIdParamsSchema = z.object({
  id: z.string().min(1),
});

export type RegisterDocumentsBody = z.infer<typeof registerDocumentsBodySchema>;
export type RegisterWorkerBody = z.infer<typeof registerWorkerBodySchema>;

// Dispatcher to worker

export const processRequestSchema = z.object({
  action: z.string(),
  item: z.string().optional(),
});

export const processSuccessResponseSchema = z.object({
  status: z.literal('success'),
  topics: z.array(z.string()),
  topicsFound: z.number().int().nonnegative(),
  item: z.string(),
});

export const errorResponseSchema = z.object({
  status: z.literal('error'),
  message: z.string(),
});

export const processResponseSchema = z.discriminatedUnion('status', [
  processSuccessResponseSchema,
  errorResponseSchema,
]);

// What the dispatcher requires of any worker: the status and reported topics.
export const workerSuccessReplySchema = processSuccessResponseSchema.partial({
  topicsFound: true,
  item: true,
});

export const workerReplySchema = z.discriminatedUnion('status', [
  workerSuccessReplySchema,
  errorResponseSchema,
]);

export type ProcessRequest = z.infer<typeof processRequestSchema>;
export type ProcessSuccessResponse = z.infer<typeof processSuccessResponseSchema>;
export type ErrorResponse = z.infer<typeof errorResponseSchema>;
export type ProcessResponse = z.infer<typeof processResponseSchema>;
export type WorkerReply = z.infer<typeof workerReplySchema>;

// Collector to aggregator

export const topicMetricsSchema = z.object({
  topic: z.string(),
  lineCount: z.number().int().nonnegative(),
  wordCount: z.number().int().nonnegative(),
  charCount: z.number().int().nonnegative(),
  docCount: z.number().int().nonnegative(),
});

export const metricsRequestSchema = z.object({
  action: z.string(),
});

export const metricsSuccessResponseSchema = z.object({
  status: z.literal('success'),
  metrics: topicMetricsSchema,
});

export const metricsResponseSchema = z.discriminatedUnion('status', [
  metricsSuccessResponseSchema,
  errorResponseSchema,
]);

export type TopicMetrics = z.infer<typeof topicMetricsSchema>;
export type MetricsRequest = z.infer<typeof metricsRequestSchema>;
export type MetricsResponse = z.infer<typeof metricsResponseSchema>;

export const PROCESS_ACTION = 'process';
export const GET_METRICS_ACTION = 'get_metrics';

export const NO_TOPIC = '(No Topic)';
