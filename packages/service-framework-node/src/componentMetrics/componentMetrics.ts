export { httpServerMetrics } from './components/httpServer.js';
export { workDispatcherMetrics } from './components/workDispatcher.js';
export { docProcessorMetrics } from './components/docProcessor.js';
export { topicAggregatorMetrics } from './components/topicAggregator.js';
