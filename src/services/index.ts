/**
 * Service Layer Exports
 *
 * Central export point for all services. Handlers import from here ONLY.
 */

export { configService } from './configService.js';
export { formatDetectionService } from './formatDetectionService.js';
export { requestDescriptorService } from './requestDescriptorService.js';
export { createUpstreamService } from './upstreamService.js';
export { JsonLineMetricsSink, MemoryMetricsSink } from './metricsSink.js';
export { MetricsAggregator } from './metricsAggregator.js';
export type { Clock, MetricsAggregatorOptions } from './metricsAggregator.js';

export { HTTP_METHODS } from './contracts.js';
export type {
  ConfigService,
  FormatDetectionService,
  HttpMethod,
  MetricsSink,
  ProxySettings,
  RequestDescriptorService,
  UpstreamRequest,
  UpstreamResponse,
  UpstreamService,
} from './contracts.js';
