/**
 * Metrics Aggregator
 *
 * One per proxied request. Combines the request descriptor, the parser's
 * result and wall-clock latency into a MetricsRecord and emits it exactly
 * once, whichever of complete() / fail() comes first.
 */

import { logger as defaultLogger, type Logger } from '../logging/index.js';
import { extractErrorMessage } from '../utils/http/errorResponseHandler.js';

import type { MetricsSink } from './contracts.js';
import type { MetricsRecord, MetricsStatus, ParseResult, RequestDescriptor, TokenUsage } from '../types/index.js';

export type Clock = () => number;

export interface MetricsAggregatorOptions {
  sink: MetricsSink;
  /** Defaults to Date.now */
  now?: Clock;
  logger?: Logger;
}

const NO_USAGE: TokenUsage = { promptTokens: null, completionTokens: null };

export class MetricsAggregator {
  private readonly sink: MetricsSink;
  private readonly now: Clock;
  private readonly logger: Logger;
  private readonly descriptor: RequestDescriptor;
  private startedAt: number;
  private emitted = false;

  constructor(descriptor: RequestDescriptor, options: MetricsAggregatorOptions) {
    this.descriptor = descriptor;
    this.sink = options.sink;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? defaultLogger;
    this.startedAt = this.now();
  }

  /** Marks the moment forwarding begins; latency is measured from here */
  begin(): void {
    this.startedAt = this.now();
  }

  hasEmitted(): boolean {
    return this.emitted;
  }

  /**
   * Parser finished (normally or truncated). Returns the emitted record, or
   * null when a record was already emitted for this request.
   */
  async complete(result: ParseResult): Promise<MetricsRecord | null> {
    if (result.malformedUnits > 0) {
      this.logger.warn(`[METRICS] ${result.malformedUnits} malformed ${result.variant} unit(s) skipped for model=${this.describeModel()}`);
    }
    if (result.truncated) {
      this.logger.warn(`[METRICS] Parser branch truncated for model=${this.describeModel()}; usage reported as partial`);
    }
    return this.finalize(result.status, result.usage);
  }

  /**
   * Upstream failed (connect, headers or mid-body). Counts are always null.
   */
  async fail(error: unknown): Promise<MetricsRecord | null> {
    this.logger.debug(`[METRICS] Request failed: ${extractErrorMessage(error)}`);
    return this.finalize('error', NO_USAGE);
  }

  private describeModel(): string {
    return this.descriptor.model === '' ? '(unknown)' : this.descriptor.model;
  }

  private async finalize(status: MetricsStatus, usage: TokenUsage): Promise<MetricsRecord | null> {
    if (this.emitted) {
      return null;
    }
    this.emitted = true;

    const record: MetricsRecord = {
      model: this.descriptor.model,
      prompt: this.descriptor.prompt,
      prompt_tokens: usage.promptTokens,
      completion_tokens: usage.completionTokens,
      latency_ms: Math.max(0, Math.round(this.now() - this.startedAt)),
      timestamp: new Date().toISOString(),
      status,
    };

    this.logger.info(
      `[METRICS] LLM request ${status}: model=${this.describeModel()}, prompt_tokens=${record.prompt_tokens ?? 'null'}, completion_tokens=${record.completion_tokens ?? 'null'}, latency_ms=${record.latency_ms}`
    );

    try {
      await this.sink.emit(record);
    } catch (error: unknown) {
      this.logger.error(`[METRICS] Sink rejected record: ${extractErrorMessage(error)}`);
    }

    return record;
  }
}
