/**
 * Metrics Sinks
 *
 * The sink is the only process-wide collaborator of the proxy and is injected
 * into the application. Records are append-only.
 */

import { logger, type Logger } from '../logging/index.js';

import type { MetricsSink } from './contracts.js';
import type { MetricsRecord } from '../types/index.js';
import type { Writable } from 'stream';

/**
 * One compact JSON object per line. Each record is a single write, so
 * concurrent requests never interleave within a line.
 *
 * `emit` settles once the write is flushed or has failed. A broken output
 * (closed pipe, EPIPE) is logged instead of surfacing as an uncaught
 * stream error.
 */
export class JsonLineMetricsSink implements MetricsSink {
  private readonly output: Writable;

  constructor(output: Writable = process.stdout, log: Logger = logger) {
    this.output = output;
    this.output.on('error', (error: Error) => {
      log.error(`[METRICS] Metrics output failed: ${error.message}`);
    });
  }

  emit(record: MetricsRecord): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.output.write(`${JSON.stringify(record)}\n`, (error?: Error | null) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }
}

interface PendingWait {
  count: number;
  resolve: (records: MetricsRecord[]) => void;
}

/**
 * Keeps every record in memory; `waitFor` resolves once a given number of
 * records has been emitted.
 */
export class MemoryMetricsSink implements MetricsSink {
  readonly records: MetricsRecord[] = [];
  private waiting: PendingWait[] = [];

  emit(record: MetricsRecord): void {
    this.records.push(record);

    const ready = this.waiting.filter((wait) => this.records.length >= wait.count);
    this.waiting = this.waiting.filter((wait) => this.records.length < wait.count);
    for (const wait of ready) {
      wait.resolve([...this.records]);
    }
  }

  waitFor(count: number = this.records.length + 1): Promise<MetricsRecord[]> {
    if (this.records.length >= count) {
      return Promise.resolve([...this.records]);
    }
    return new Promise<MetricsRecord[]>((resolve) => {
      this.waiting.push({ count, resolve });
    });
  }

  clear(): void {
    this.records.length = 0;
  }
}
