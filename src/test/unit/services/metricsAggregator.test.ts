import { Writable } from "stream";

import { expect } from "chai";
import { describe, it } from "mocha";

import { createConfigLogger } from "../../../logging/index.js";
import { JsonLineMetricsSink, MemoryMetricsSink, MetricsAggregator } from "../../../services/index.js";

import type { MetricsSink } from "../../../services/index.js";
import type { MetricsRecord, ParseResult, RequestDescriptor } from "../../../types/index.js";

const quietLogger = createConfigLogger("error");

const descriptor: RequestDescriptor = { model: "llama3", prompt: "Why is the sky blue?", streamRequested: true };

const complete: ParseResult = {
  variant: "ollama",
  status: "complete",
  usage: { promptTokens: 8, completionTokens: 150 },
  malformedUnits: 0,
  truncated: false,
};

/** Clock that returns the queued readings in order, repeating the last */
const fakeClock = (...readings: number[]): (() => number) => {
  let index = 0;
  return () => {
    const reading = readings[Math.min(index, readings.length - 1)] ?? 0;
    index += 1;
    return reading;
  };
};

const descriptorRecord: MetricsRecord = {
  model: "llama3",
  prompt: "Why is the sky blue?",
  prompt_tokens: null,
  completion_tokens: null,
  latency_ms: 0,
  timestamp: "2024-01-01T00:00:00.000Z",
  status: "partial",
};

const withoutTimestamp = (record: MetricsRecord | null): Omit<MetricsRecord, "timestamp"> | null => {
  if (record === null) {
    return null;
  }
  const { timestamp: _timestamp, ...rest } = record;
  return rest;
};

describe("MetricsAggregator", () => {
  it("emits the descriptor, usage and latency measured from begin()", async () => {
    const sink = new MemoryMetricsSink();
    const aggregator = new MetricsAggregator(descriptor, { sink, now: fakeClock(0, 1000, 1342.6), logger: quietLogger });

    aggregator.begin();
    const record = await aggregator.complete(complete);

    expect(withoutTimestamp(record)).to.deep.equal({
      model: "llama3",
      prompt: "Why is the sky blue?",
      prompt_tokens: 8,
      completion_tokens: 150,
      latency_ms: 343,
      status: "complete",
    });
    expect(sink.records).to.have.length(1);
    expect(sink.records[0]).to.equal(record);
    expect(Number.isNaN(Date.parse(record?.timestamp ?? ""))).to.equal(false);
  });

  it("emits exactly once", async () => {
    const sink = new MemoryMetricsSink();
    const aggregator = new MetricsAggregator(descriptor, { sink, now: fakeClock(0), logger: quietLogger });

    const first = await aggregator.complete(complete);
    const second = await aggregator.fail(new Error("late failure"));
    const third = await aggregator.complete(complete);

    expect(first?.status).to.equal("complete");
    expect(second).to.equal(null);
    expect(third).to.equal(null);
    expect(aggregator.hasEmitted()).to.equal(true);
    expect(sink.records).to.have.length(1);
  });

  it("reports failures with null counts", async () => {
    const sink = new MemoryMetricsSink();
    const aggregator = new MetricsAggregator(descriptor, { sink, now: fakeClock(10, 25), logger: quietLogger });

    const record = await aggregator.fail(new Error("connect ECONNREFUSED"));

    expect(withoutTimestamp(record)).to.deep.equal({
      model: "llama3",
      prompt: "Why is the sky blue?",
      prompt_tokens: null,
      completion_tokens: null,
      latency_ms: 15,
      status: "error",
    });
  });

  it("passes partial results through unchanged", async () => {
    const sink = new MemoryMetricsSink();
    const aggregator = new MetricsAggregator(descriptor, { sink, now: fakeClock(0), logger: quietLogger });

    const record = await aggregator.complete({
      variant: "passthrough",
      status: "partial",
      usage: { promptTokens: null, completionTokens: null },
      malformedUnits: 2,
      truncated: true,
    });

    expect(record?.status).to.equal("partial");
    expect(record?.prompt_tokens).to.equal(null);
    expect(record?.latency_ms).to.equal(0);
  });

  it("never reports a negative latency", async () => {
    const sink = new MemoryMetricsSink();
    const aggregator = new MetricsAggregator(descriptor, { sink, now: fakeClock(500, 400), logger: quietLogger });

    const record = await aggregator.complete(complete);

    expect(record?.latency_ms).to.equal(0);
  });

  it("survives a sink that throws or rejects", async () => {
    const throwing: MetricsSink = {
      emit: () => {
        throw new Error("disk full");
      },
    };
    const rejecting: MetricsSink = {
      emit: () => Promise.reject(new Error("queue closed")),
    };

    const fromThrowing = await new MetricsAggregator(descriptor, { sink: throwing, logger: quietLogger }).complete(complete);
    const fromRejecting = await new MetricsAggregator(descriptor, { sink: rejecting, logger: quietLogger }).fail("boom");

    expect(fromThrowing?.status).to.equal("complete");
    expect(fromRejecting?.status).to.equal("error");
  });
});

describe("JsonLineMetricsSink", () => {
  it("writes one compact JSON object per line", async () => {
    const lines: string[] = [];
    const output = new Writable({
      write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
        lines.push(chunk.toString("utf8"));
        callback();
      },
    });
    const sink = new JsonLineMetricsSink(output, quietLogger);
    const record: MetricsRecord = {
      model: "m",
      prompt: "line one\nline two",
      prompt_tokens: 1,
      completion_tokens: null,
      latency_ms: 7,
      timestamp: "2024-01-01T00:00:00.000Z",
      status: "partial",
    };

    await sink.emit(record);

    expect(lines).to.deep.equal([
      '{"model":"m","prompt":"line one\\nline two","prompt_tokens":1,"completion_tokens":null,"latency_ms":7,"timestamp":"2024-01-01T00:00:00.000Z","status":"partial"}\n',
    ]);
  });

  it("turns a failed write into a rejected emit instead of a stream error", async () => {
    const output = new Writable({
      write(_chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
        callback(new Error("EPIPE"));
      },
    });
    const sink = new JsonLineMetricsSink(output, quietLogger);

    const emitError = await sink
      .emit({ ...descriptorRecord, status: "error" })
      .then(() => null, (error: unknown) => error);
    const record = await new MetricsAggregator(descriptor, { sink, logger: quietLogger }).fail(new Error("connect ECONNREFUSED"));
    await new Promise((resolve) => setImmediate(resolve));

    expect(emitError).to.be.instanceOf(Error);
    expect(emitError).to.have.property("message", "EPIPE");
    expect(record?.status).to.equal("error");
    expect(output.destroyed).to.equal(true);
  });
});

describe("MemoryMetricsSink", () => {
  const record = (model: string): MetricsRecord => ({
    model,
    prompt: "",
    prompt_tokens: null,
    completion_tokens: null,
    latency_ms: 0,
    timestamp: "2024-01-01T00:00:00.000Z",
    status: "error",
  });

  it("resolves waitFor once enough records arrived", async () => {
    const sink = new MemoryMetricsSink();
    const waiting = sink.waitFor(2);

    sink.emit(record("a"));
    sink.emit(record("b"));

    const records = await waiting;
    expect(records.map((entry) => entry.model)).to.deep.equal(["a", "b"]);
  });

  it("resolves immediately when the records are already there", async () => {
    const sink = new MemoryMetricsSink();
    sink.emit(record("a"));

    const records = await sink.waitFor(1);
    expect(records).to.have.length(1);

    sink.clear();
    expect(sink.records).to.deep.equal([]);
  });
});
