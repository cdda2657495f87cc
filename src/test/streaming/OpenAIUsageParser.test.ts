/**
 * OpenAIUsageParser - usage recovery from SSE streams and JSON documents
 */

import { expect } from "chai";
import { describe, it } from "mocha";

import { OpenAIUsageParser, PassthroughUsageParser, createUsageParser } from "../../handlers/stream/processors/index.js";
import { buildOpenAIUnits, toSSE } from "../utils/sseUtils.js";
import { chunkEvery, splitAt } from "../utils/streamHelpers.js";

import type { OpenAIFraming, ParseResult } from "../../types/index.js";

const parseChunks = (chunks: Buffer[], framing: OpenAIFraming = "sse", maxUnitBytes?: number): ParseResult => {
  const parser = new OpenAIUsageParser(framing, maxUnitBytes);
  for (const chunk of chunks) {
    parser.feed(chunk);
  }
  return parser.finish();
};

const parseText = (text: string, framing: OpenAIFraming = "sse"): ParseResult =>
  parseChunks([Buffer.from(text, "utf8")], framing);

const COMPLETE_12_40: ParseResult = {
  variant: "openai",
  status: "complete",
  usage: { promptTokens: 12, completionTokens: 40 },
  malformedUnits: 0,
  truncated: false,
};

const NO_USAGE = { promptTokens: null, completionTokens: null };

describe("OpenAIUsageParser", () => {
  describe("sse framing", () => {
    const payload = Buffer.from(toSSE(buildOpenAIUnits()), "utf8");

    it("reads usage from the event before [DONE]", () => {
      expect(parseChunks([payload])).to.deep.equal(COMPLETE_12_40);
    });

    it("gives the same result for every two-chunk split", () => {
      for (let offset = 1; offset < payload.length; offset++) {
        expect(parseChunks(splitAt(payload, [offset])), `split at ${offset}`).to.deep.equal(COMPLETE_12_40);
      }
    });

    it("gives the same result when fed one byte at a time", () => {
      expect(parseChunks(chunkEvery(payload, 1))).to.deep.equal(COMPLETE_12_40);
    });

    it("finalizes as partial when [DONE] arrives before any usage", () => {
      const parser = new OpenAIUsageParser("sse");
      parser.feed(Buffer.from(toSSE(buildOpenAIUnits({ includeUsage: false })), "utf8"));

      expect(parser.isFinalized()).to.equal(true);
      expect(parser.finish()).to.deep.equal({
        variant: "openai",
        status: "partial",
        usage: NO_USAGE,
        malformedUnits: 0,
        truncated: false,
      });
    });

    it("ignores usage sent after [DONE]", () => {
      const text = `data: [DONE]\n\ndata: {"usage":{"prompt_tokens":1,"completion_tokens":2}}\n\n`;
      expect(parseText(text).status).to.equal("partial");
    });

    it("keeps the first usage when several events carry one", () => {
      const text = toSSE([
        { usage: { prompt_tokens: 12, completion_tokens: 40 } },
        { usage: { prompt_tokens: 99, completion_tokens: 99 } },
      ]);
      expect(parseText(text).usage).to.deep.equal({ promptTokens: 12, completionTokens: 40 });
    });

    it("skips usage objects without integer counts", () => {
      const text = toSSE([
        { usage: { prompt_tokens: "12", completion_tokens: 40 } },
        { usage: { prompt_tokens: 5, completion_tokens: 6 } },
      ]);
      expect(parseText(text).usage).to.deep.equal({ promptTokens: 5, completionTokens: 6 });
    });

    it("accepts CRLF endings, comments and data without a space", () => {
      const text = ': ping\r\n\r\nevent: completion\r\ndata:{"usage":{"prompt_tokens":3,"completion_tokens":4}}\r\n\r\n';
      expect(parseText(text).usage).to.deep.equal({ promptTokens: 3, completionTokens: 4 });
    });

    it("parses a payload spread over several data lines", () => {
      const text = 'data: {"usage":\ndata: {"prompt_tokens":5,"completion_tokens":6}}\n\n';
      expect(parseText(text).usage).to.deep.equal({ promptTokens: 5, completionTokens: 6 });
    });

    it("counts malformed events and keeps parsing", () => {
      const text = `data: {oops\n\n${toSSE(buildOpenAIUnits())}`;
      const result = parseText(text);

      expect(result.usage).to.deep.equal({ promptTokens: 12, completionTokens: 40 });
      expect(result.malformedUnits).to.equal(1);
    });

    it("parses a final event without the closing blank line", () => {
      const text = 'data: {"usage":{"prompt_tokens":1,"completion_tokens":2}}';
      expect(parseText(text).usage).to.deep.equal({ promptTokens: 1, completionTokens: 2 });
    });

    it("reports partial when the stream is cut before usage", () => {
      const text = toSSE(buildOpenAIUnits({ includeUsage: false }), false);
      expect(parseText(text)).to.deep.equal({
        variant: "openai",
        status: "partial",
        usage: NO_USAGE,
        malformedUnits: 0,
        truncated: false,
      });
    });
  });

  describe("document framing", () => {
    const completion = JSON.stringify({
      id: "chatcmpl-test",
      object: "chat.completion",
      choices: [{ index: 0, message: { role: "assistant", content: "Hi" }, finish_reason: "stop" }],
      usage: { prompt_tokens: 7, completion_tokens: 9, total_tokens: 16 },
    });

    it("reads top-level usage from the whole body", () => {
      const result = parseChunks(chunkEvery(Buffer.from(completion, "utf8"), 13), "document");
      expect(result.status).to.equal("complete");
      expect(result.usage).to.deep.equal({ promptTokens: 7, completionTokens: 9 });
    });

    it("reports partial for a body without usage", () => {
      expect(parseText('{"object":"list","data":[]}', "document").status).to.equal("partial");
    });

    it("drops a body larger than the unit limit", () => {
      const result = parseChunks([Buffer.from(completion, "utf8")], "document", 16);
      expect(result.status).to.equal("partial");
      expect(result.malformedUnits).to.equal(1);
    });
  });
});

describe("PassthroughUsageParser", () => {
  it("never inspects bytes and always reports partial", () => {
    const parser = new PassthroughUsageParser();
    parser.feed(Buffer.from('{"done":true,"prompt_eval_count":1,"eval_count":2}\n'));

    expect(parser.isFinalized()).to.equal(false);
    expect(parser.finish()).to.deep.equal({
      variant: "passthrough",
      status: "partial",
      usage: NO_USAGE,
      malformedUnits: 0,
      truncated: false,
    });
  });
});

describe("createUsageParser", () => {
  it("builds the parser named by the selection", () => {
    expect(createUsageParser({ variant: "ollama" }).variant).to.equal("ollama");
    expect(createUsageParser({ variant: "passthrough" }).variant).to.equal("passthrough");

    const openai = createUsageParser({ variant: "openai", framing: "document" });
    expect(openai).to.be.instanceOf(OpenAIUsageParser);
    expect(openai.variant === "openai" && openai.framing).to.equal("document");
  });
});
