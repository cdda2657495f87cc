/**
 * A framer turns raw response bytes into complete protocol units (one NDJSON
 * line, one SSE event payload, one JSON document) as text.
 */
export interface UnitFramer {
  /** Consume a chunk; returns the units it completed, in order */
  push(data: Buffer): string[];
  /** End of stream; returns whatever unit the remaining bytes form */
  flush(): string[];
}

export function decodeLine(line: Buffer): string {
  const text = line.toString("utf8");
  return text.endsWith("\r") ? text.slice(0, -1) : text;
}
