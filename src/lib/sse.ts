/**
 * Incremental `text/event-stream` reader. Chunks may split events anywhere;
 * `push` returns the `data:` payloads of every event completed so far.
 */
export class SseParser {
  private buffer = "";

  push(chunk: string): string[] {
    this.buffer += chunk.replace(/\r\n/g, "\n");
    const payloads: string[] = [];
    let boundary = this.buffer.indexOf("\n\n");
    while (boundary !== -1) {
      const block = this.buffer.slice(0, boundary);
      this.buffer = this.buffer.slice(boundary + 2);
      const data = dataOf(block);
      if (data !== null) {
        payloads.push(data);
      }
      boundary = this.buffer.indexOf("\n\n");
    }
    return payloads;
  }

  /** Payload of a trailing event that was never terminated, if any. */
  flush(): string[] {
    const rest = this.buffer;
    this.buffer = "";
    const data = rest.trim() ? dataOf(rest) : null;
    return data === null ? [] : [data];
  }
}

function dataOf(block: string): string | null {
  const lines = block
    .split("\n")
    .filter((line) => line.startsWith("data:"))
    .map((line) => line.slice(5).replace(/^ /, ""));
  return lines.length > 0 ? lines.join("\n") : null;
}
