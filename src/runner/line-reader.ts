/**
 * Line Reader - hands out one line at a time from a readable stream,
 * with a per-read deadline
 */

import type { Readable } from "stream";

export type LineResult =
  | { kind: "line"; text: string }
  | { kind: "timeout" }
  | { kind: "closed" };

export class LineReader {
  private buffer = "";
  private queued: string[] = [];
  private waiter: ((result: LineResult) => void) | null = null;
  private ended = false;

  constructor(stream: Readable) {
    stream.setEncoding("utf-8");
    stream.on("data", (chunk: string) => this.push(chunk));
    stream.on("end", () => this.end());
    stream.on("close", () => this.end());
    stream.on("error", () => this.end());
  }

  /**
   * Drop lines that arrived while nobody was waiting and return them
   */
  discardPending(): string[] {
    const dropped = this.queued;
    this.queued = [];
    return dropped;
  }

  /**
   * Resolve with the next complete line, or `timeout` / `closed`.
   * An empty line is a line.
   */
  next(timeoutMs: number): Promise<LineResult> {
    const queued = this.queued.shift();
    if (queued !== undefined) {
      return Promise.resolve({ kind: "line", text: queued });
    }
    if (this.ended) {
      return Promise.resolve({ kind: "closed" });
    }

    return new Promise<LineResult>((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve({ kind: "timeout" });
      }, timeoutMs);

      this.waiter = (result) => {
        clearTimeout(timer);
        this.waiter = null;
        resolve(result);
      };
    });
  }

  private push(chunk: string): void {
    this.buffer += chunk;

    let newline = this.buffer.indexOf("\n");
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline).replace(/\r$/, "");
      this.buffer = this.buffer.slice(newline + 1);

      if (this.waiter) {
        this.waiter({ kind: "line", text: line });
      } else {
        this.queued.push(line);
      }
      newline = this.buffer.indexOf("\n");
    }
  }

  private end(): void {
    if (this.ended) return;
    this.ended = true;
    this.waiter?.({ kind: "closed" });
  }
}
