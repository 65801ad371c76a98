export interface CotStreamFramerConfig {
  /** Largest incomplete message kept between chunks (characters). Default: 1 MiB */
  maxBufferLength: number;
}

export const DEFAULT_STREAM_FRAMER_CONFIG: CotStreamFramerConfig = {
  maxBufferLength: 1024 * 1024,
};

const EVENT_OPEN = '<event';
const EVENT_CLOSE = '</event>';

/**
 * Splits a CoT text stream (TCP/TLS) into complete `<event>` documents.
 *
 * Anything between messages (XML declarations, keep-alive whitespace,
 * garbage) is discarded. An incomplete trailing message is kept until the
 * next chunk arrives.
 */
export class CotStreamFramer {
  private readonly config: CotStreamFramerConfig;
  private buffer = '';
  private overflows = 0;

  constructor(config: Partial<CotStreamFramerConfig> = {}) {
    this.config = { ...DEFAULT_STREAM_FRAMER_CONFIG, ...config };
  }

  /**
   * Append a chunk and return every message it completed.
   */
  push(chunk: string): string[] {
    this.buffer += chunk;
    const messages: string[] = [];

    for (;;) {
      const start = this.findEventStart(0);
      if (start < 0) {
        // Keep a short tail in case "<event" is split across chunks
        this.buffer = this.buffer.slice(Math.max(0, this.buffer.length - EVENT_OPEN.length));
        break;
      }
      if (start > 0) {
        this.buffer = this.buffer.slice(start);
      }

      const end = this.findEventEnd();
      if (end < 0) {
        break;
      }

      messages.push(this.buffer.slice(0, end));
      this.buffer = this.buffer.slice(end);
    }

    if (this.buffer.length > this.config.maxBufferLength) {
      this.buffer = '';
      this.overflows++;
    }

    return messages;
  }

  /** Characters currently held for an incomplete message. */
  pending(): number {
    return this.buffer.length;
  }

  /** Number of times the buffer limit was exceeded and the buffer dropped. */
  getOverflowCount(): number {
    return this.overflows;
  }

  reset(): void {
    this.buffer = '';
  }

  private findEventStart(from: number): number {
    let idx = this.buffer.indexOf(EVENT_OPEN, from);
    while (idx >= 0) {
      const next = this.buffer.charAt(idx + EVENT_OPEN.length);
      if (next === '' || next === '>' || next === '/' || /\s/.test(next)) {
        return idx;
      }
      idx = this.buffer.indexOf(EVENT_OPEN, idx + 1);
    }
    return -1;
  }

  /**
   * End offset (exclusive) of the message at the head of the buffer, or -1
   * if it is not complete yet.
   */
  private findEventEnd(): number {
    let quote: string | null = null;
    let i = EVENT_OPEN.length;

    for (; i < this.buffer.length; i++) {
      const ch = this.buffer[i];
      if (quote) {
        if (ch === quote) quote = null;
      } else if (ch === '"' || ch === "'") {
        quote = ch;
      } else if (ch === '>') {
        break;
      }
    }

    if (i >= this.buffer.length) {
      return -1;
    }
    if (this.buffer[i - 1] === '/') {
      return i + 1;
    }

    const close = this.buffer.indexOf(EVENT_CLOSE, i + 1);
    return close < 0 ? -1 : close + EVENT_CLOSE.length;
  }
}
