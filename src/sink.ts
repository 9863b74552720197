/**
 * Write destinations for serialized calendar text.
 */

/**
 * Anything that accepts successive text writes.
 * A write that cannot complete throws.
 */
export interface Sink {
  write(chunk: string): void;
}

/** Collects everything written into one string */
export class StringSink implements Sink {
  private readonly chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  toString(): string {
    return this.chunks.join('');
  }
}

/** Counts UTF-8 octets without keeping the text */
export class ByteCountingSink implements Sink {
  bytes = 0;

  write(chunk: string): void {
    this.bytes += Buffer.byteLength(chunk, 'utf8');
  }
}
