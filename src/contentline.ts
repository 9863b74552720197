/**
 * Content-line folding — RFC 5545 §3.1
 *
 * Lines longer than 75 octets are split by inserting CRLF followed by a
 * single space. Splits never land inside a multi-byte UTF-8 sequence.
 */

import { StringSink, type Sink } from './sink.js';

// ── Constants ─────────────────────────────────────────────────────────────

/** Maximum octets per physical line, excluding the CRLF */
export const LIMIT = 75;

/** Inserted at every fold point: CRLF plus one space */
export const LINE_BREAK = '\r\n ';

/** Octets added per fold point */
const BREAK_OCTETS = 3;

export interface FoldOptions {
  /**
   * Octet limit per physical line.
   * Default: 75
   */
  limit?: number;
}

function resolveLimit(options: FoldOptions): number {
  const limit = options.limit ?? LIMIT;
  if (!Number.isInteger(limit) || limit < 2) {
    throw new RangeError(`Fold limit must be an integer of at least 2, got: ${limit}`);
  }
  return limit;
}

// ── Boundary finder ───────────────────────────────────────────────────────

/**
 * Where the current segment ends.
 *
 * - `end`: the rest fits within the limit
 * - `cut`: a character start at or before the limit
 * - `overflow`: no character start inside the window; the whole rest is
 *   emitted as one oversized segment
 */
export type Boundary =
  | { kind: 'end'; offset: number }
  | { kind: 'cut'; offset: number }
  | { kind: 'overflow'; offset: number };

/** Continuation bytes look like 0b10xxxxxx */
function isCharStart(byte: number): boolean {
  return (byte & 0xc0) !== 0x80;
}

/**
 * Find the rightmost offset at or before `limit` where `bytes` may be cut
 * without splitting a UTF-8 sequence.
 */
export function findBoundary(bytes: Uint8Array, limit: number): Boundary {
  if (limit >= bytes.length) {
    return { kind: 'end', offset: bytes.length };
  }

  for (let i = limit; i > 0; i--) {
    if (isCharStart(bytes[i] ?? 0)) {
      return { kind: 'cut', offset: i };
    }
  }

  return { kind: 'overflow', offset: bytes.length };
}

// ── Folder ────────────────────────────────────────────────────────────────

/**
 * Write `line` to `sink`, folded so no physical line exceeds the limit.
 * Anything the sink throws propagates unchanged; segments already written
 * stay written.
 */
export function fold(sink: Sink, line: string, options: FoldOptions = {}): void {
  const limit = resolveLimit(options);
  const bytes = Buffer.from(line, 'utf8');
  if (bytes.length === 0) return;

  let start = 0;
  let end = findBoundary(bytes, limit).offset;
  sink.write(bytes.toString('utf8', 0, end));

  while (end < bytes.length) {
    start = end;
    sink.write(LINE_BREAK);
    // The leading space of a continuation line takes one octet of the budget
    end = start + findBoundary(bytes.subarray(start), limit - 1).offset;
    sink.write(bytes.toString('utf8', start, end));
  }
}

/** Fold a content line into a string (no trailing CRLF). */
export function foldLine(line: string, options: FoldOptions = {}): string {
  const sink = new StringSink();
  fold(sink, line, options);
  return sink.toString();
}

// ── Size estimator ────────────────────────────────────────────────────────

/**
 * Octet length of a folded line given its unfolded octet length.
 * Exact whenever every fold lands on the limit, which is always the case
 * for single-byte content.
 */
export function estimatedSize(length: number, options: FoldOptions = {}): number {
  const limit = resolveLimit(options);
  const folds = Math.floor(Math.max(0, length - 2) / (limit - 1));
  return length + folds * BREAK_OCTETS;
}
