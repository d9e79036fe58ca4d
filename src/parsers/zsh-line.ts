/**
 * Zsh history line decoder.
 *
 * Turns the raw bytes of a history file into logical records, one per
 * history entry.
 *
 * Metafication
 * ────────────
 * Zsh stores some bytes (NUL and its internal token bytes 0x83–0xA2) as a
 * two-byte sequence: the Meta marker `0x83` followed by the byte XOR `0x20`.
 * Decoding happens on raw bytes, before UTF-8 validation, because multibyte
 * characters are often only valid once unmasked.
 * See https://www.zsh.org/mla/users/2011/msg00154.html
 *
 * Continuation
 * ────────────
 * A command typed over several lines is written with a trailing `\` on every
 * line but the last:
 *
 *   : 1731622185:9;brew update\
 *   brew install opentofu
 *
 * The physical lines are joined with `\n` and kept verbatim, backslashes
 * included, so the entry can be written back unchanged.
 */

import { TextDecoder } from 'node:util';
import { LineDecodeError } from '../utils/errors.js';

/** Zsh's Meta marker byte. */
export const META = 0x83;

/** Mask applied to the byte following {@link META}. */
export const META_MASK = 0x20;

const LF = 0x0a;
const CR = 0x0d;
const EMPTY = new Uint8Array(0);

/** A physical line after unmetafication and UTF-8 validation. */
export interface DecodedLine {
  /** 1-based. */
  lineNumber: number;
  text: string;
}

// ─── Metafication ─────────────────────────────────────────────────────────────

/** Bytes zsh writes in metafied form. */
export function isMetafiable(byte: number): boolean {
  return byte === 0 || (byte >= META && byte <= 0xa2);
}

/**
 * Undo metafication on one line's bytes.
 *
 * Copies the input, then compacts it in place with a read cursor and a write
 * cursor. A Meta marker in last position has nothing to unmask and is kept.
 */
export function unmetafy(line: Uint8Array): Uint8Array {
  const buf = Uint8Array.from(line);
  let src = 0;
  let dst = 0;

  while (src < buf.length) {
    if (buf[src] === META && src + 1 < buf.length) {
      buf[dst] = buf[src + 1] ^ META_MASK;
      src += 2;
    } else {
      buf[dst] = buf[src];
      src += 1;
    }
    dst += 1;
  }

  return buf.subarray(0, dst);
}

/** Inverse of {@link unmetafy}: escape every metafiable byte. */
export function metafy(bytes: Uint8Array): Uint8Array {
  let extra = 0;
  for (const byte of bytes) {
    if (isMetafiable(byte)) extra++;
  }
  if (extra === 0) return bytes;

  const out = new Uint8Array(bytes.length + extra);
  let dst = 0;
  for (const byte of bytes) {
    if (isMetafiable(byte)) {
      out[dst++] = META;
      out[dst++] = byte ^ META_MASK;
    } else {
      out[dst++] = byte;
    }
  }
  return out;
}

// ─── Physical lines ───────────────────────────────────────────────────────────

/**
 * Split a byte stream into decoded physical lines.
 *
 * `chunks` may be a single Buffer holding the whole file or any iterable of
 * byte chunks; lines may span chunk boundaries. A last line without a
 * terminating newline is still yielded.
 *
 * @throws {LineDecodeError} when the chunk source throws, or a line is not
 *   valid UTF-8 after unmetafication.
 */
export function* decodeLines(chunks: Iterable<Uint8Array>): Generator<DecodedLine, void, undefined> {
  const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
  const iterator = chunks[Symbol.iterator]();
  let pending: Uint8Array = EMPTY;
  let lineNumber = 0;

  for (;;) {
    let step: IteratorResult<Uint8Array>;
    try {
      step = iterator.next();
    } catch (error) {
      throw new LineDecodeError(lineNumber + 1, error);
    }
    if (step.done) break;

    const data = pending.length > 0 ? concatBytes(pending, step.value) : step.value;
    let start = 0;
    let newline = data.indexOf(LF, start);

    while (newline !== -1) {
      lineNumber++;
      yield decodeLine(data.subarray(start, newline), lineNumber, decoder);
      start = newline + 1;
      newline = data.indexOf(LF, start);
    }

    pending = data.slice(start);
  }

  if (pending.length > 0) {
    lineNumber++;
    yield decodeLine(pending, lineNumber, decoder);
  }
}

function decodeLine(raw: Uint8Array, lineNumber: number, decoder: TextDecoder): DecodedLine {
  let bytes = unmetafy(raw);
  if (bytes.length > 0 && bytes[bytes.length - 1] === CR) {
    bytes = bytes.subarray(0, bytes.length - 1);
  }

  try {
    return { lineNumber, text: decoder.decode(bytes) };
  } catch (error) {
    throw new LineDecodeError(lineNumber, error);
  }
}

function concatBytes(a: Uint8Array, b: Uint8Array): Uint8Array {
  const out = new Uint8Array(a.length + b.length);
  out.set(a, 0);
  out.set(b, a.length);
  return out;
}

// ─── Logical records ──────────────────────────────────────────────────────────

/** `true` if the physical line continues on the next one. */
export function isContinuationLine(text: string): boolean {
  return text.trimEnd().endsWith('\\');
}

/**
 * Reassemble logical records from a byte stream.
 *
 * Single pass and lazy: the returned generator cannot be restarted. A record
 * still open at end of input (last line ends in `\`) is yielded rather than
 * dropped.
 *
 * @throws {LineDecodeError} see {@link decodeLines}.
 */
export function* decodeRecords(chunks: Iterable<Uint8Array>): Generator<string, void, undefined> {
  let parts: string[] = [];

  for (const { text } of decodeLines(chunks)) {
    parts.push(text);
    if (isContinuationLine(text)) continue;

    yield parts.join('\n');
    parts = [];
  }

  if (parts.length > 0) {
    yield parts.join('\n');
  }
}
