/**
 * Binary layout of the version log.
 *
 * Each record is a fixed header followed by a zlib payload:
 *
 *   offset  size  field
 *   0       4     magic "DLVR"
 *   4       8     timestamp (u64 BE, epoch ms)
 *   12      4     word count (u32 BE)
 *   16      4     payload length (u32 BE)
 *   20      n     zlib-compressed UTF-8 content (Adler-32 trailer)
 *
 * The magic lets a reader resynchronize after a damaged record. The zlib
 * Adler-32 trailer is checked on decode, which also catches a payload
 * length that runs over into the next record.
 */

import { unzlibSync, zlibSync } from 'fflate';
import { EditorError, err, ok, type Result } from '../types/errors.ts';

export const RECORD_MAGIC = Uint8Array.of(0x44, 0x4c, 0x56, 0x52);
export const HEADER_SIZE = 20;

export interface RecordHeader {
  readonly timestamp: number;
  readonly wordCount: number;
  readonly payloadLength: number;
}

/**
 * A record located in a log buffer.
 */
export interface ScannedRecord extends RecordHeader {
  /** Byte offset of the record's magic */
  readonly offset: number;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8');

// =============================================================================
// Encoding
// =============================================================================

export function encodeRecord(timestamp: number, wordCount: number, content: string): Uint8Array {
  const payload = zlibSync(encoder.encode(content), { level: 6 });
  const record = new Uint8Array(HEADER_SIZE + payload.length);
  const view = new DataView(record.buffer);
  record.set(RECORD_MAGIC, 0);
  view.setBigUint64(4, BigInt(Math.max(0, Math.floor(timestamp))));
  view.setUint32(12, wordCount);
  view.setUint32(16, payload.length);
  record.set(payload, HEADER_SIZE);
  return record;
}

export function recordLength(header: RecordHeader): number {
  return HEADER_SIZE + header.payloadLength;
}

// =============================================================================
// Decoding
// =============================================================================

function hasMagicAt(bytes: Uint8Array, offset: number): boolean {
  if (offset + RECORD_MAGIC.length > bytes.length) return false;
  for (let i = 0; i < RECORD_MAGIC.length; i++) {
    if (bytes[offset + i] !== RECORD_MAGIC[i]) return false;
  }
  return true;
}

function findMagic(bytes: Uint8Array, from: number): number {
  for (let offset = from; offset + RECORD_MAGIC.length <= bytes.length; offset++) {
    if (hasMagicAt(bytes, offset)) return offset;
  }
  return -1;
}

function readHeader(bytes: Uint8Array, offset: number): RecordHeader {
  const view = new DataView(bytes.buffer, bytes.byteOffset + offset, HEADER_SIZE);
  return {
    timestamp: Number(view.getBigUint64(4)),
    wordCount: view.getUint32(12),
    payloadLength: view.getUint32(16),
  };
}

const ADLER_MODULUS = 65521;

function adler32(data: Uint8Array): number {
  let a = 1;
  let b = 0;
  for (let i = 0; i < data.length; i++) {
    a = (a + data[i]) % ADLER_MODULUS;
    b = (b + a) % ADLER_MODULUS;
  }
  return ((b << 16) | a) >>> 0;
}

/**
 * Decompress one record's payload. unzlibSync stops at the end of the
 * deflate stream, so the trailer is compared here: it must be the last
 * four bytes of the payload and match the inflated content.
 */
export function decodePayload(payload: Uint8Array): Result<string> {
  let inflated: Uint8Array;
  try {
    inflated = unzlibSync(payload);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return err(new EditorError('version_record_corrupt', `Payload does not inflate: ${detail}`, { cause: error }));
  }
  const view = new DataView(payload.buffer, payload.byteOffset, payload.length);
  if (payload.length < 4 || view.getUint32(payload.length - 4) !== adler32(inflated)) {
    return err(new EditorError('version_record_corrupt', 'Payload checksum mismatch'));
  }
  return ok(decoder.decode(inflated));
}

export function payloadOf(bytes: Uint8Array, record: ScannedRecord): Uint8Array {
  const start = record.offset + HEADER_SIZE;
  return bytes.subarray(start, start + record.payloadLength);
}

/**
 * Walk a log and return every intact record: the header fits, the record
 * ends at the end of the log or at the next magic, and the payload
 * decodes. Anything else is reported and skipped by scanning ahead for the
 * next magic, starting one byte past the bad record's own.
 */
export function scanRecords(
  bytes: Uint8Array,
  onCorrupt: (offset: number, reason: string) => void
): ScannedRecord[] {
  const records: ScannedRecord[] = [];
  let offset = 0;

  while (offset < bytes.length) {
    if (!hasMagicAt(bytes, offset)) {
      onCorrupt(offset, 'missing record marker');
      const next = findMagic(bytes, offset + 1);
      if (next === -1) break;
      offset = next;
      continue;
    }

    if (offset + HEADER_SIZE > bytes.length) {
      onCorrupt(offset, 'truncated header');
      break;
    }

    const header = readHeader(bytes, offset);
    const end = offset + recordLength(header);
    if (end > bytes.length) {
      onCorrupt(offset, 'payload runs past end of log');
      const next = findMagic(bytes, offset + 1);
      if (next === -1) break;
      offset = next;
      continue;
    }

    if (end < bytes.length && !hasMagicAt(bytes, end)) {
      onCorrupt(offset, 'record does not end at a record boundary');
      const next = findMagic(bytes, offset + 1);
      if (next === -1) break;
      offset = next;
      continue;
    }

    const record: ScannedRecord = { ...header, offset };
    const decoded = decodePayload(payloadOf(bytes, record));
    if (!decoded.ok) {
      onCorrupt(offset, decoded.error.message);
      const next = findMagic(bytes, offset + 1);
      if (next === -1) break;
      offset = next;
      continue;
    }

    records.push(record);
    offset = end;
  }

  return records;
}
