/**
 * Tests for the version log record format.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  HEADER_SIZE,
  RECORD_MAGIC,
  decodePayload,
  encodeRecord,
  payloadOf,
  scanRecords,
} from './version-codec.ts';

function concat(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const joined = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    joined.set(part, offset);
    offset += part.length;
  }
  return joined;
}

describe('encodeRecord', () => {
  it('should write the header fields big-endian', () => {
    const record = encodeRecord(1_700_000_000_123, 42, 'hello world');
    const view = new DataView(record.buffer);

    expect(Array.from(record.subarray(0, 4))).toEqual(Array.from(RECORD_MAGIC));
    expect(new TextDecoder().decode(record.subarray(0, 4))).toBe('DLVR');
    expect(Number(view.getBigUint64(4))).toBe(1_700_000_000_123);
    expect(view.getUint32(12)).toBe(42);
    expect(view.getUint32(16)).toBe(record.length - HEADER_SIZE);
  });
});

describe('scanRecords', () => {
  it('should find consecutive records and decode their payloads', () => {
    const log = concat(encodeRecord(1000, 1, 'first'), encodeRecord(2000, 2, 'second draft'));
    const onCorrupt = vi.fn();
    const records = scanRecords(log, onCorrupt);

    expect(records.map((record) => record.timestamp)).toEqual([1000, 2000]);
    expect(records.map((record) => record.wordCount)).toEqual([1, 2]);
    expect(decodePayload(payloadOf(log, records[1]))).toEqual({ ok: true, value: 'second draft' });
    expect(onCorrupt).not.toHaveBeenCalled();
  });

  it('should skip garbage and resynchronize on the next marker', () => {
    const garbage = new TextEncoder().encode('junk');
    const log = concat(garbage, encodeRecord(1000, 1, 'kept'));
    const onCorrupt = vi.fn();
    const records = scanRecords(log, onCorrupt);

    expect(records).toHaveLength(1);
    expect(records[0].offset).toBe(4);
    expect(onCorrupt).toHaveBeenCalledWith(0, 'missing record marker');
  });

  it('should report a record cut short', () => {
    const whole = encodeRecord(1000, 1, 'complete');
    const cut = encodeRecord(2000, 1, 'cut off');
    const log = concat(whole, cut.subarray(0, cut.length - 3));
    const onCorrupt = vi.fn();

    expect(scanRecords(log, onCorrupt)).toHaveLength(1);
    expect(onCorrupt).toHaveBeenCalledWith(whole.length, 'payload runs past end of log');
  });

  it('should report a truncated header', () => {
    const log = concat(encodeRecord(1000, 1, 'complete'), RECORD_MAGIC);
    const onCorrupt = vi.fn();

    expect(scanRecords(log, onCorrupt)).toHaveLength(1);
    expect(onCorrupt).toHaveBeenCalledWith(log.length - 4, 'truncated header');
  });

  it('should not let a stretched length swallow the following record', () => {
    const alpha = encodeRecord(1000, 1, 'alpha');
    const bravo = encodeRecord(2000, 1, 'bravo');
    const charlie = encodeRecord(3000, 1, 'charlie');
    const log = concat(alpha, bravo, charlie);
    new DataView(log.buffer).setUint32(16, alpha.length - HEADER_SIZE + bravo.length);
    const onCorrupt = vi.fn();
    const records = scanRecords(log, onCorrupt);

    expect(records.map((record) => record.timestamp)).toEqual([2000, 3000]);
    expect(records[0].offset).toBe(alpha.length);
    expect(onCorrupt).toHaveBeenCalledTimes(1);
    expect(onCorrupt).toHaveBeenCalledWith(0, 'Payload checksum mismatch');
  });

  it('should reject a length that ends inside the next record', () => {
    const first = encodeRecord(1000, 1, 'first');
    const second = encodeRecord(2000, 1, 'second');
    const log = concat(first, second);
    new DataView(log.buffer).setUint32(16, first.length - HEADER_SIZE + 2);
    const onCorrupt = vi.fn();
    const records = scanRecords(log, onCorrupt);

    expect(records.map((record) => record.timestamp)).toEqual([2000]);
    expect(onCorrupt).toHaveBeenCalledWith(0, 'record does not end at a record boundary');
  });
});

describe('decodePayload', () => {
  it('should reject bytes that are not zlib data', () => {
    const result = decodePayload(Uint8Array.of(0xff, 0xff, 0x00, 0x01));
    expect(!result.ok && result.error.code).toBe('version_record_corrupt');
  });

  it('should reject a payload with trailing bytes after the zlib stream', () => {
    const record = encodeRecord(1000, 1, 'payload');
    const payload = concat(record.subarray(HEADER_SIZE), Uint8Array.of(1, 2, 3, 4));
    const result = decodePayload(payload);
    expect(!result.ok && result.error.message).toBe('Payload checksum mismatch');
  });
});
