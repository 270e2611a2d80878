import type { ServerHitRecord } from '@pothole-radar/domain';
import { decodeRecord, encodeRecord } from '../wire/hit.codec.js';

/** Each frame: 4-byte little-endian payload length, then UTF-8 JSON. */
const LENGTH_PREFIX_BYTES = 4;

export interface DecodedFrames {
  records: ServerHitRecord[];
  /** Complete frames whose payload was not a valid record. */
  invalid: number;
  /** Trailing bytes too short to hold the frame they announce. */
  truncatedBytes: number;
}

export function encodeFrame(record: ServerHitRecord): Buffer {
  const payload = Buffer.from(JSON.stringify(encodeRecord(record)), 'utf8');
  const header = Buffer.alloc(LENGTH_PREFIX_BYTES);
  header.writeUInt32LE(payload.length, 0);
  return Buffer.concat([header, payload]);
}

export function decodeFrames(data: Buffer): DecodedFrames {
  const records: ServerHitRecord[] = [];
  let invalid = 0;
  let offset = 0;

  while (offset + LENGTH_PREFIX_BYTES <= data.length) {
    const length = data.readUInt32LE(offset);
    const start = offset + LENGTH_PREFIX_BYTES;
    const end = start + length;
    if (end > data.length) break;

    const record = parsePayload(data.subarray(start, end));
    if (record) records.push(record);
    else invalid++;
    offset = end;
  }

  return { records, invalid, truncatedBytes: data.length - offset };
}

function parsePayload(payload: Buffer): ServerHitRecord | null {
  let json: unknown;
  try {
    json = JSON.parse(payload.toString('utf8'));
  } catch {
    return null;
  }
  return decodeRecord(json);
}
