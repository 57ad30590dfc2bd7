/**
 * bpfledger — Column binding helpers
 *
 * better-sqlite3 binds Buffers as BLOBs and returns BLOBs as Buffers; it
 * cannot bind booleans or `undefined`. These helpers sit between entity
 * fields and statement parameters.
 */

import { u8, u64 } from '../codec/uint-blob.js';
import type { UintCodec, UintWidth } from '../codec/uint-blob.js';

/** Encode a u64 identifier. */
export function encodeId(id: bigint): Buffer {
  return u64.encode(id);
}

/** Decode a u64 identifier. */
export function decodeId(bytes: Buffer): bigint {
  return u64.decode(bytes);
}

export function encodeOptional<W extends UintWidth>(
  codec: UintCodec<W>,
  value: bigint | number | undefined,
): Buffer | null {
  return value === undefined ? null : codec.encode(value);
}

export function decodeOptional<W extends UintWidth>(
  codec: UintCodec<W>,
  bytes: Buffer | null,
): bigint | undefined {
  return bytes === null ? undefined : codec.decode(bytes);
}

/** Same as decodeOptional() for widths that always fit in a JS number (<= 32). */
export function decodeOptionalNumber<W extends 8 | 16 | 32>(
  codec: UintCodec<W>,
  bytes: Buffer | null,
): number | undefined {
  return bytes === null ? undefined : Number(codec.decode(bytes));
}

/** Booleans stored as a one-byte u8 flag BLOB. */
export function encodeFlag(value: boolean | undefined): Buffer | null {
  return value === undefined ? null : u8.encode(value ? 1 : 0);
}

export function decodeFlag(bytes: Buffer | null): boolean | undefined {
  return bytes === null ? undefined : u8.decode(bytes) !== 0n;
}

/** Booleans stored as INTEGER 0/1. */
export function toSqliteBool(value: boolean | undefined): number | null {
  return value === undefined ? null : value ? 1 : 0;
}

export function fromSqliteBool(value: number | null): boolean | undefined {
  return value === null ? undefined : value !== 0;
}

export function orNull<T>(value: T | undefined): T | null {
  return value === undefined ? null : value;
}

export function orUndefined<T>(value: T | null): T | undefined {
  return value === null ? undefined : value;
}
