/**
 * bpfledger — Order-preserving unsigned integer codec
 *
 * An unsigned integer of width W (8/16/32/64/128 bits) is stored as exactly
 * W / 8 bytes, big-endian. SQLite compares BLOB values with memcmp(), so for
 * two encodings of the same width the byte order equals the numeric order and
 * `ORDER BY`, `<`, `>` and range scans over BLOB columns behave numerically.
 *
 * There is no length prefix: a reader has to know the declared width of a
 * column, and decoding under any other width fails with
 * UintSizeMismatchError instead of truncating or padding.
 */

import { z } from 'zod';

// ============================================================
// Widths
// ============================================================

export const UINT_WIDTHS = [8, 16, 32, 64, 128] as const;
export type UintWidth = (typeof UINT_WIDTHS)[number];

/** Values accepted on the encode side. Numbers must be safe integers. */
export type UintInput = bigint | number;

export function isUintWidth(value: number): value is UintWidth {
  return UINT_WIDTHS.some((w) => w === value);
}

/** Largest value representable in `width` bits. */
export function maxUint(width: UintWidth): bigint {
  return (1n << BigInt(width)) - 1n;
}

/** Type name used in error messages, e.g. `u32`. */
export function uintTypeName(width: UintWidth): string {
  return `u${width}`;
}

function assertWidth(width: number): asserts width is UintWidth {
  if (!isUintWidth(width)) {
    throw new UintCodecError(
      `Unsupported width: ${width} (expected one of ${UINT_WIDTHS.join(', ')})`,
    );
  }
}

// ============================================================
// Errors
// ============================================================

export class UintCodecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UintCodecError';
  }
}

/** Byte length of the input does not match the declared width. */
export class UintSizeMismatchError extends UintCodecError {
  readonly expected: number;
  readonly actual: number;
  readonly typeName: string;

  constructor(expected: number, actual: number, typeName: string) {
    super(`Invalid input size: expected ${expected} bytes for \`${typeName}\`, got ${actual}`);
    this.name = 'UintSizeMismatchError';
    this.expected = expected;
    this.actual = actual;
    this.typeName = typeName;
  }
}

/** Value is negative, fractional, or does not fit in the declared width. */
export class UintRangeError extends UintCodecError {
  readonly value: string;
  readonly typeName: string;

  constructor(value: string, width: UintWidth) {
    super(`Value ${value} is out of range for \`${uintTypeName(width)}\` (0..${maxUint(width)})`);
    this.name = 'UintRangeError';
    this.value = value;
    this.typeName = uintTypeName(width);
  }
}

/** Two values of different widths were compared. */
export class UintWidthMismatchError extends UintCodecError {
  readonly left: string;
  readonly right: string;

  constructor(left: string, right: string) {
    super(`Cannot compare \`${left}\` with \`${right}\``);
    this.name = 'UintWidthMismatchError';
    this.left = left;
    this.right = right;
  }
}

// ============================================================
// encode / decode
// ============================================================

function toCheckedBigInt(value: UintInput, width: UintWidth): bigint {
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new UintRangeError(String(value), width);
    }
    return toCheckedBigInt(BigInt(value), width);
  }
  if (value < 0n || value > maxUint(width)) {
    throw new UintRangeError(value.toString(), width);
  }
  return value;
}

/**
 * Encode `value` as exactly `width / 8` big-endian bytes.
 *
 * @throws UintRangeError if the value does not fit in `width` bits
 */
export function encodeUint(value: UintInput, width: UintWidth): Buffer {
  assertWidth(width);
  let remaining = toCheckedBigInt(value, width);
  const bytes = Buffer.alloc(width / 8);
  for (let i = bytes.length - 1; i >= 0; i--) {
    bytes[i] = Number(remaining & 0xffn);
    remaining >>= 8n;
  }
  return bytes;
}

/**
 * Decode big-endian bytes produced by encodeUint() at the same width.
 *
 * @throws UintSizeMismatchError unless `bytes.length === width / 8`
 */
export function decodeUint(bytes: Uint8Array, width: UintWidth): bigint {
  assertWidth(width);
  const expected = width / 8;
  if (bytes.length !== expected) {
    throw new UintSizeMismatchError(expected, bytes.length, uintTypeName(width));
  }
  let value = 0n;
  for (const byte of bytes) {
    value = (value << 8n) | BigInt(byte);
  }
  return value;
}

/**
 * Unsigned lexicographic comparison, the same ordering SQLite applies to
 * BLOB values. A shorter sequence that is a prefix of a longer one sorts first.
 */
export function compareBytes(a: Uint8Array, b: Uint8Array): -1 | 0 | 1 {
  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    if (a[i] !== b[i]) {
      return a[i] < b[i] ? -1 : 1;
    }
  }
  if (a.length === b.length) return 0;
  return a.length < b.length ? -1 : 1;
}

// ============================================================
// UintBlob — a value tagged with its width
// ============================================================

/**
 * An unsigned integer together with the width it is stored at.
 *
 * Blobs of different widths never compare equal, even when the numeric value
 * is the same: 42 as `u8` is one byte, 42 as `u32` is four.
 */
export class UintBlob<W extends UintWidth = UintWidth> {
  readonly value: bigint;
  readonly width: W;

  private constructor(value: bigint, width: W) {
    this.value = value;
    this.width = width;
  }

  static from<W extends UintWidth>(value: UintInput, width: W): UintBlob<W> {
    assertWidth(width);
    return new UintBlob(toCheckedBigInt(value, width), width);
  }

  static fromBytes<W extends UintWidth>(bytes: Uint8Array, width: W): UintBlob<W> {
    return new UintBlob(decodeUint(bytes, width), width);
  }

  get typeName(): string {
    return uintTypeName(this.width);
  }

  toBytes(): Buffer {
    return encodeUint(this.value, this.width);
  }

  equals(other: UintBlob): boolean {
    return this.width === other.width && this.value === other.value;
  }

  compare(other: UintBlob): -1 | 0 | 1 {
    if (other.width !== this.width) {
      throw new UintWidthMismatchError(this.typeName, other.typeName);
    }
    if (this.value === other.value) return 0;
    return this.value < other.value ? -1 : 1;
  }

  toString(): string {
    return this.value.toString();
  }

  toJSON(): string {
    return this.value.toString();
  }
}

// ============================================================
// Width-bound codecs
// ============================================================

export interface UintCodec<W extends UintWidth> {
  readonly width: W;
  readonly byteLength: number;
  readonly typeName: string;
  readonly max: bigint;
  encode(value: UintInput): Buffer;
  decode(bytes: Uint8Array): bigint;
}

export function uintCodec<W extends UintWidth>(width: W): UintCodec<W> {
  assertWidth(width);
  return {
    width,
    byteLength: width / 8,
    typeName: uintTypeName(width),
    max: maxUint(width),
    encode: (value) => encodeUint(value, width),
    decode: (bytes) => decodeUint(bytes, width),
  };
}

export const u8 = uintCodec(8);
export const u16 = uintCodec(16);
export const u32 = uintCodec(32);
export const u64 = uintCodec(64);
export const u128 = uintCodec(128);

// ============================================================
// Zod schema
// ============================================================

/**
 * Accepts a bigint, a non-negative safe integer, or a decimal string and
 * produces a bigint that fits in `width` bits. JSON cannot carry integers
 * above 2^53 exactly, so wide identifiers arrive as strings.
 */
export function uintSchema(width: UintWidth) {
  const max = maxUint(width);
  return z
    .union([
      z.bigint(),
      z
        .number()
        .int()
        .nonnegative()
        .refine((n) => Number.isSafeInteger(n), { message: 'must be a safe integer' })
        .transform((n) => BigInt(n)),
      z
        .string()
        .regex(/^\d+$/, 'must be a decimal integer')
        .transform((s) => BigInt(s)),
    ])
    .refine((v) => v >= 0n && v <= max, {
      message: `must fit in ${uintTypeName(width)} (0..${max})`,
    });
}
