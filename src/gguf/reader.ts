import { closeSync, fstatSync, openSync, readSync } from "fs";

// "GGUF" read as a little-endian u32.
export const GGUF_MAGIC = 0x46554747;
export const GGUF_MIN_VERSION = 2;

// Strings declaring more bytes than this are seeked past, never read.
export const MAX_STRING_BYTES = 1_000_000;

export enum GgufType {
  UINT8 = 0,
  INT8 = 1,
  UINT16 = 2,
  INT16 = 3,
  UINT32 = 4,
  INT32 = 5,
  FLOAT32 = 6,
  BOOL = 7,
  STRING = 8,
  ARRAY = 9,
  UINT64 = 10,
  INT64 = 11,
  FLOAT64 = 12,
}

const FIXED_WIDTHS: Partial<Record<number, number>> = {
  [GgufType.UINT8]: 1,
  [GgufType.INT8]: 1,
  [GgufType.BOOL]: 1,
  [GgufType.UINT16]: 2,
  [GgufType.INT16]: 2,
  [GgufType.UINT32]: 4,
  [GgufType.INT32]: 4,
  [GgufType.FLOAT32]: 4,
  [GgufType.UINT64]: 8,
  [GgufType.INT64]: 8,
  [GgufType.FLOAT64]: 8,
};

class FormatError extends Error {}

// Positional reads over an open file descriptor.
class Cursor {
  private position = 0;

  constructor(
    private readonly fd: number,
    private readonly size: number
  ) {}

  private read(length: number): Buffer {
    if (this.position + length > this.size) {
      throw new FormatError("unexpected end of file");
    }

    const buffer = Buffer.alloc(length);
    const bytesRead = readSync(this.fd, buffer, 0, length, this.position);
    if (bytesRead !== length) {
      throw new FormatError("short read");
    }

    this.position += length;
    return buffer;
  }

  skip(length: number): void {
    if (this.position + length > this.size) {
      throw new FormatError("unexpected end of file");
    }
    this.position += length;
  }

  u32(): number {
    return this.read(4).readUInt32LE(0);
  }

  u64(): number {
    const value = this.read(8).readBigUInt64LE(0);
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new FormatError("count out of range");
    }
    return Number(value);
  }

  // Null when the declared length is over the sanity ceiling (the bytes are skipped).
  string(): string | null {
    const length = this.u64();
    if (length > MAX_STRING_BYTES) {
      this.skip(length);
      return null;
    }
    return length === 0 ? "" : this.read(length).toString("utf-8");
  }
}

function skipValue(cursor: Cursor, type: number): void {
  const width = FIXED_WIDTHS[type];
  if (width !== undefined) {
    cursor.skip(width);
    return;
  }

  if (type === GgufType.STRING) {
    cursor.string();
    return;
  }

  if (type === GgufType.ARRAY) {
    const elementType = cursor.u32();
    const count = cursor.u64();
    const elementWidth = FIXED_WIDTHS[elementType];

    if (elementWidth !== undefined) {
      cursor.skip(elementWidth * count);
      return;
    }

    if (elementType !== GgufType.STRING) {
      throw new FormatError(`unsupported array element type ${elementType}`);
    }

    for (let i = 0; i < count; i++) {
      cursor.string();
    }
    return;
  }

  throw new FormatError(`unknown value type ${type}`);
}

function readStringArray(cursor: Cursor, type: number): string[] | null {
  if (type !== GgufType.ARRAY) {
    return null;
  }

  const elementType = cursor.u32();
  const count = cursor.u64();
  if (elementType !== GgufType.STRING) {
    return null;
  }

  const items: string[] = [];
  for (let i = 0; i < count; i++) {
    const item = cursor.string();
    if (item === null) {
      return null;
    }
    items.push(item);
  }
  return items;
}

function scan(cursor: Cursor, key: string): string[] | null {
  if (cursor.u32() !== GGUF_MAGIC) {
    return null;
  }

  if (cursor.u32() < GGUF_MIN_VERSION) {
    return null;
  }

  cursor.u64(); // tensor count
  const kvCount = cursor.u64();

  for (let i = 0; i < kvCount; i++) {
    const entryKey = cursor.string();
    if (entryKey === null) {
      return null;
    }

    const type = cursor.u32();
    if (entryKey === key) {
      return readStringArray(cursor, type);
    }
    skipValue(cursor, type);
  }

  return null;
}

/**
 * Read one string-array field (e.g. `general.tags`) from a GGUF header.
 *
 * Returns null for anything other than a well-formed file that carries the
 * key as an array of strings; never throws.
 */
export function readNamedArray(path: string, key: string): string[] | null {
  let fd: number;
  try {
    fd = openSync(path, "r");
  } catch {
    return null;
  }

  try {
    return scan(new Cursor(fd, fstatSync(fd).size), key);
  } catch {
    return null;
  } finally {
    closeSync(fd);
  }
}
