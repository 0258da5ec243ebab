/**
 * NBT (Named Binary Tag) Parser
 *
 * Based on: https://minecraft.wiki/w/NBT_format
 *
 * Reads the Java edition layout: big-endian numbers, strings prefixed with an
 * unsigned 16-bit length and encoded as modified UTF-8, and a named root
 * compound. Any malformed field aborts the whole decode.
 */

import {
  InvalidInputError,
  NegativeLengthError,
  TruncatedInputError,
  TypeMismatchError,
  UnknownTagError,
} from './errors';
import { TagType, isTagTypeId, tagTypeName } from './types';
import type { CompoundTag, ListTag, NbtDocument, TagNode, TagTypeId } from './types';

// Compounds and lists nested deeper than this are rejected
export const MAX_DEPTH = 512;

/**
 * Big-endian binary reader with bounds checking
 */
export class BinaryReader {
  private view: DataView;
  private pos: number = 0;

  constructor(buffer: ArrayBuffer | Uint8Array) {
    if (buffer instanceof Uint8Array) {
      this.view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    } else {
      this.view = new DataView(buffer);
    }
  }

  get position(): number {
    return this.pos;
  }

  get length(): number {
    return this.view.byteLength;
  }

  get remaining(): number {
    return this.length - this.pos;
  }

  // Every read goes through here so a short stream fails before DataView does
  private require(count: number): void {
    if (count > this.remaining) {
      throw new TruncatedInputError(count, this.remaining, this.pos);
    }
  }

  readByte(): number {
    this.require(1);
    const value = this.view.getInt8(this.pos);
    this.pos += 1;
    return value;
  }

  readUByte(): number {
    this.require(1);
    const value = this.view.getUint8(this.pos);
    this.pos += 1;
    return value;
  }

  readBytes(count: number): Uint8Array {
    this.require(count);
    const bytes = new Uint8Array(this.view.buffer, this.view.byteOffset + this.pos, count);
    this.pos += count;
    return bytes;
  }

  readInt16(): number {
    this.require(2);
    const value = this.view.getInt16(this.pos, false);
    this.pos += 2;
    return value;
  }

  readUInt16(): number {
    this.require(2);
    const value = this.view.getUint16(this.pos, false);
    this.pos += 2;
    return value;
  }

  readInt32(): number {
    this.require(4);
    const value = this.view.getInt32(this.pos, false);
    this.pos += 4;
    return value;
  }

  readInt64(): bigint {
    this.require(8);
    const value = this.view.getBigInt64(this.pos, false);
    this.pos += 8;
    return value;
  }

  readFloat(): number {
    this.require(4);
    const value = this.view.getFloat32(this.pos, false);
    this.pos += 4;
    return value;
  }

  readDouble(): number {
    this.require(8);
    const value = this.view.getFloat64(this.pos, false);
    this.pos += 8;
    return value;
  }

  // Read length-prefixed modified UTF-8 string
  readString(): string {
    const start = this.pos;
    const length = this.readUInt16();
    if (length === 0) return '';

    return decodeModifiedUtf8(this.readBytes(length), start + 2);
  }

  // Read a signed 32-bit element count
  readLength(): number {
    const start = this.pos;
    const length = this.readInt32();
    if (length < 0) {
      throw new NegativeLengthError(length, start);
    }
    return length;
  }
}

/**
 * Decode Java's modified UTF-8: NUL is written as C0 80 and characters
 * outside the BMP are written as two 3-byte surrogate halves.
 * Plain 4-byte UTF-8 sequences are accepted as well.
 */
export function decodeModifiedUtf8(bytes: Uint8Array, offset: number = 0): string {
  const units: number[] = [];
  let out = '';
  let i = 0;

  while (i < bytes.length) {
    const a = bytes[i];
    if (a < 0x80) {
      units.push(a);
      i += 1;
    } else if ((a & 0xe0) === 0xc0) {
      const b = continuation(bytes, i + 1, offset);
      units.push(((a & 0x1f) << 6) | b);
      i += 2;
    } else if ((a & 0xf0) === 0xe0) {
      const b = continuation(bytes, i + 1, offset);
      const c = continuation(bytes, i + 2, offset);
      units.push(((a & 0x0f) << 12) | (b << 6) | c);
      i += 3;
    } else if ((a & 0xf8) === 0xf0) {
      // Standard 4-byte UTF-8, written by some non-Java tools
      const b = continuation(bytes, i + 1, offset);
      const c = continuation(bytes, i + 2, offset);
      const d = continuation(bytes, i + 3, offset);
      const codePoint = ((a & 0x07) << 18) | (b << 12) | (c << 6) | d;
      if (codePoint < 0x10000 || codePoint > 0x10ffff) {
        throw new InvalidInputError(`Invalid UTF-8 code point 0x${codePoint.toString(16)}`, offset + i);
      }
      const offsetPoint = codePoint - 0x10000;
      units.push(0xd800 + (offsetPoint >> 10), 0xdc00 + (offsetPoint & 0x3ff));
      i += 4;
    } else {
      throw new InvalidInputError(`Invalid modified UTF-8 lead byte 0x${a.toString(16)}`, offset + i);
    }

    // Flush in chunks to keep the fromCharCode argument list bounded
    if (units.length >= 4096) {
      out += String.fromCharCode(...units);
      units.length = 0;
    }
  }

  return out + String.fromCharCode(...units);
}

function continuation(bytes: Uint8Array, index: number, offset: number): number {
  if (index >= bytes.length) {
    throw new InvalidInputError('Incomplete modified UTF-8 sequence', offset + index);
  }
  const byte = bytes[index];
  if ((byte & 0xc0) !== 0x80) {
    throw new InvalidInputError(`Invalid modified UTF-8 continuation byte 0x${byte.toString(16)}`, offset + index);
  }
  return byte & 0x3f;
}

/**
 * NBT Parser class
 */
export class NbtParser {
  private reader: BinaryReader;
  private depth = 0;

  constructor(data: Uint8Array) {
    this.reader = new BinaryReader(data);
  }

  /**
   * Parse the stream and return the named root compound.
   */
  parse(): NbtDocument {
    const start = this.reader.position;
    const type = this.readTagType();
    if (type !== TagType.Compound) {
      throw new TypeMismatchError('Compound', tagTypeName(type), start);
    }

    const rootName = this.reader.readString();
    const root = this.readCompound();
    return { rootName, root };
  }

  private readTagType(): TagTypeId {
    const start = this.reader.position;
    const tag = this.reader.readUByte();
    if (!isTagTypeId(tag)) {
      throw new UnknownTagError(tag, start);
    }
    return tag;
  }

  private readPayload(type: TagTypeId): TagNode {
    switch (type) {
      case TagType.End:
        return { type: TagType.End };
      case TagType.Byte:
        return { type, value: this.reader.readByte() };
      case TagType.Short:
        return { type, value: this.reader.readInt16() };
      case TagType.Int:
        return { type, value: this.reader.readInt32() };
      case TagType.Long:
        return { type, value: this.reader.readInt64() };
      case TagType.Float:
        return { type, value: this.reader.readFloat() };
      case TagType.Double:
        return { type, value: this.reader.readDouble() };
      case TagType.ByteArray:
        return { type, value: this.readByteArray() };
      case TagType.String:
        return { type, value: this.reader.readString() };
      case TagType.List:
        return this.readList();
      case TagType.Compound:
        return this.readCompound();
      case TagType.IntArray:
        return { type, value: this.readIntArray() };
      case TagType.LongArray:
        return { type, value: this.readLongArray() };
    }
  }

  private readCompound(): CompoundTag {
    this.enter();
    const value = new Map<string, TagNode>();

    for (;;) {
      const type = this.readTagType();
      if (type === TagType.End) break;

      const name = this.reader.readString();
      value.set(name, this.readPayload(type));
    }

    this.depth--;
    return { type: TagType.Compound, value };
  }

  private readList(): ListTag {
    this.enter();
    const elementType = this.readTagType();
    const count = this.reader.readLength();

    // An End-typed list carries no payloads; only an empty one is meaningful
    if (elementType === TagType.End && count > 0) {
      throw new InvalidInputError(`List of End tags with ${count} element(s)`, this.reader.position - 4);
    }

    const value: TagNode[] = [];
    for (let i = 0; i < count; i++) {
      value.push(this.readPayload(elementType));
    }

    this.depth--;
    return { type: TagType.List, elementType, value };
  }

  private readByteArray(): Int8Array {
    const count = this.reader.readLength();
    const bytes = this.reader.readBytes(count);
    return new Int8Array(bytes);
  }

  private readIntArray(): Int32Array {
    const count = this.reader.readLength();
    this.requireElements(count, 4);
    const values = new Int32Array(count);
    for (let i = 0; i < count; i++) {
      values[i] = this.reader.readInt32();
    }
    return values;
  }

  private readLongArray(): BigInt64Array {
    const count = this.reader.readLength();
    this.requireElements(count, 8);
    const values = new BigInt64Array(count);
    for (let i = 0; i < count; i++) {
      values[i] = this.reader.readInt64();
    }
    return values;
  }

  // Fail before allocating when the declared array cannot fit in what is left
  private requireElements(count: number, width: number): void {
    const needed = count * width;
    if (needed > this.reader.remaining) {
      throw new TruncatedInputError(needed, this.reader.remaining, this.reader.position);
    }
  }

  private enter(): void {
    this.depth++;
    if (this.depth > MAX_DEPTH) {
      throw new InvalidInputError(`Nesting deeper than ${MAX_DEPTH} levels`, this.reader.position);
    }
  }
}

/**
 * Parse uncompressed NBT data into its root compound.
 */
export function parseNbt(data: Uint8Array): NbtDocument {
  const parser = new NbtParser(data);
  return parser.parse();
}
