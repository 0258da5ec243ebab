/**
 * NBT writer and tag builders for test fixtures.
 */

import { TagType } from '../parser/types';
import type { CompoundTag, ListTag, TagNode, TagTypeId } from '../parser/types';

export const byte = (value: number): TagNode => ({ type: TagType.Byte, value });
export const short = (value: number): TagNode => ({ type: TagType.Short, value });
export const int = (value: number): TagNode => ({ type: TagType.Int, value });
export const long = (value: bigint): TagNode => ({ type: TagType.Long, value });
export const float = (value: number): TagNode => ({ type: TagType.Float, value });
export const double = (value: number): TagNode => ({ type: TagType.Double, value });
export const string = (value: string): TagNode => ({ type: TagType.String, value });
export const byteArray = (values: number[]): TagNode => ({ type: TagType.ByteArray, value: Int8Array.from(values) });
export const intArray = (values: number[]): TagNode => ({ type: TagType.IntArray, value: Int32Array.from(values) });
export const longArray = (values: bigint[]): TagNode => ({ type: TagType.LongArray, value: BigInt64Array.from(values) });

export function list(elementType: TagTypeId, value: TagNode[]): ListTag {
  return { type: TagType.List, elementType, value };
}

export function compound(entries: Record<string, TagNode>): CompoundTag {
  return { type: TagType.Compound, value: new Map(Object.entries(entries)) };
}

function encodeModifiedUtf8(text: string): number[] {
  const out: number[] = [];
  for (let i = 0; i < text.length; i++) {
    const c = text.charCodeAt(i);
    if (c !== 0 && c < 0x80) {
      out.push(c);
    } else if (c < 0x800) {
      out.push(0xc0 | (c >> 6), 0x80 | (c & 0x3f));
    } else {
      out.push(0xe0 | (c >> 12), 0x80 | ((c >> 6) & 0x3f), 0x80 | (c & 0x3f));
    }
  }
  return out;
}

class ByteSink {
  private bytes: number[] = [];

  u8(value: number): void {
    this.bytes.push(value & 0xff);
  }

  raw(values: ArrayLike<number>): void {
    for (let i = 0; i < values.length; i++) this.u8(values[i]);
  }

  private view(size: number, write: (view: DataView) => void): void {
    const buffer = new DataView(new ArrayBuffer(size));
    write(buffer);
    this.raw(new Uint8Array(buffer.buffer));
  }

  i16(value: number): void {
    this.view(2, (v) => v.setInt16(0, value, false));
  }

  u16(value: number): void {
    this.view(2, (v) => v.setUint16(0, value, false));
  }

  i32(value: number): void {
    this.view(4, (v) => v.setInt32(0, value, false));
  }

  i64(value: bigint): void {
    this.view(8, (v) => v.setBigInt64(0, value, false));
  }

  f32(value: number): void {
    this.view(4, (v) => v.setFloat32(0, value, false));
  }

  f64(value: number): void {
    this.view(8, (v) => v.setFloat64(0, value, false));
  }

  str(value: string): void {
    const encoded = encodeModifiedUtf8(value);
    this.u16(encoded.length);
    this.raw(encoded);
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }
}

function writePayload(sink: ByteSink, node: TagNode): void {
  switch (node.type) {
    case TagType.End:
      return;
    case TagType.Byte:
      sink.u8(node.value);
      return;
    case TagType.Short:
      sink.i16(node.value);
      return;
    case TagType.Int:
      sink.i32(node.value);
      return;
    case TagType.Long:
      sink.i64(node.value);
      return;
    case TagType.Float:
      sink.f32(node.value);
      return;
    case TagType.Double:
      sink.f64(node.value);
      return;
    case TagType.ByteArray:
      sink.i32(node.value.length);
      sink.raw(node.value);
      return;
    case TagType.String:
      sink.str(node.value);
      return;
    case TagType.List:
      sink.u8(node.elementType);
      sink.i32(node.value.length);
      node.value.forEach((item) => writePayload(sink, item));
      return;
    case TagType.Compound:
      for (const [name, value] of node.value) {
        sink.u8(value.type);
        sink.str(name);
        writePayload(sink, value);
      }
      sink.u8(TagType.End);
      return;
    case TagType.IntArray:
      sink.i32(node.value.length);
      node.value.forEach((v) => sink.i32(v));
      return;
    case TagType.LongArray:
      sink.i32(node.value.length);
      node.value.forEach((v) => sink.i64(v));
      return;
  }
}

/**
 * Encode a named root compound as an uncompressed NBT stream.
 */
export function writeNbt(root: CompoundTag, rootName: string = ''): Uint8Array {
  const sink = new ByteSink();
  sink.u8(TagType.Compound);
  sink.str(rootName);
  writePayload(sink, root);
  return sink.toBytes();
}

/**
 * Build a stream byte by byte, for malformed inputs the writer cannot produce.
 */
export function bytes(...parts: Array<number | number[]>): Uint8Array {
  return Uint8Array.from(parts.flat());
}
