import { describe, expect, it } from 'vitest';
import { decodeModifiedUtf8, parseNbt, MAX_DEPTH } from './nbt';
import { getChild, tagsEqual } from './tag';
import { TagType } from './types';
import type { CompoundTag } from './types';
import {
  byte,
  byteArray,
  bytes,
  compound,
  double,
  float,
  int,
  intArray,
  list,
  long,
  longArray,
  short,
  string,
  writeNbt,
} from '../testing/nbtWriter';

function sample(): CompoundTag {
  return compound({
    b: byte(-5),
    s: short(-300),
    i: int(123456),
    l: long(-9007199254740993n),
    f: float(1.5),
    d: double(-0.25),
    str: string('minecraft:flint'),
    ba: byteArray([0, 127, -128]),
    ia: intArray([1, -1, 2147483647]),
    la: longArray([1n, -2n]),
    empty: list(TagType.End, []),
    items: list(TagType.Compound, [
      compound({ id: string('minecraft:flint'), Count: byte(5) }),
      compound({ id: string('minecraft:stick'), Count: byte(1) }),
    ]),
    nested: compound({ deeper: compound({ name: string('x') }) }),
  });
}

describe('parseNbt', () => {
  it('reads a hand-built big-endian stream', () => {
    // root compound "", Int "a" = 0x00000102, End
    const data = bytes(0x0a, [0, 0], 0x03, [0, 1], 0x61, [0, 0, 1, 2], 0x00);
    const { rootName, root } = parseNbt(data);

    expect(rootName).toBe('');
    expect(getChild(root, 'a')).toEqual({ type: TagType.Int, value: 258 });
  });

  it('decodes every tag type', () => {
    const { root } = parseNbt(writeNbt(sample()));

    expect(getChild(root, 'b')).toEqual({ type: TagType.Byte, value: -5 });
    expect(getChild(root, 's')).toEqual({ type: TagType.Short, value: -300 });
    expect(getChild(root, 'i')).toEqual({ type: TagType.Int, value: 123456 });
    expect(getChild(root, 'l')).toEqual({ type: TagType.Long, value: -9007199254740993n });
    expect(getChild(root, 'f')).toEqual({ type: TagType.Float, value: 1.5 });
    expect(getChild(root, 'd')).toEqual({ type: TagType.Double, value: -0.25 });
    expect(getChild(root, 'str')).toEqual({ type: TagType.String, value: 'minecraft:flint' });
    expect(getChild(root, 'ba')).toEqual({ type: TagType.ByteArray, value: Int8Array.from([0, 127, -128]) });
    expect(getChild(root, 'ia')).toEqual({ type: TagType.IntArray, value: Int32Array.from([1, -1, 2147483647]) });
    expect(getChild(root, 'la')).toEqual({ type: TagType.LongArray, value: BigInt64Array.from([1n, -2n]) });
    expect(getChild(root, 'empty')).toEqual({ type: TagType.List, elementType: TagType.End, value: [] });
  });

  it('round-trips a constructed tree', () => {
    const original = sample();
    const { rootName, root } = parseNbt(writeNbt(original, 'Level'));

    expect(rootName).toBe('Level');
    expect(tagsEqual(root, original)).toBe(true);
  });

  it('keeps compound insertion order', () => {
    const { root } = parseNbt(writeNbt(compound({ z: int(1), a: int(2), m: int(3) })));
    expect(Array.from(root.value.keys())).toEqual(['z', 'a', 'm']);
  });

  it('ignores bytes after the root compound', () => {
    const data = bytes(Array.from(writeNbt(compound({ a: int(1) }))), [0xff, 0xff]);
    expect(getChild(parseNbt(data).root, 'a')).toEqual({ type: TagType.Int, value: 1 });
  });

  it('decodes modified UTF-8 strings', () => {
    const text = 'a\u0000bé€\u{1F600}';
    const { root } = parseNbt(writeNbt(compound({ text: string(text) })));
    expect(getChild(root, 'text')).toEqual({ type: TagType.String, value: text });
  });

  it('accepts standard 4-byte UTF-8 sequences', () => {
    expect(decodeModifiedUtf8(Uint8Array.from([0xf0, 0x9f, 0x98, 0x80]))).toBe('\u{1F600}');
  });

  it('rejects overlong and out-of-range 4-byte sequences', () => {
    expect(() => decodeModifiedUtf8(Uint8Array.from([0xf0, 0x8f, 0xbf, 0xbf])))
      .toThrow('Invalid UTF-8 code point 0xffff at position 0');
    expect(() => decodeModifiedUtf8(Uint8Array.from([0x41, 0xf4, 0x90, 0x80, 0x80]), 5))
      .toThrow('Invalid UTF-8 code point 0x110000 at position 6');
  });

  it('rejects a stray continuation byte', () => {
    expect(() => decodeModifiedUtf8(Uint8Array.from([0x41, 0x80]), 10))
      .toThrow('Invalid modified UTF-8 lead byte 0x80 at position 11');
  });
});

describe('parseNbt errors', () => {
  it('fails with UnknownTag on a tag byte outside 0..12', () => {
    const data = bytes(0x0a, [0, 0], 0x0d, [0, 1], 0x61, 0x00);

    expect(() => parseNbt(data)).toThrow('Unknown tag type: 13 at position 3');
    expect(() => parseNbt(data)).toThrow(expect.objectContaining({ code: 'UnknownTag', offset: 3, tag: 13 }));
  });

  it('fails with NegativeLength on a negative list count', () => {
    const data = bytes(0x0a, [0, 0], 0x09, [0, 1], 0x61, 0x01, [0xff, 0xff, 0xff, 0xff], 0x00);

    expect(() => parseNbt(data)).toThrow(expect.objectContaining({ code: 'NegativeLength', offset: 8, length: -1 }));
  });

  it('fails with NegativeLength on a negative array count', () => {
    const data = bytes(0x0a, [0, 0], 0x0b, [0, 1], 0x61, [0xff, 0xff, 0xff, 0xfe], 0x00);

    expect(() => parseNbt(data)).toThrow(expect.objectContaining({ code: 'NegativeLength', offset: 7, length: -2 }));
  });

  it('fails with TypeMismatch when the root is not a compound', () => {
    const data = bytes(0x08, [0, 0], [0, 1], 0x61);

    expect(() => parseNbt(data)).toThrow('Expected Compound tag but found String at position 0');
  });

  it('fails with TruncatedInput on empty input', () => {
    expect(() => parseNbt(new Uint8Array(0))).toThrow(expect.objectContaining({ code: 'TruncatedInput', offset: 0 }));
  });

  it('fails with TruncatedInput at every cut point of a well-formed stream', () => {
    const data = writeNbt(sample(), 'root');

    for (let length = 0; length < data.length; length++) {
      expect(() => parseNbt(data.subarray(0, length)), `cut at ${length}`)
        .toThrow(expect.objectContaining({ code: 'TruncatedInput' }));
    }
  });

  it('fails before allocating an array larger than the input', () => {
    const data = bytes(0x0a, [0, 0], 0x0c, [0, 1], 0x61, [0x7f, 0xff, 0xff, 0xff]);

    expect(() => parseNbt(data)).toThrow(expect.objectContaining({ code: 'TruncatedInput', offset: 11 }));
  });

  it('rejects a non-empty list of End tags', () => {
    const data = bytes(0x0a, [0, 0], 0x09, [0, 1], 0x61, 0x00, [0, 0, 0, 2], 0x00);

    expect(() => parseNbt(data)).toThrow(expect.objectContaining({ code: 'InvalidInput', offset: 8 }));
  });

  it('rejects nesting deeper than the limit', () => {
    let node: CompoundTag = compound({});
    for (let i = 0; i < MAX_DEPTH; i++) {
      node = compound({ n: node });
    }

    expect(() => parseNbt(writeNbt(node))).toThrow(expect.objectContaining({ code: 'InvalidInput' }));
  });
});
