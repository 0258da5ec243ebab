/**
 * Type definitions for decoded NBT data.
 * Based on the Minecraft Named Binary Tag format (big-endian, Java edition).
 */

// Tag type ids as they appear in the stream
export const TagType = {
  End: 0,
  Byte: 1,
  Short: 2,
  Int: 3,
  Long: 4,
  Float: 5,
  Double: 6,
  ByteArray: 7,
  String: 8,
  List: 9,
  Compound: 10,
  IntArray: 11,
  LongArray: 12,
} as const;

export type TagTypeName = keyof typeof TagType;
export type TagTypeId = (typeof TagType)[TagTypeName];

export interface EndTag {
  type: typeof TagType.End;
}

export interface ByteTag {
  type: typeof TagType.Byte;
  value: number;
}

export interface ShortTag {
  type: typeof TagType.Short;
  value: number;
}

export interface IntTag {
  type: typeof TagType.Int;
  value: number;
}

export interface LongTag {
  type: typeof TagType.Long;
  value: bigint;
}

export interface FloatTag {
  type: typeof TagType.Float;
  value: number;
}

export interface DoubleTag {
  type: typeof TagType.Double;
  value: number;
}

export interface ByteArrayTag {
  type: typeof TagType.ByteArray;
  value: Int8Array;
}

export interface StringTag {
  type: typeof TagType.String;
  value: string;
}

export interface ListTag {
  type: typeof TagType.List;
  elementType: TagTypeId;
  value: TagNode[];
}

export interface CompoundTag {
  type: typeof TagType.Compound;
  // Map keeps insertion order for stable display
  value: Map<string, TagNode>;
}

export interface IntArrayTag {
  type: typeof TagType.IntArray;
  value: Int32Array;
}

export interface LongArrayTag {
  type: typeof TagType.LongArray;
  value: BigInt64Array;
}

export type TagNode =
  | EndTag
  | ByteTag
  | ShortTag
  | IntTag
  | LongTag
  | FloatTag
  | DoubleTag
  | ByteArrayTag
  | StringTag
  | ListTag
  | CompoundTag
  | IntArrayTag
  | LongArrayTag;

export type NumericTag = ByteTag | ShortTag | IntTag | FloatTag | DoubleTag;

/**
 * A decoded file: the root compound plus the name stored in its header.
 */
export interface NbtDocument {
  rootName: string;
  root: CompoundTag;
}

const TAG_NAMES: readonly TagTypeName[] = [
  'End', 'Byte', 'Short', 'Int', 'Long', 'Float', 'Double',
  'ByteArray', 'String', 'List', 'Compound', 'IntArray', 'LongArray',
];

export function isTagTypeId(value: number): value is TagTypeId {
  return Number.isInteger(value) && value >= TagType.End && value <= TagType.LongArray;
}

export function tagTypeName(type: TagTypeId): TagTypeName {
  return TAG_NAMES[type];
}
