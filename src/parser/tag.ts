/**
 * Variant-checked accessors over decoded tags.
 *
 * Reads never coerce: asking a String tag for its compound throws
 * TypeMismatchError instead of returning something that looks empty.
 */

import { IndexOutOfRangeError, TypeMismatchError } from './errors';
import { TagType, tagTypeName } from './types';
import type {
  ByteArrayTag,
  CompoundTag,
  IntArrayTag,
  ListTag,
  LongArrayTag,
  NumericTag,
  TagNode,
} from './types';

function mismatch(expected: string, node: TagNode): TypeMismatchError {
  return new TypeMismatchError(expected, tagTypeName(node.type));
}

export function isCompound(node: TagNode | undefined): node is CompoundTag {
  return node?.type === TagType.Compound;
}

export function isList(node: TagNode | undefined): node is ListTag {
  return node?.type === TagType.List;
}

export function isNumeric(node: TagNode | undefined): node is NumericTag {
  switch (node?.type) {
    case TagType.Byte:
    case TagType.Short:
    case TagType.Int:
    case TagType.Float:
    case TagType.Double:
      return true;
    default:
      return false;
  }
}

export function asCompound(node: TagNode): CompoundTag {
  if (node.type !== TagType.Compound) throw mismatch('Compound', node);
  return node;
}

export function asList(node: TagNode): ListTag {
  if (node.type !== TagType.List) throw mismatch('List', node);
  return node;
}

export function asString(node: TagNode): string {
  if (node.type !== TagType.String) throw mismatch('String', node);
  return node.value;
}

/**
 * Value of any fixed-width numeric tag that fits a JS number.
 * Long tags are converted when they are within the safe integer range.
 */
export function asNumber(node: TagNode): number {
  if (isNumeric(node)) return node.value;
  if (node.type === TagType.Long) {
    const n = Number(node.value);
    if (Number.isSafeInteger(n)) return n;
  }
  throw mismatch('numeric', node);
}

export function asLong(node: TagNode): bigint {
  if (node.type === TagType.Long) return node.value;
  if (node.type === TagType.Byte || node.type === TagType.Short || node.type === TagType.Int) {
    return BigInt(node.value);
  }
  throw mismatch('Long', node);
}

export function asByteArray(node: TagNode): ByteArrayTag['value'] {
  if (node.type !== TagType.ByteArray) throw mismatch('ByteArray', node);
  return node.value;
}

export function asIntArray(node: TagNode): IntArrayTag['value'] {
  if (node.type !== TagType.IntArray) throw mismatch('IntArray', node);
  return node.value;
}

export function asLongArray(node: TagNode): LongArrayTag['value'] {
  if (node.type !== TagType.LongArray) throw mismatch('LongArray', node);
  return node.value;
}

/**
 * Child of a compound by name. A missing name is not an error.
 */
export function getChild(node: TagNode, name: string): TagNode | undefined {
  return asCompound(node).value.get(name);
}

/**
 * Element of a list or array tag, bounds-checked.
 */
export function at(node: TagNode, index: number): TagNode {
  const length = sizeOf(node);
  if (!Number.isInteger(index) || index < 0 || index >= length) {
    throw new IndexOutOfRangeError(index, length);
  }

  switch (node.type) {
    case TagType.List:
      return node.value[index];
    case TagType.ByteArray:
      return { type: TagType.Byte, value: node.value[index] };
    case TagType.IntArray:
      return { type: TagType.Int, value: node.value[index] };
    case TagType.LongArray:
      return { type: TagType.Long, value: node.value[index] };
    default:
      throw mismatch('List or array', node);
  }
}

/**
 * Number of elements of a list, array or compound.
 */
export function sizeOf(node: TagNode): number {
  switch (node.type) {
    case TagType.List:
    case TagType.ByteArray:
    case TagType.IntArray:
    case TagType.LongArray:
      return node.value.length;
    case TagType.Compound:
      return node.value.size;
    default:
      throw mismatch('List or array', node);
  }
}

/**
 * Follow a path of compound keys. Stops at the first missing key
 * or at a node that is not a compound.
 */
export function getPath(node: TagNode, path: readonly string[]): TagNode | undefined {
  let current: TagNode | undefined = node;
  for (const key of path) {
    if (!isCompound(current)) return undefined;
    current = current.value.get(key);
  }
  return current;
}

/** Shorthand for a string child, if present and a String tag. */
export function getString(node: TagNode, name: string): string | undefined {
  const child = getChild(node, name);
  return child?.type === TagType.String ? child.value : undefined;
}

/**
 * Structural equality: same variant, same values, same list element type
 * and same compound key set. Compound key order is ignored.
 */
export function tagsEqual(a: TagNode, b: TagNode): boolean {
  switch (a.type) {
    case TagType.End:
      return b.type === TagType.End;
    case TagType.Byte:
    case TagType.Short:
    case TagType.Int:
    case TagType.Float:
    case TagType.Double:
      return isNumeric(b) && b.type === a.type && Object.is(a.value, b.value);
    case TagType.Long:
      return b.type === TagType.Long && a.value === b.value;
    case TagType.String:
      return b.type === TagType.String && a.value === b.value;
    case TagType.ByteArray:
      return b.type === TagType.ByteArray && arraysEqual(a.value, b.value);
    case TagType.IntArray:
      return b.type === TagType.IntArray && arraysEqual(a.value, b.value);
    case TagType.LongArray:
      return b.type === TagType.LongArray && arraysEqual(a.value, b.value);
    case TagType.List:
      return b.type === TagType.List
        && a.elementType === b.elementType
        && a.value.length === b.value.length
        && a.value.every((item, i) => tagsEqual(item, b.value[i]));
    case TagType.Compound: {
      if (b.type !== TagType.Compound || a.value.size !== b.value.size) return false;
      for (const [key, value] of a.value) {
        const other = b.value.get(key);
        if (!other || !tagsEqual(value, other)) return false;
      }
      return true;
    }
  }
}

function arraysEqual<T extends number | bigint>(a: ArrayLike<T>, b: ArrayLike<T>): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
