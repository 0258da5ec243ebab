/**
 * Text renderings of decoded tags.
 */

import { TagType } from './types';
import type { TagNode } from './types';

const BARE_KEY = /^[A-Za-z0-9_\-.+]+$/;

function quote(text: string): string {
  return `"${text.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function formatKey(key: string): string {
  return BARE_KEY.test(key) ? key : quote(key);
}

function formatFloat(value: number): string {
  if (Number.isInteger(value)) return value.toFixed(1);
  return String(value);
}

/**
 * Flatten a tag into single-line SNBT, the notation used by `/data get`:
 * `{id:"minecraft:flint",Count:5b}`.
 * Compound keys keep their stored order so output is deterministic.
 */
export function formatTag(node: TagNode): string {
  switch (node.type) {
    case TagType.End:
      return '';
    case TagType.Byte:
      return `${node.value}b`;
    case TagType.Short:
      return `${node.value}s`;
    case TagType.Int:
      return String(node.value);
    case TagType.Long:
      return `${node.value}L`;
    case TagType.Float:
      return `${formatFloat(node.value)}f`;
    case TagType.Double:
      return `${formatFloat(node.value)}d`;
    case TagType.String:
      return quote(node.value);
    case TagType.ByteArray:
      return `[B;${Array.from(node.value, (b) => `${b}B`).join(',')}]`;
    case TagType.IntArray:
      return `[I;${Array.from(node.value).join(',')}]`;
    case TagType.LongArray:
      return `[L;${Array.from(node.value, (l) => `${l}L`).join(',')}]`;
    case TagType.List:
      return `[${node.value.map(formatTag).join(',')}]`;
    case TagType.Compound: {
      const entries: string[] = [];
      for (const [key, value] of node.value) {
        entries.push(`${formatKey(key)}:${formatTag(value)}`);
      }
      return `{${entries.join(',')}}`;
    }
  }
}

export type PlainValue =
  | null
  | boolean
  | number
  | string
  | PlainValue[]
  | { [key: string]: PlainValue };

/**
 * Convert a tag into JSON-serializable values.
 * Longs become decimal strings so no precision is lost.
 */
export function tagToPlain(node: TagNode): PlainValue {
  switch (node.type) {
    case TagType.End:
      return null;
    case TagType.Byte:
    case TagType.Short:
    case TagType.Int:
    case TagType.Float:
    case TagType.Double:
    case TagType.String:
      return node.value;
    case TagType.Long:
      return node.value.toString();
    case TagType.ByteArray:
    case TagType.IntArray:
      return Array.from(node.value);
    case TagType.LongArray:
      return Array.from(node.value, (l) => l.toString());
    case TagType.List:
      return node.value.map(tagToPlain);
    case TagType.Compound: {
      const out: { [key: string]: PlainValue } = {};
      for (const [key, value] of node.value) {
        // defineProperty keeps a "__proto__" key as an own property
        Object.defineProperty(out, key, { value: tagToPlain(value), enumerable: true, writable: true, configurable: true });
      }
      return out;
    }
  }
}
