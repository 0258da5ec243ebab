/**
 * Parser module exports
 */

export * from './types';
export * from './errors';
export * from './gzip';
export * from './nbt';
export * from './tag';
export * from './snbt';

import { decompress, detectCompression } from './gzip';
import type { Compression } from './gzip';
import { parseNbt } from './nbt';
import type { NbtDocument } from './types';

/**
 * Parse raw file bytes, inflating a gzip or zlib wrapper first.
 */
export function readNbtFile(data: Uint8Array): { document: NbtDocument; compression: Compression } {
  const compression = detectCompression(data);
  const uncompressed = decompress(data);
  const document = parseNbt(uncompressed);
  return { document, compression };
}
