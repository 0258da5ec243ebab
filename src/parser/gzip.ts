/**
 * Compression handling for NBT files.
 *
 * Level and save data (`*.dat`) is normally gzip-compressed; region chunks
 * use zlib. Uncompressed streams start directly with a tag byte.
 */

import * as pako from 'pako';
import { InvalidInputError } from './errors';

// Magic bytes for gzip
const GZIP_MAGIC = [0x1f, 0x8b];

// zlib CMF byte for deflate with a 32K window
const ZLIB_CMF = 0x78;

export type Compression = 'gzip' | 'zlib' | 'none';

/**
 * Detect the wrapper around an NBT stream.
 */
export function detectCompression(data: Uint8Array): Compression {
  if (data.length < 2) {
    return 'none';
  }

  if (data[0] === GZIP_MAGIC[0] && data[1] === GZIP_MAGIC[1]) {
    return 'gzip';
  }

  // zlib header check: CMF/FLG pair must be a multiple of 31
  if (data[0] === ZLIB_CMF && ((data[0] << 8) | data[1]) % 31 === 0) {
    return 'zlib';
  }

  return 'none';
}

/**
 * Check if data is compressed.
 */
export function isPacked(data: Uint8Array): boolean {
  return detectCompression(data) !== 'none';
}

/**
 * Decompress an NBT file.
 * Returns the uncompressed tag stream.
 */
export function decompress(data: Uint8Array): Uint8Array {
  if (!isPacked(data)) {
    // Already unpacked, return as-is
    return data;
  }

  try {
    // pako detects gzip and zlib headers on its own
    return pako.inflate(data);
  } catch (error) {
    throw new InvalidInputError(`Failed to decompress NBT file: ${error}`);
  }
}
