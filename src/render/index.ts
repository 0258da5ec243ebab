/**
 * Rendering module exports
 */

export * from './canvas';
export * from './png';
export * from './inventory';

import * as fs from 'fs';
import { encodePng } from './png';
import type { RgbaImage } from './canvas';

/**
 * Encode an image as PNG and write it to disk.
 * Returns the number of bytes written.
 */
export function writeImage(path: string, image: RgbaImage): number {
  const png = encodePng(image);
  fs.writeFileSync(path, png);
  return png.length;
}
