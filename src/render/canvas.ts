/**
 * RGBA raster with the few drawing operations the inventory renderer needs.
 */

import font from './font.json';

export type Rgb = readonly [number, number, number];

export interface RgbaImage {
  width: number;
  height: number;
  data: Uint8Array;
}

const GLYPHS: Record<string, readonly string[]> = font.glyphs;

export const GLYPH_WIDTH = font.width;
export const GLYPH_HEIGHT = font.height;

// One blank column between characters
const GLYPH_ADVANCE = GLYPH_WIDTH + 1;

function glyphFor(char: string): readonly string[] {
  return GLYPHS[char.toUpperCase()] ?? GLYPHS['?'];
}

export class Canvas implements RgbaImage {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;

  constructor(width: number, height: number, background: Rgb = [0, 0, 0]) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new RangeError(`Invalid canvas size ${width}x${height}`);
    }
    this.width = width;
    this.height = height;
    this.data = new Uint8Array(width * height * 4);
    this.fillRect(0, 0, width, height, background);
  }

  setPixel(x: number, y: number, color: Rgb): void {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return;
    const i = (y * this.width + x) * 4;
    this.data[i] = color[0];
    this.data[i + 1] = color[1];
    this.data[i + 2] = color[2];
    this.data[i + 3] = 255;
  }

  getPixel(x: number, y: number): [number, number, number, number] {
    const i = (y * this.width + x) * 4;
    return [this.data[i], this.data[i + 1], this.data[i + 2], this.data[i + 3]];
  }

  // Clipped to the canvas
  fillRect(x: number, y: number, w: number, h: number, color: Rgb): void {
    const x0 = Math.max(0, x);
    const y0 = Math.max(0, y);
    const x1 = Math.min(this.width, x + w);
    const y1 = Math.min(this.height, y + h);
    for (let py = y0; py < y1; py++) {
      for (let px = x0; px < x1; px++) {
        this.setPixel(px, py, color);
      }
    }
  }

  /**
   * Draw pixel-font text, optionally over a one-pixel drop shadow.
   * Returns the drawn width.
   */
  drawText(x: number, y: number, text: string, color: Rgb, scale: number = 1, shadow?: Rgb): number {
    if (shadow) this.drawGlyphs(x + scale, y + scale, text, shadow, scale);
    return this.drawGlyphs(x, y, text, color, scale);
  }

  private drawGlyphs(x: number, y: number, text: string, color: Rgb, scale: number): number {
    let cursor = x;
    for (const char of text) {
      glyphFor(char).forEach((row, gy) => {
        for (let gx = 0; gx < row.length; gx++) {
          if (row[gx] === '1') {
            this.fillRect(cursor + gx * scale, y + gy * scale, scale, scale, color);
          }
        }
      });
      cursor += GLYPH_ADVANCE * scale;
    }
    return cursor - x;
  }
}

/**
 * Width in pixels of text drawn at the given scale.
 */
export function measureText(text: string, scale: number = 1): number {
  return Array.from(text).length * GLYPH_ADVANCE * scale;
}
