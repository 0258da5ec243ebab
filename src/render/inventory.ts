/**
 * Inventory grid renderer.
 *
 * Each matched record becomes a panel: a header with the record's details,
 * an upgrade row for backpacks, then a 9-column slot grid. Panels are stacked
 * vertically into one image. Item textures are not available, so every item
 * id gets a stable colour swatch instead of an icon.
 */

import { formatCount, formatPosition, formatShortDate } from '../format';
import { Logger } from '../log';
import type { InventoryRecord, SlotItem } from '../query/types';
import { Canvas, GLYPH_HEIGHT, measureText } from './canvas';
import type { Rgb } from './canvas';

export const SLOT_SIZE = 36;
export const GRID_COLS = 9;
export const PADDING = 8;
export const TEXT_SCALE = 2;
// Containers never have more than 9 rows (a double chest has 6)
export const MAX_CONTAINER_ROWS = 9;
// The largest backpack with stack upgrades stays well under 16 rows
export const MAX_BACKPACK_ROWS = 16;

const log = new Logger({ namespace: 'render' });

const LINE_HEIGHT = GLYPH_HEIGHT * TEXT_SCALE + 6;
const ICON_INSET = 5;

const COLORS = {
  background: [198, 198, 198],
  slot: [139, 139, 139],
  slotShadow: [55, 55, 55],
  slotHighlight: [255, 255, 255],
  text: [255, 255, 255],
  textShadow: [63, 63, 63],
  accentBackpack: [64, 96, 160],
  accentContainer: [128, 92, 52],
  accentDungeon: [160, 48, 48],
} as const satisfies Record<string, Rgb>;

/**
 * One slot to draw: where it goes, what it holds and its count label.
 */
export interface SlotCell {
  slot: number;
  id: string;
  count: number;
  label: string;
}

export interface InventoryPanel {
  title: string[];
  accent: Rgb;
  cells: SlotCell[];
  upgrades: SlotCell[];
  rows: number;
}

function toCell(slot: number, id: string, count: number): SlotCell {
  return { slot, id, count, label: count > 1 ? formatCount(count) : '' };
}

/**
 * Project a record into the cells and header text of its panel.
 */
export function layoutRecord(record: InventoryRecord): InventoryPanel {
  const slots: readonly SlotItem[] = record.slots;
  const maxRows = record.kind === 'backpack' ? MAX_BACKPACK_ROWS : MAX_CONTAINER_ROWS;
  const slotLimit = maxRows * GRID_COLS;

  const cells = slots
    .filter((s) => Number.isInteger(s.slot) && s.slot >= 0 && s.slot < slotLimit)
    .map((s) => toCell(s.slot, s.id, s.count));
  if (cells.length < slots.length) {
    log.warn(`Not drawing ${slots.length - cells.length} slot(s) of ${record.kind} ${record.index} outside slots 0..${slotLimit - 1}`);
  }

  const maxSlot = cells.reduce((max, cell) => Math.max(max, cell.slot), -1);
  const rows = Math.max(1, Math.floor(maxSlot / GRID_COLS) + 1);

  if (record.kind === 'backpack') {
    return {
      title: [
        `Owner: ${record.owner}`,
        `UUID: ${record.uuid ? `${record.uuid.slice(0, 8)}...` : '-'}`,
        `Last: ${formatShortDate(record.accessTime)}`,
      ],
      accent: COLORS.accentBackpack,
      cells,
      upgrades: record.upgrades.map((u, i) => toCell(i, u.id, u.count)),
      rows,
    };
  }

  return {
    title: [
      `Type: ${record.id}`,
      `Pos: ${formatPosition(record.position)}`,
      `Dim: ${record.dimension}`,
      `Dungeon: ${record.isDungeon ? 'YES' : 'No'}`,
    ],
    accent: record.isDungeon ? COLORS.accentDungeon : COLORS.accentContainer,
    cells,
    upgrades: [],
    rows,
  };
}

export function panelWidth(): number {
  return GRID_COLS * SLOT_SIZE + PADDING * 2;
}

function headerHeight(panel: InventoryPanel): number {
  return PADDING + panel.title.length * LINE_HEIGHT;
}

function upgradeRowHeight(panel: InventoryPanel): number {
  return panel.upgrades.length > 0 ? LINE_HEIGHT + SLOT_SIZE + PADDING : 0;
}

export function panelHeight(panel: InventoryPanel): number {
  return headerHeight(panel) + upgradeRowHeight(panel) + panel.rows * SLOT_SIZE + PADDING * 2;
}

/**
 * FNV-1a hash of the id mapped to a mid-brightness colour.
 */
export function colorForItem(id: string): Rgb {
  let hash = 0x811c9dc5;
  for (let i = 0; i < id.length; i++) {
    hash ^= id.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return [64 + (hash & 0x7f), 64 + ((hash >>> 8) & 0x7f), 64 + ((hash >>> 16) & 0x7f)];
}

// Trim text to the pixel width available, marking the cut with "..."
function fitText(text: string, maxWidth: number): string {
  if (measureText(text, TEXT_SCALE) <= maxWidth) return text;
  let cut = text;
  while (cut.length > 0 && measureText(`${cut}...`, TEXT_SCALE) > maxWidth) {
    cut = cut.slice(0, -1);
  }
  return `${cut}...`;
}

function drawSlot(canvas: Canvas, x: number, y: number, cell?: SlotCell): void {
  canvas.fillRect(x, y, SLOT_SIZE, SLOT_SIZE, COLORS.slotShadow);
  canvas.fillRect(x + 2, y + 2, SLOT_SIZE - 2, SLOT_SIZE - 2, COLORS.slotHighlight);
  canvas.fillRect(x + 2, y + 2, SLOT_SIZE - 4, SLOT_SIZE - 4, COLORS.slot);

  if (!cell) return;

  canvas.fillRect(x + ICON_INSET, y + ICON_INSET, SLOT_SIZE - ICON_INSET * 2, SLOT_SIZE - ICON_INSET * 2, colorForItem(cell.id));

  if (cell.label) {
    const scale = measureText(cell.label, TEXT_SCALE) <= SLOT_SIZE - 6 ? TEXT_SCALE : 1;
    const tx = x + SLOT_SIZE - measureText(cell.label, scale) - 2;
    const ty = y + SLOT_SIZE - GLYPH_HEIGHT * scale - 3;
    canvas.drawText(tx, ty, cell.label, COLORS.text, scale, COLORS.textShadow);
  }
}

function drawPanel(canvas: Canvas, panel: InventoryPanel, top: number): void {
  const width = panelWidth();
  const textWidth = width - PADDING * 2;

  canvas.fillRect(0, top, width, headerHeight(panel) - PADDING / 2, panel.accent);
  panel.title.forEach((line, i) => {
    canvas.drawText(PADDING, top + PADDING + i * LINE_HEIGHT, fitText(line, textWidth), COLORS.text, TEXT_SCALE, COLORS.textShadow);
  });

  let y = top + headerHeight(panel);

  if (panel.upgrades.length > 0) {
    canvas.drawText(PADDING, y, 'Upgrades:', COLORS.text, TEXT_SCALE, COLORS.textShadow);
    y += LINE_HEIGHT;
    panel.upgrades.slice(0, GRID_COLS).forEach((cell, i) => {
      drawSlot(canvas, PADDING + i * SLOT_SIZE, y, cell);
    });
    y += SLOT_SIZE + PADDING;
  }

  y += PADDING;
  const bySlot = new Map(panel.cells.map((cell): [number, SlotCell] => [cell.slot, cell]));
  for (let row = 0; row < panel.rows; row++) {
    for (let col = 0; col < GRID_COLS; col++) {
      const slot = row * GRID_COLS + col;
      drawSlot(canvas, PADDING + col * SLOT_SIZE, y + row * SLOT_SIZE, bySlot.get(slot));
    }
  }
}

/**
 * Render panels stacked top to bottom into one canvas.
 */
export function renderPanels(panels: readonly InventoryPanel[]): Canvas {
  if (panels.length === 0) {
    throw new RangeError('Nothing to render');
  }

  const height = panels.reduce((sum, panel) => sum + panelHeight(panel), 0);
  const canvas = new Canvas(panelWidth(), height, COLORS.background);

  let top = 0;
  for (const panel of panels) {
    drawPanel(canvas, panel, top);
    top += panelHeight(panel);
  }

  return canvas;
}

export function renderInventories(records: readonly InventoryRecord[]): Canvas {
  return renderPanels(records.map(layoutRecord));
}
