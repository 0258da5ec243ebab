/**
 * Read container dumps: a JSON array of placed containers with their items.
 *
 *   [{ "id": "minecraft:chest", "x": 10, "y": 64, "z": -3, "dimension": "minecraft:overworld",
 *      "is_dungeon": false, "items": [{ "Slot": 0, "id": "minecraft:diamond", "count": 3, "nbt": {...} }] }]
 *
 * `items` may also be an object keyed by slot number.
 */

import { Logger } from '../log';
import { InvalidInputError } from '../parser/errors';
import { DEFAULT_LAYOUT } from './config';
import type { LayoutConfig } from './config';
import { isAir, normalizeItemId } from './backpacks';
import type { ContainerRecord, ContainerSlot, ExtractResult, Position, RecordWarning } from './types';

const log = new Logger({ namespace: 'containers' });

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toInteger(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return Math.trunc(value);
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) return Number(value.trim());
  return undefined;
}

function toCoordinate(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function readSlot(item: JsonObject, fallbackSlot: number): ContainerSlot | undefined {
  const rawId = item['id'];
  if (typeof rawId !== 'string') return undefined;

  const id = normalizeItemId(rawId);
  if (isAir(id)) return undefined;

  const count = toInteger(item['count']) ?? toInteger(item['Count']) ?? 1;
  const slot = toInteger(item['Slot']) ?? fallbackSlot;
  const nbt = item['nbt'] ?? item['tag'] ?? item['components'];

  return nbt === undefined ? { slot, id, count } : { slot, id, count, nbt };
}

/**
 * Turn an `items` value (array or slot-keyed object) into slots,
 * ordered as they appear in the dump.
 */
export function readContainerItems(rawItems: unknown): ContainerSlot[] {
  const slots: ContainerSlot[] = [];

  if (Array.isArray(rawItems)) {
    rawItems.forEach((item, i) => {
      if (!isObject(item)) return;
      const slot = readSlot(item, i);
      if (slot) slots.push(slot);
    });
  } else if (isObject(rawItems)) {
    for (const [key, item] of Object.entries(rawItems)) {
      const keySlot = toInteger(key);
      if (!isObject(item) || keySlot === undefined) continue;
      const slot = readSlot(item, keySlot);
      if (slot) slots.push(slot);
    }
  }

  return slots;
}

/**
 * Build one record from one array element, or explain why it was skipped.
 */
export function toContainerRecord(raw: unknown, index: number, layout: LayoutConfig = DEFAULT_LAYOUT): ContainerRecord | string {
  if (!isObject(raw)) return 'entry is not an object';

  const id = raw[layout.containerIdKey];
  if (typeof id !== 'string' || id.trim() === '') {
    return `missing container "${layout.containerIdKey}"`;
  }

  let isDungeon = false;
  const dungeonKey = layout.dungeonKeys.find((key) => raw[key] !== undefined);
  if (dungeonKey !== undefined) {
    const flag = raw[dungeonKey];
    if (typeof flag !== 'boolean') return `"${dungeonKey}" is not a boolean`;
    isDungeon = flag;
  }

  const rawItems = raw[layout.containerItemsKey];
  if (rawItems !== undefined && !Array.isArray(rawItems) && !isObject(rawItems)) {
    return `"${layout.containerItemsKey}" is neither an array nor an object`;
  }

  const dimension = raw[layout.dimensionKey];
  const position: Position = {
    x: toCoordinate(raw['x']),
    y: toCoordinate(raw['y']),
    z: toCoordinate(raw['z']),
  };

  return {
    kind: 'container',
    index,
    id: id.trim(),
    position,
    dimension: typeof dimension === 'string' ? dimension : 'Unknown',
    isDungeon,
    slots: readContainerItems(rawItems),
    rawItems: rawItems ?? [],
  };
}

/**
 * Parse a container dump. A malformed document fails as a whole;
 * a malformed entry is skipped with a warning.
 */
export function parseContainers(text: string, layout: LayoutConfig = DEFAULT_LAYOUT): ExtractResult<ContainerRecord> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new InvalidInputError(`Failed to parse container JSON: ${error instanceof Error ? error.message : error}`);
  }

  if (!Array.isArray(parsed)) {
    throw new InvalidInputError('Container JSON root must be an array');
  }

  const records: ContainerRecord[] = [];
  const warnings: RecordWarning[] = [];

  parsed.forEach((raw, index) => {
    const result = toContainerRecord(raw, index, layout);
    if (typeof result === 'string') {
      warnings.push({ index, message: result });
      log.warn(`Skipping container ${index}: ${result}`);
    } else {
      records.push(result);
    }
  });

  log.debug(`Read ${records.length} of ${parsed.length} containers`);
  return { records, warnings };
}
