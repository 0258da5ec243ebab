/**
 * Key names used to locate records inside decoded saves and container dumps.
 *
 * The defaults match Sophisticated Backpacks' `sophisticatedbackpacks.dat`
 * and the container exporter's JSON. Other mod versions can override any key
 * with a JSON file passed through `--config`.
 */

import { InvalidInputError } from '../parser/errors';

export interface LayoutConfig {
  // Backpack saves
  contentsKey: string;
  accessLogKey: string;
  dataKey: string;
  inventoryKey: string;
  upgradeInventoryKey: string;
  contentsWrapperKey: string;
  itemsKey: string;
  uuidKeys: string[];
  ownerNameKeys: string[];
  accessTimeKeys: string[];
  searchDepth: number;

  // Container dumps
  containerIdKey: string;
  containerItemsKey: string;
  // First key present wins
  dungeonKeys: string[];
  dimensionKey: string;
}

export const DEFAULT_LAYOUT: Readonly<LayoutConfig> = {
  contentsKey: 'backpackContents',
  accessLogKey: 'accessLogRecords',
  dataKey: 'data',
  inventoryKey: 'inventory',
  upgradeInventoryKey: 'upgradeInventory',
  contentsWrapperKey: 'contents',
  itemsKey: 'Items',
  uuidKeys: ['uuid', 'backpackUuid'],
  ownerNameKeys: ['playerName', 'player'],
  accessTimeKeys: ['accessTime', 'lastAccess'],
  searchDepth: 3,

  containerIdKey: 'id',
  containerItemsKey: 'items',
  dungeonKeys: ['is_dungeon', 'dungeon'],
  dimensionKey: 'dimension',
};

type StringKey = {
  [K in keyof LayoutConfig]: LayoutConfig[K] extends string ? K : never;
}[keyof LayoutConfig];

type ListKey = {
  [K in keyof LayoutConfig]: LayoutConfig[K] extends string[] ? K : never;
}[keyof LayoutConfig];

const STRING_KEYS: readonly StringKey[] = [
  'contentsKey', 'accessLogKey', 'dataKey', 'inventoryKey', 'upgradeInventoryKey',
  'contentsWrapperKey', 'itemsKey', 'containerIdKey', 'containerItemsKey',
  'dimensionKey',
];

const LIST_KEYS: readonly ListKey[] = ['uuidKeys', 'ownerNameKeys', 'accessTimeKeys', 'dungeonKeys'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge a JSON override onto the defaults. Unknown keys are rejected so a
 * typo does not silently fall back to the default.
 */
export function loadLayoutConfig(text: string): LayoutConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new InvalidInputError(`Failed to parse layout config: ${error}`);
  }

  if (!isRecord(parsed)) {
    throw new InvalidInputError('Layout config must be a JSON object');
  }

  const config: LayoutConfig = {
    ...DEFAULT_LAYOUT,
    uuidKeys: [...DEFAULT_LAYOUT.uuidKeys],
    ownerNameKeys: [...DEFAULT_LAYOUT.ownerNameKeys],
    accessTimeKeys: [...DEFAULT_LAYOUT.accessTimeKeys],
    dungeonKeys: [...DEFAULT_LAYOUT.dungeonKeys],
  };

  for (const [key, value] of Object.entries(parsed)) {
    const stringKey = STRING_KEYS.find((k) => k === key);
    const listKey = LIST_KEYS.find((k) => k === key);

    if (stringKey) {
      if (typeof value !== 'string' || value === '') {
        throw new InvalidInputError(`Layout config "${key}" must be a non-empty string`);
      }
      config[stringKey] = value;
    } else if (listKey) {
      if (!Array.isArray(value) || value.length === 0 || !value.every((v) => typeof v === 'string')) {
        throw new InvalidInputError(`Layout config "${key}" must be a non-empty array of strings`);
      }
      config[listKey] = value.filter((v): v is string => typeof v === 'string');
    } else if (key === 'searchDepth') {
      if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
        throw new InvalidInputError('Layout config "searchDepth" must be a positive integer');
      }
      config.searchDepth = value;
    } else {
      throw new InvalidInputError(`Unknown layout config key "${key}"`);
    }
  }

  return config;
}
