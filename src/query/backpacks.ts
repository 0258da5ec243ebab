/**
 * Build backpack records from a decoded Sophisticated Backpacks save.
 *
 * Layout of the save (key names come from LayoutConfig):
 *
 *   root
 *   └─ data
 *      ├─ accessLogRecords: [{ backpackUuid: [I;...], playerName, accessTime }]
 *      └─ backpackContents: [{ uuid: [I;...], contents: { inventory: { Items }, upgradeInventory: { Items } } }]
 *
 * `backpackContents` may also be a compound keyed by backpack uuid.
 */

import { Logger } from '../log';
import { TagType } from '../parser/types';
import type { CompoundTag, TagNode } from '../parser/types';
import { asNumber, getChild, getPath, isCompound, isList, isNumeric } from '../parser/tag';
import { DEFAULT_LAYOUT } from './config';
import type { LayoutConfig } from './config';
import { UNKNOWN_OWNER } from './types';
import type { BackpackRecord, BackpackSlot, ExtractResult, RecordWarning, UpgradeItem } from './types';

const log = new Logger({ namespace: 'backpacks' });

interface OwnerEntry {
  playerName: string;
  accessTime?: bigint;
}

/**
 * Format four signed 32-bit ints (most significant first) as a UUID string.
 */
export function uuidFromInts(ints: ArrayLike<number>): string | undefined {
  if (ints.length !== 4) return undefined;

  let hex = '';
  for (let i = 0; i < 4; i++) {
    hex += (ints[i] >>> 0).toString(16).padStart(8, '0');
  }
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

/**
 * Read a UUID stored as an int array, a list of ints, or a string.
 */
export function readUuid(node: TagNode | undefined): string | undefined {
  if (!node) return undefined;

  switch (node.type) {
    case TagType.IntArray:
      return uuidFromInts(node.value);
    case TagType.List: {
      if (node.elementType !== TagType.Int) return undefined;
      return uuidFromInts(node.value.map(asNumber));
    }
    case TagType.String:
      return node.value.trim().toLowerCase() || undefined;
    default:
      return undefined;
  }
}

/**
 * Normalize an item id: lowercase, without quotes or surrounding space.
 */
export function normalizeItemId(raw: string): string {
  return raw.toLowerCase().replace(/"/g, '').trim();
}

export function isAir(id: string): boolean {
  return id === '' || id === 'air' || id === 'minecraft:air';
}

function firstChild(node: CompoundTag, keys: readonly string[]): TagNode | undefined {
  for (const key of keys) {
    const child = node.value.get(key);
    if (child) return child;
  }
  return undefined;
}

function numberOr(node: TagNode | undefined, fallback: number): number {
  if (isNumeric(node)) return node.value;
  if (node?.type === TagType.Long) return Number(node.value);
  return fallback;
}

/**
 * Locate the compound that holds the contents key, breadth-first.
 * The `data` child of each level is searched before its siblings.
 */
export function findPayload(root: CompoundTag, layout: LayoutConfig = DEFAULT_LAYOUT): CompoundTag | undefined {
  let layer: CompoundTag[] = [root];

  for (let depth = 0; depth < layout.searchDepth && layer.length > 0; depth++) {
    const next: CompoundTag[] = [];
    for (const node of layer) {
      if (node.value.has(layout.contentsKey)) return node;

      const data = node.value.get(layout.dataKey);
      if (isCompound(data)) {
        if (data.value.has(layout.contentsKey)) return data;
        next.push(data);
      }
      for (const [key, child] of node.value) {
        if (key !== layout.dataKey && isCompound(child)) next.push(child);
      }
    }
    layer = next;
  }

  return undefined;
}

/**
 * Map backpack uuid to its last recorded owner.
 */
export function buildOwnerIndex(accessLog: TagNode | undefined, layout: LayoutConfig = DEFAULT_LAYOUT): Map<string, OwnerEntry> {
  const index = new Map<string, OwnerEntry>();
  if (!isList(accessLog)) return index;

  for (const entry of accessLog.value) {
    if (!isCompound(entry)) continue;

    const uuid = readUuid(firstChild(entry, layout.uuidKeys));
    if (!uuid) continue;

    const name = firstChild(entry, layout.ownerNameKeys);
    const time = firstChild(entry, layout.accessTimeKeys);
    index.set(uuid, {
      playerName: name?.type === TagType.String ? name.value : '',
      accessTime: time?.type === TagType.Long ? time.value : undefined,
    });
  }

  return index;
}

/**
 * Read the `Items` list of an inventory compound into slots.
 * Air and id-less stacks are dropped; count defaults to 1 and slot to
 * the position in the list.
 */
export function readInventory(inventory: TagNode | undefined, layout: LayoutConfig = DEFAULT_LAYOUT): BackpackSlot[] {
  if (!isCompound(inventory)) return [];
  const items = inventory.value.get(layout.itemsKey);
  if (!isList(items)) return [];

  const slots: BackpackSlot[] = [];
  items.value.forEach((item, i) => {
    if (!isCompound(item)) return;

    const idTag = getChild(item, 'id') ?? getChild(item, 'Name');
    const id = idTag?.type === TagType.String ? normalizeItemId(idTag.value) : '';
    if (isAir(id)) return;

    const count = numberOr(getChild(item, 'count') ?? getChild(item, 'Count'), 1);
    const slot = numberOr(getChild(item, 'Slot'), i);
    const tag = getChild(item, 'tag') ?? getChild(item, 'components');

    slots.push(isCompound(tag) ? { slot, id, count, tag } : { slot, id, count });
  });

  return slots;
}

/**
 * Name of the first inventory under the wrapper that exists but cannot be
 * read: not a compound, or with an items value that is not a list.
 */
function unreadableInventory(wrapper: CompoundTag, layout: LayoutConfig): string | undefined {
  return [layout.inventoryKey, layout.upgradeInventoryKey].find((key) => {
    const inventory = wrapper.value.get(key);
    if (inventory === undefined) return false;
    if (!isCompound(inventory)) return true;
    const items = inventory.value.get(layout.itemsKey);
    return items !== undefined && !isList(items);
  });
}

function readUpgrades(inventory: TagNode | undefined, layout: LayoutConfig): UpgradeItem[] {
  return readInventory(inventory, layout).map(({ id, count }) => ({ id, count }));
}

/**
 * Collect backpack entries. Returns [key, entry] pairs where key is the
 * compound key for the keyed shape.
 */
function listEntries(contents: TagNode): Array<[string | undefined, TagNode]> {
  if (isList(contents)) {
    return contents.value.map((entry): [undefined, TagNode] => [undefined, entry]);
  }
  if (isCompound(contents)) {
    return Array.from(contents.value.entries());
  }
  return [];
}

/**
 * Walk a decoded save and return one record per backpack.
 *
 * A root without a contents key but with an `Items` list (directly or under
 * `data`) is read as a single inventory.
 */
export function extractBackpacks(root: CompoundTag, layout: LayoutConfig = DEFAULT_LAYOUT): ExtractResult<BackpackRecord> {
  const records: BackpackRecord[] = [];
  const warnings: RecordWarning[] = [];

  const payload = findPayload(root, layout);
  if (!payload) {
    const inventory = [root, getChild(root, layout.dataKey)]
      .find((node) => isCompound(node) && isList(node.value.get(layout.itemsKey)));
    if (inventory) {
      log.debug(`No "${layout.contentsKey}" found; reading root "${layout.itemsKey}" as one inventory`);
      records.push({
        kind: 'backpack',
        index: 0,
        uuid: '',
        owner: UNKNOWN_OWNER,
        slots: readInventory(inventory, layout),
        upgrades: [],
      });
    } else {
      log.warn(`Could not locate "${layout.contentsKey}" in the NBT structure`);
    }
    return { records, warnings };
  }

  const owners = buildOwnerIndex(payload.value.get(layout.accessLogKey), layout);
  const contents = payload.value.get(layout.contentsKey);
  const entries = contents ? listEntries(contents) : [];
  log.debug(`Found ${entries.length} raw backpack entries`);

  entries.forEach(([key, entry], index) => {
    const skip = (message: string) => {
      warnings.push({ index, message });
      log.warn(`Skipping backpack entry ${index}: ${message}`);
    };

    if (!isCompound(entry)) {
      skip('entry is not a compound');
      return;
    }

    const uuid = readUuid(firstChild(entry, layout.uuidKeys))
      ?? (key !== undefined ? key.trim().toLowerCase() : undefined);
    if (!uuid) {
      skip('missing backpack uuid');
      return;
    }

    const wrapper = entry.value.get(layout.contentsWrapperKey);
    if (wrapper !== undefined && !isCompound(wrapper)) {
      skip(`"${layout.contentsWrapperKey}" is not a compound`);
      return;
    }

    const unreadable = isCompound(wrapper) ? unreadableInventory(wrapper, layout) : undefined;
    if (unreadable) {
      skip(`"${unreadable}" is not a readable inventory`);
      return;
    }

    const owner = owners.get(uuid);
    records.push({
      kind: 'backpack',
      index,
      uuid,
      owner: owner?.playerName || UNKNOWN_OWNER,
      accessTime: owner?.accessTime,
      slots: readInventory(getPath(entry, [layout.contentsWrapperKey, layout.inventoryKey]), layout),
      upgrades: readUpgrades(getPath(entry, [layout.contentsWrapperKey, layout.upgradeInventoryKey]), layout),
    });
  });

  return { records, warnings };
}
