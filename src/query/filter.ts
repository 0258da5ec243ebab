/**
 * Filter evaluation over backpack and container records.
 *
 * Every predicate present in the FilterSpec must hold. Matching is a pure
 * function of (record, spec); string comparisons are case-sensitive.
 * Predicates that do not apply to a record kind are ignored for it:
 * owner and upgrade only concern backpacks, container type, dungeon
 * exclusion and NBT text only concern containers.
 */

import type {
  BackpackRecord,
  ContainerRecord,
  FilterSpec,
  InventoryRecord,
  SlotItem,
} from './types';

export const BACKPACK_PREDICATES = ['owner', 'item', 'itemContains', 'upgrade', 'query'] as const;
export const CONTAINER_PREDICATES = ['containerType', 'excludeDungeon', 'item', 'itemContains', 'nbt', 'query'] as const;

export type FilterKey = keyof FilterSpec;

const FILTER_KEYS: readonly FilterKey[] = [
  'owner', 'item', 'itemContains', 'upgrade', 'containerType', 'excludeDungeon', 'nbt', 'query',
];

/**
 * Flatten a JSON value into SNBT-like text. Strings are kept verbatim, so a
 * stringified NBT blob reads the same as its object form.
 */
export function flattenJson(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value === null || value === undefined) return 'null';
  if (Array.isArray(value)) return `[${value.map(flattenJson).join(',')}]`;
  if (typeof value === 'object') {
    const entries = Object.entries(value).map(([key, v]) => `${key}:${flattenJson(v)}`);
    return `{${entries.join(',')}}`;
  }
  return String(value);
}

function hasItem(slots: readonly SlotItem[], spec: FilterSpec): boolean {
  const { item, itemContains } = spec;
  if (item !== undefined && !slots.some((s) => s.id === item)) return false;
  if (itemContains !== undefined && !slots.some((s) => s.id.includes(itemContains))) return false;
  return true;
}

export function matchesBackpack(record: BackpackRecord, spec: FilterSpec): boolean {
  const { owner, upgrade, query } = spec;

  if (owner !== undefined && record.owner !== owner && record.uuid !== owner) return false;
  if (!hasItem(record.slots, spec)) return false;
  if (upgrade !== undefined && !record.upgrades.some((u) => u.id === upgrade)) return false;

  if (query !== undefined) {
    const found = record.owner.includes(query)
      || record.uuid.includes(query)
      || record.slots.some((s) => s.id.includes(query))
      || record.upgrades.some((u) => u.id.includes(query));
    if (!found) return false;
  }

  return true;
}

export function matchesContainer(record: ContainerRecord, spec: FilterSpec): boolean {
  const { containerType, excludeDungeon, nbt, query } = spec;

  if (excludeDungeon && record.isDungeon) return false;
  if (containerType !== undefined && record.id !== containerType) return false;
  if (!hasItem(record.slots, spec)) return false;
  if (nbt !== undefined && !flattenJson(record.rawItems).includes(nbt)) return false;

  if (query !== undefined) {
    const found = record.id.includes(query) || record.slots.some((s) => s.id.includes(query));
    if (!found) return false;
  }

  return true;
}

export function matchesFilter(record: InventoryRecord, spec: FilterSpec): boolean {
  return record.kind === 'backpack' ? matchesBackpack(record, spec) : matchesContainer(record, spec);
}

/**
 * Ordered subsequence of records matching every active predicate.
 */
export function filterRecords<T extends InventoryRecord>(records: readonly T[], spec: FilterSpec): T[] {
  return records.filter((record) => matchesFilter(record, spec));
}

/**
 * Active predicates that have no effect for the given record kind.
 */
export function ignoredPredicates(spec: FilterSpec, kind: InventoryRecord['kind']): FilterKey[] {
  const applicable: readonly FilterKey[] = kind === 'backpack' ? BACKPACK_PREDICATES : CONTAINER_PREDICATES;
  return FILTER_KEYS
    .filter((key) => spec[key] !== undefined && spec[key] !== false && !applicable.includes(key));
}
