/**
 * Query-facing views of backpacks and containers.
 */

import type { CompoundTag } from '../parser/types';

export interface SlotItem {
  readonly slot: number;
  readonly id: string;
  readonly count: number;
}

export interface BackpackSlot extends SlotItem {
  // Remaining item data (components, enchantments, ...) when present
  readonly tag?: CompoundTag;
}

export interface UpgradeItem {
  readonly id: string;
  readonly count: number;
}

export interface BackpackRecord {
  readonly kind: 'backpack';
  readonly index: number;
  readonly uuid: string;
  readonly owner: string;
  readonly accessTime?: bigint;
  readonly slots: readonly BackpackSlot[];
  readonly upgrades: readonly UpgradeItem[];
}

export interface ContainerSlot extends SlotItem {
  readonly nbt?: unknown;
}

export interface Position {
  readonly x?: number;
  readonly y?: number;
  readonly z?: number;
}

export interface ContainerRecord {
  readonly kind: 'container';
  readonly index: number;
  readonly id: string;
  readonly position: Position;
  readonly dimension: string;
  readonly isDungeon: boolean;
  readonly slots: readonly ContainerSlot[];
  // Items exactly as they appeared in the dump, for free-text NBT search
  readonly rawItems: unknown;
}

export type InventoryRecord = BackpackRecord | ContainerRecord;

/**
 * A record that was skipped. Extraction keeps going past these.
 */
export interface RecordWarning {
  readonly index: number;
  readonly message: string;
}

export interface ExtractResult<T> {
  records: T[];
  warnings: RecordWarning[];
}

/**
 * Active predicates for one query. All present members must hold.
 */
export interface FilterSpec {
  readonly owner?: string;
  readonly item?: string;
  readonly itemContains?: string;
  readonly upgrade?: string;
  readonly containerType?: string;
  readonly excludeDungeon?: boolean;
  readonly nbt?: string;
  readonly query?: string;
}

export const UNKNOWN_OWNER = 'Unknown';
