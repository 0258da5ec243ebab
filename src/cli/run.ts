/**
 * One query run: read the input, extract records, filter, report, render.
 */

import * as fs from 'fs';
import { Logger, Logging } from '../log';
import { formatPosition, formatShortDate } from '../format';
import { readNbtFile } from '../parser';
import { formatTag, tagToPlain } from '../parser/snbt';
import type { PlainValue } from '../parser/snbt';
import {
  DEFAULT_LAYOUT,
  extractBackpacks,
  filterRecords,
  ignoredPredicates,
  loadLayoutConfig,
  parseContainers,
} from '../query';
import type { ExtractResult, InventoryRecord, LayoutConfig, RecordWarning } from '../query';
import { renderInventories, writeImage } from '../render';
import type { CliOptions } from './args';

const log = new Logger({ namespace: 'main' });

export interface RunResult {
  total: number;
  matched: InventoryRecord[];
  warnings: RecordWarning[];
  imagePath?: string;
}

/**
 * Where the summary lines go; stdout by default.
 */
export type Printer = (line: string) => void;

function readLayout(path: string | undefined): LayoutConfig {
  if (!path) return DEFAULT_LAYOUT;
  log.debug(`Loading layout config from ${path}`);
  return loadLayoutConfig(fs.readFileSync(path, 'utf-8'));
}

/**
 * Read and extract every record of the input file, before filtering.
 */
export function loadRecords(options: Pick<CliOptions, 'file' | 'mode'>, layout: LayoutConfig): ExtractResult<InventoryRecord> {
  if (options.mode === 'container') {
    log.info(`Reading container data from: ${options.file}...`);
    return parseContainers(fs.readFileSync(options.file, 'utf-8'), layout);
  }

  log.info(`Reading NBT backpack data from: ${options.file}...`);
  const data = new Uint8Array(fs.readFileSync(options.file));
  const { document, compression } = readNbtFile(data);
  log.debug(`Decoded root "${document.rootName}" (${compression} compression, ${data.length} bytes)`);
  return extractBackpacks(document.root, layout);
}

/**
 * Summary lines for one record, in the style of the parse command output.
 */
export function describeRecord(record: InventoryRecord): string[] {
  const lines: string[] = [];

  if (record.kind === 'backpack') {
    lines.push(`Backpack ${record.uuid || '(root inventory)'}`);
    lines.push(`  Owner: ${record.owner}`);
    lines.push(`  Last access: ${formatShortDate(record.accessTime)}`);
    for (const upgrade of record.upgrades) {
      lines.push(`  Upgrade: ${upgrade.id} x${upgrade.count}`);
    }
    for (const slot of record.slots) {
      const extra = slot.tag ? ` ${formatTag(slot.tag)}` : '';
      lines.push(`  [${slot.slot}] ${slot.id} x${slot.count}${extra}`);
    }
  } else {
    lines.push(`Container ${record.id} at ${formatPosition(record.position)}`);
    lines.push(`  Dimension: ${record.dimension}`);
    lines.push(`  Dungeon: ${record.isDungeon ? 'Yes' : 'No'}`);
    for (const slot of record.slots) {
      lines.push(`  [${slot.slot}] ${slot.id} x${slot.count}`);
    }
  }

  return lines;
}

/**
 * JSON-serializable form of a record (bigints and tags converted).
 */
export function recordToJson(record: InventoryRecord): PlainValue {
  if (record.kind === 'backpack') {
    return {
      kind: record.kind,
      index: record.index,
      uuid: record.uuid,
      owner: record.owner,
      accessTime: record.accessTime === undefined ? null : record.accessTime.toString(),
      upgrades: record.upgrades.map((u) => ({ id: u.id, count: u.count })),
      slots: record.slots.map((s) => ({
        slot: s.slot,
        id: s.id,
        count: s.count,
        tag: s.tag ? tagToPlain(s.tag) : null,
      })),
    };
  }

  return {
    kind: record.kind,
    index: record.index,
    id: record.id,
    position: {
      x: record.position.x ?? null,
      y: record.position.y ?? null,
      z: record.position.z ?? null,
    },
    dimension: record.dimension,
    isDungeon: record.isDungeon,
    slots: record.slots.map((s) => ({ slot: s.slot, id: s.id, count: s.count })),
  };
}

export function run(options: CliOptions, print: Printer = console.log): RunResult {
  Logging.setMinLevel(options.verbose ? 'debug' : 'info');

  const layout = readLayout(options.config);
  const { records, warnings } = loadRecords(options, layout);

  const ignored = ignoredPredicates(options.filter, options.mode);
  if (ignored.length > 0) {
    log.warn(`Filters not used in ${options.mode} mode: ${ignored.join(', ')}`);
  }

  const matched = filterRecords(records, options.filter);
  log.info(`Found ${matched.length} of ${records.length} records matching filters.`);
  if (warnings.length > 0) {
    log.info(`Skipped ${warnings.length} malformed record(s).`);
  }

  if (options.json) {
    print(JSON.stringify(matched.map(recordToJson), null, 2));
  } else {
    for (const record of matched) {
      describeRecord(record).forEach((line) => print(line));
    }
  }

  if (matched.length === 0) {
    return { total: records.length, matched, warnings };
  }

  const bytes = writeImage(options.out, renderInventories(matched));
  log.info(`Image saved to ${options.out} (${bytes} bytes)`);

  return { total: records.length, matched, warnings, imagePath: options.out };
}
