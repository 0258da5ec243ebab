import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as pako from 'pako';
import { afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { Logging } from '../log';
import { TagType } from '../parser/types';
import { describeRecord, run } from './run';
import type { CliOptions } from './args';
import type { BackpackRecord } from '../query/types';
import { byte, compound, int, list, string, writeNbt } from '../testing/nbtWriter';

let dir: string;

beforeAll(() => {
  Logging.setSilent(true);
});

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'backpack-viewer-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function options(file: string, overrides: Partial<CliOptions> = {}): CliOptions {
  return {
    file,
    mode: 'backpack',
    filter: {},
    out: path.join(dir, 'out.png'),
    json: false,
    verbose: false,
    ...overrides,
  };
}

function writeSave(): string {
  const file = path.join(dir, 'save.dat');
  const root = compound({
    Items: list(TagType.Compound, [compound({ id: string('minecraft:flint'), Count: byte(5) })]),
  });
  fs.writeFileSync(file, pako.gzip(writeNbt(root)));
  return file;
}

function writeContainers(): string {
  const file = path.join(dir, 'containers.json');
  fs.writeFileSync(file, JSON.stringify([
    { id: 'minecraft:chest', x: 1, y: 64, z: 2, dimension: 'minecraft:overworld', items: [{ id: 'minecraft:diamond', count: 3 }] },
    { id: 'minecraft:chest', loot: true, items: [{ id: 'minecraft:diamond', count: 1 }] },
  ]));
  return file;
}

describe('run', () => {
  it('prints the matched backpacks and writes a PNG', () => {
    const lines: string[] = [];
    const result = run(options(writeSave(), { filter: { item: 'minecraft:flint' } }), (line) => lines.push(line));

    expect(result.total).toBe(1);
    expect(result.matched).toHaveLength(1);
    expect(result.imagePath).toBe(path.join(dir, 'out.png'));
    expect(lines).toEqual([
      'Backpack (root inventory)',
      '  Owner: Unknown',
      '  Last access: Never',
      '  [0] minecraft:flint x5',
    ]);
    expect(Array.from(fs.readFileSync(path.join(dir, 'out.png')).subarray(0, 4))).toEqual([0x89, 0x50, 0x4e, 0x47]);
  });

  it('writes no image when nothing matches', () => {
    const lines: string[] = [];
    const result = run(options(writeSave(), { filter: { item: 'minecraft:diamond' } }), (line) => lines.push(line));

    expect(result.matched).toEqual([]);
    expect(result.imagePath).toBeUndefined();
    expect(lines).toEqual([]);
    expect(fs.existsSync(path.join(dir, 'out.png'))).toBe(false);
  });

  it('prints container matches as JSON using a layout override', () => {
    const config = path.join(dir, 'layout.json');
    fs.writeFileSync(config, JSON.stringify({ dungeonKeys: ['loot'] }));

    const lines: string[] = [];
    const result = run(
      options(writeContainers(), { mode: 'container', config, json: true, filter: { excludeDungeon: true } }),
      (line) => lines.push(line),
    );

    expect(result.total).toBe(2);
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toEqual([{
      kind: 'container',
      index: 0,
      id: 'minecraft:chest',
      position: { x: 1, y: 64, z: 2 },
      dimension: 'minecraft:overworld',
      isDungeon: false,
      slots: [{ slot: 0, id: 'minecraft:diamond', count: 3 }],
    }]);
  });
});

describe('describeRecord', () => {
  it('lists upgrades and extra item data', () => {
    const record: BackpackRecord = {
      kind: 'backpack',
      index: 0,
      uuid: 'abc',
      owner: 'Steve',
      slots: [{ slot: 2, id: 'minecraft:diamond_sword', count: 1, tag: compound({ Damage: int(3) }) }],
      upgrades: [{ id: 'sophisticatedbackpacks:feeding_upgrade', count: 1 }],
    };

    expect(describeRecord(record)).toEqual([
      'Backpack abc',
      '  Owner: Steve',
      '  Last access: Never',
      '  Upgrade: sophisticatedbackpacks:feeding_upgrade x1',
      '  [2] minecraft:diamond_sword x1 {Damage:3}',
    ]);
  });

  it('summarizes a container', () => {
    expect(describeRecord({
      kind: 'container',
      index: 0,
      id: 'minecraft:barrel',
      position: { x: 4 },
      dimension: 'Unknown',
      isDungeon: true,
      slots: [],
      rawItems: [],
    })).toEqual([
      'Container minecraft:barrel at 4, ?, ?',
      '  Dimension: Unknown',
      '  Dungeon: Yes',
    ]);
  });
});
