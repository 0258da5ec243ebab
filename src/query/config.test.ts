import { describe, expect, it } from 'vitest';
import { DEFAULT_LAYOUT, loadLayoutConfig } from './config';
import { parseContainers } from './containers';

describe('loadLayoutConfig', () => {
  it('returns the defaults for an empty object', () => {
    expect(loadLayoutConfig('{}')).toEqual(DEFAULT_LAYOUT);
  });

  it('overrides individual keys', () => {
    const config = loadLayoutConfig('{"contentsKey": "storage", "uuidKeys": ["id"], "searchDepth": 5}');

    expect(config.contentsKey).toBe('storage');
    expect(config.uuidKeys).toEqual(['id']);
    expect(config.searchDepth).toBe(5);
    expect(config.accessLogKey).toBe(DEFAULT_LAYOUT.accessLogKey);
  });

  it('does not share list defaults with the returned config', () => {
    const config = loadLayoutConfig('{}');
    config.uuidKeys.push('extra');
    expect(DEFAULT_LAYOUT.uuidKeys).toEqual(['uuid', 'backpackUuid']);
  });

  it('rejects unknown keys and bad values', () => {
    expect(() => loadLayoutConfig('{"contentKey": "x"}')).toThrow('Unknown layout config key "contentKey"');
    expect(() => loadLayoutConfig('{"itemsKey": ""}')).toThrow('Layout config "itemsKey" must be a non-empty string');
    expect(() => loadLayoutConfig('{"ownerNameKeys": [1]}'))
      .toThrow('Layout config "ownerNameKeys" must be a non-empty array of strings');
    expect(() => loadLayoutConfig('{"searchDepth": 0}')).toThrow('Layout config "searchDepth" must be a positive integer');
    expect(() => loadLayoutConfig('[]')).toThrow('Layout config must be a JSON object');
    expect(() => loadLayoutConfig('{')).toThrow('Failed to parse layout config');
  });

  it('changes how container dumps are read', () => {
    const layout = loadLayoutConfig('{"dungeonKeys": ["loot"], "containerItemsKey": "inv"}');
    const { records } = parseContainers('[{"id": "minecraft:chest", "loot": true, "inv": [{"id": "minecraft:apple"}]}]', layout);

    expect(records[0].isDungeon).toBe(true);
    expect(records[0].slots).toEqual([{ slot: 0, id: 'minecraft:apple', count: 1 }]);
  });
});
