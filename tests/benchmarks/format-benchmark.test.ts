/**
 * Format benchmarks.
 *
 * Measures write/read performance and document sizes of generated maps
 * across the three storage formats.
 */

import { describe, it, expect } from 'vitest';
import { DataFormatHandler } from '../../src/formats/handler.js';
import { DATA_FORMATS } from '../../src/core/config.js';
import { Grid } from '../../src/schema/grid.js';
import { mapDocument, newEvent, type GameMap } from '../../src/rpg/index.js';
import { sampleMap } from '../helpers/project.js';

/** A square map with a patterned floor and `eventCount` events. */
function buildMap(size: number, eventCount: number): GameMap {
  const map = sampleMap();
  map.width = size;
  map.height = size;
  map.data = new Grid(size, size, 3);
  for (let y = 0; y < size; y++) {
    for (let x = 0; x < size; x++) {
      map.data.set(384 + ((x * 7 + y * 3) % 48), x, y, 0);
    }
  }
  map.events = new Map();
  for (let id = 1; id <= eventCount; id++) {
    map.events.set(id, newEvent(id, id % size, Math.floor(id / size)));
  }
  return map;
}

/** Measure write+read round trip for a map in one format. */
function benchMap(handler: DataFormatHandler, map: GameMap, iterations: number) {
  // Warm up
  for (let i = 0; i < 5; i++) {
    handler.read(mapDocument, handler.write(mapDocument, map));
  }

  const writeStart = performance.now();
  let size = 0;
  for (let i = 0; i < iterations; i++) {
    size = handler.write(mapDocument, map).length;
  }
  const writeTime = performance.now() - writeStart;

  const bytes = handler.write(mapDocument, map);
  const readStart = performance.now();
  for (let i = 0; i < iterations; i++) {
    handler.read(mapDocument, bytes);
  }
  const readTime = performance.now() - readStart;

  return {
    size,
    writeTimeMs: writeTime / iterations,
    readTimeMs: readTime / iterations,
  };
}

describe('Format benchmarks', () => {
  const scenarios = [
    { name: 'small map (20x15, 5 events)', map: buildMap(20, 5), iterations: 100 },
    { name: 'large map (100x100, 50 events)', map: buildMap(100, 50), iterations: 10 },
  ];

  for (const scenario of scenarios) {
    describe(scenario.name, () => {
      for (const format of DATA_FORMATS) {
        it(`${format}: write/read round trip`, () => {
          const handler = new DataFormatHandler(format);
          const result = benchMap(handler, scenario.map, scenario.iterations);

          console.log(`  ${format}: ${result.size} bytes, write ${result.writeTimeMs.toFixed(3)}ms, read ${result.readTimeMs.toFixed(3)}ms`);

          expect(result.size).toBeGreaterThan(0);
          // Verify round-trip fidelity
          const back = handler.read(mapDocument, handler.write(mapDocument, scenario.map));
          expect(back.events.size).toBe(scenario.map.events.size);
          expect(back.data.get(1, 1, 0)).toBe(scenario.map.data.get(1, 1, 0));
        });
      }
    });
  }

  describe('document size comparison summary', () => {
    it('should print comparative document sizes', () => {
      console.log('\n  Document Size Comparison:');
      console.log('  ' + '-'.repeat(70));
      console.log(`  ${'Scenario'.padEnd(32)} ${'marshal'.padStart(10)} ${'json'.padStart(10)} ${'cbor'.padStart(10)}`);
      console.log('  ' + '-'.repeat(70));

      for (const scenario of scenarios) {
        const sizes = DATA_FORMATS.map((format) => new DataFormatHandler(format).write(mapDocument, scenario.map).length);
        console.log(
          `  ${scenario.name.padEnd(32)} ${String(sizes[0]).padStart(10)} ${String(sizes[1]).padStart(10)} ${String(sizes[2]).padStart(10)}`,
        );
        expect(sizes.every((size) => size > 0)).toBe(true);
      }

      console.log('  ' + '-'.repeat(70));
    });
  });
});
