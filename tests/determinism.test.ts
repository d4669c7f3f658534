import { describe, expect, it } from 'vitest';
import { createRandomSource, createZoo } from '../src/core/engine.js';
import { ConfigSchema } from '../src/core/schema.js';
import { PRNG } from '../src/core/prng.js';
import { advanceDay } from '../src/sim/day.js';
import { buildEnclosure, buyAnimal } from '../src/sim/commands.js';

const config = ConfigSchema.parse({ seed: 123, zoo: { initialMoney: 20000 } });

const playWeek = () => {
  const rng = createRandomSource(config);
  const state = createZoo(config, rng);
  for (const climate of ['Desert', 'Forest', 'Arctic', 'Ocean'] as const) {
    buildEnclosure(state, { climate, capacity: 10 });
  }
  const animal = state.market[0];
  const enclosureIndex = state.enclosures.findIndex((e) => e.climate === animal.climate);
  buyAnimal(state, { marketIndex: 0, enclosureIndex, name: 'First' });
  for (let i = 0; i < 7; i += 1) {
    advanceDay(state, rng);
  }
  return state;
};

describe('determinism', () => {
  it('replays the same zoo for the same seed', () => {
    expect(playWeek()).toEqual(playWeek());
  });

  it('opens with the director and a full market', () => {
    const state = createZoo(config, createRandomSource(config));
    expect(state.employees.map((e) => [e.id, e.position])).toEqual([['employee-1', 'Director']]);
    expect(state.market).toHaveLength(10);
    expect(state.market.map((a) => a.id)[9]).toBe('animal-10');
  });

  it('keeps integer draws within bounds', () => {
    const rng = new PRNG(9);
    for (let i = 0; i < 500; i += 1) {
      const value = rng.nextInt(-3, 3);
      expect(value).toBeGreaterThanOrEqual(-3);
      expect(value).toBeLessThanOrEqual(3);
    }
    expect(rng.nextInt(4, 4)).toBe(4);
  });
});
