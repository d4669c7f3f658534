import { describe, expect, it } from 'vitest';
import { generateMarketAnimal, refreshFee, refreshMarket } from '../src/sim/market.js';
import { ScriptedRandom } from './helpers/scripted-random.js';
import { makeAnimal, makeZoo } from './helpers/fixtures.js';

describe('market generation', () => {
  it('draws age, weight, climate, diet, gender and species in order', () => {
    const animal = generateMarketAnimal('animal-9', new ScriptedRandom([12, 40, 3, 0, 1, 2]));
    expect(animal).toMatchObject({
      id: 'animal-9',
      name: '',
      ageInDays: 12,
      weight: 40,
      climate: 'Ocean',
      isCarnivore: true,
      gender: 'F',
      species: 'Sea Dragon',
      isInfected: false
    });
  });
});

describe('market refresh', () => {
  it('is free until day ten and when the pool is empty', () => {
    expect(refreshFee(makeZoo({ day: 10, market: [makeAnimal()] }))).toBe(0);
    expect(refreshFee(makeZoo({ day: 11, market: [] }))).toBe(0);
    expect(refreshFee(makeZoo({ day: 11, market: [makeAnimal()] }))).toBe(150);
  });

  it('regenerates without a debit before day ten', () => {
    const state = makeZoo({ day: 5 });
    state.rules.marketSize = 1;
    const outcome = refreshMarket(state, new ScriptedRandom([1, 5, 0, 1, 0, 0]));
    expect(outcome.ok).toBe(true);
    expect(state.money).toBe(1000);
    expect(state.market).toHaveLength(1);
    expect(state.market[0]).toMatchObject({ id: 'animal-1', climate: 'Desert', isCarnivore: false, gender: 'M', species: 'Sand Dragon' });
  });

  it('charges the fee after day ten', () => {
    const state = makeZoo({ day: 11, market: [makeAnimal()] });
    state.rules.marketSize = 1;
    const outcome = refreshMarket(state, new ScriptedRandom([1, 5, 0, 1, 0, 0]));
    expect(outcome.ok && outcome.value.fee).toBe(150);
    expect(state.money).toBe(850);
  });

  it('refuses without regenerating when money is short', () => {
    const pool = [makeAnimal()];
    const state = makeZoo({ day: 11, money: 100, market: pool });
    const outcome = refreshMarket(state, new ScriptedRandom());
    expect(outcome).toEqual({
      ok: false,
      error: { kind: 'InsufficientFunds', message: 'Not enough money: 150 needed, 100 available.' }
    });
    expect(state.money).toBe(100);
    expect(state.market).toBe(pool);
  });
});
