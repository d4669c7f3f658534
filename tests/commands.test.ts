import { describe, expect, it } from 'vitest';
import {
  buildEnclosure, buyAnimal, buyFood, cureAnimal, fireEmployee, hireEmployee, launchAdCampaign, renameAnimal,
  sellAnimal, suitableEnclosures, upgradeEnclosure
} from '../src/sim/commands.js';
import { makeAnimal, makeEnclosure, makeZoo } from './helpers/fixtures.js';

const forestZoo = () => {
  const state = makeZoo({ market: [makeAnimal({ name: '', climate: 'Forest', weight: 20, ageInDays: 10 })] });
  state.enclosures.push(makeEnclosure('Forest', 4));
  return state;
};

describe('buying animals', () => {
  it('moves the animal from the market into the enclosure', () => {
    const state = forestZoo();
    const outcome = buyAnimal(state, { marketIndex: 0, enclosureIndex: 0, name: 'Fern' });
    expect(outcome.ok && outcome.value.price).toBe(150);
    expect(state.money).toBe(850);
    expect(state.market).toHaveLength(0);
    expect(state.enclosures[0].animals.map((a) => a.name)).toEqual(['Fern']);
    expect(state.animalsBoughtToday).toBe(1);
  });

  it('allows one purchase per day after day ten', () => {
    const early = forestZoo();
    early.day = 10;
    early.animalsBoughtToday = 3;
    expect(buyAnimal(early, { marketIndex: 0, enclosureIndex: 0, name: 'Fern' }).ok).toBe(true);

    const late = forestZoo();
    late.day = 11;
    late.animalsBoughtToday = 1;
    const outcome = buyAnimal(late, { marketIndex: 0, enclosureIndex: 0, name: 'Fern' });
    expect(outcome.ok ? undefined : outcome.error.kind).toBe('PolicyViolation');
    expect(late.market).toHaveLength(1);
  });

  it('refuses without a debit when money is short', () => {
    const state = forestZoo();
    state.money = 100;
    const outcome = buyAnimal(state, { marketIndex: 0, enclosureIndex: 0, name: 'Fern' });
    expect(outcome.ok ? undefined : outcome.error.kind).toBe('InsufficientFunds');
    expect(state.money).toBe(100);
    expect(state.enclosures[0].animals).toHaveLength(0);
  });

  it('refuses an enclosure of another climate', () => {
    const state = forestZoo();
    state.enclosures = [makeEnclosure('Arctic', 4)];
    const outcome = buyAnimal(state, { marketIndex: 0, enclosureIndex: 0, name: 'Fern' });
    expect(outcome).toEqual({
      ok: false,
      error: { kind: 'PolicyViolation', message: 'A Forest animal cannot live in a Arctic enclosure.' }
    });
    expect(state.money).toBe(1000);
  });

  it('reports an empty market as an invalid selection', () => {
    const state = makeZoo();
    const outcome = buyAnimal(state, { marketIndex: 0, enclosureIndex: 0, name: 'Fern' });
    expect(outcome.ok ? undefined : outcome.error.kind).toBe('InvalidSelection');
  });

  it('lists only enclosures that would admit the animal', () => {
    const state = forestZoo();
    state.enclosures.push(makeEnclosure('Desert', 4), makeEnclosure('Forest', 1, [makeAnimal()]));
    expect(suitableEnclosures(state, state.market[0]).map((s) => s.index)).toEqual([0]);
  });
});

describe('animal care', () => {
  it('sells at eighty percent of the price', () => {
    const state = makeZoo();
    state.enclosures.push(makeEnclosure('Forest', 4, [makeAnimal({ weight: 20, ageInDays: 10 })]));
    const outcome = sellAnimal(state, { enclosureIndex: 0, animalIndex: 0 });
    expect(outcome.ok && outcome.value.price).toBe(120);
    expect(state.money).toBe(1120);
    expect(state.enclosures[0].animals).toHaveLength(0);
  });

  it('cures only infected animals', () => {
    const state = makeZoo();
    const sick = makeAnimal();
    sick.isInfected = true;
    state.enclosures.push(makeEnclosure('Forest', 4, [sick, makeAnimal({ name: 'Moss' })]));

    expect(cureAnimal(state, { enclosureIndex: 0, animalIndex: 0 }).ok).toBe(true);
    expect(sick.isInfected).toBe(false);
    expect(state.money).toBe(970);

    const healthy = cureAnimal(state, { enclosureIndex: 0, animalIndex: 1 });
    expect(healthy).toEqual({ ok: false, error: { kind: 'PolicyViolation', message: '"Moss" is not infected.' } });
    expect(state.money).toBe(970);
  });

  it('renames an animal', () => {
    const state = makeZoo();
    state.enclosures.push(makeEnclosure('Forest', 4, [makeAnimal()]));
    renameAnimal(state, { enclosureIndex: 0, animalIndex: 0, name: 'Clover' });
    expect(state.enclosures[0].animals[0].name).toBe('Clover');
  });

  it('rejects an out-of-range animal', () => {
    const state = makeZoo();
    state.enclosures.push(makeEnclosure('Forest', 4, [makeAnimal()]));
    expect(sellAnimal(state, { enclosureIndex: 0, animalIndex: 3 })).toEqual({
      ok: false,
      error: { kind: 'InvalidSelection', message: 'No animal number 4.' }
    });
  });
});

describe('staff', () => {
  it('hires at the position salary', () => {
    const state = makeZoo();
    const outcome = hireEmployee(state, { name: 'Rene', position: 'Vet' });
    expect(outcome.ok && outcome.value).toMatchObject({ id: 'employee-2', salary: 150, maxAnimals: 10 });
    expect(state.money).toBe(850);
    expect(state.employees).toHaveLength(2);
  });

  it('never dismisses the director', () => {
    const state = makeZoo();
    expect(fireEmployee(state, 0)).toEqual({
      ok: false,
      error: { kind: 'InvalidSelection', message: 'There are no dismissable employees.' }
    });
    hireEmployee(state, { name: 'Kim', position: 'Cleaner' });
    const fired = fireEmployee(state, 0);
    expect(fired.ok && fired.value.name).toBe('Kim');
    expect(state.employees.map((e) => e.position)).toEqual(['Director']);
  });
});

describe('enclosures', () => {
  it('builds and charges the quoted cost', () => {
    const state = makeZoo();
    const outcome = buildEnclosure(state, { climate: 'Forest', capacity: 2 });
    expect(outcome.ok && outcome.value.cost).toBe(170);
    expect(state.money).toBe(830);
    expect(state.enclosures[0].id).toBe('enclosure-1');
  });

  it('upgrades until the maximum level', () => {
    const state = makeZoo({ money: 2000 });
    state.enclosures.push(makeEnclosure('Forest', 10));
    expect(upgradeEnclosure(state, 0).ok).toBe(true);
    expect(upgradeEnclosure(state, 0).ok).toBe(true);
    expect(state.money).toBe(1600);
    const third = upgradeEnclosure(state, 0);
    expect(third.ok ? undefined : third.error.kind).toBe('PolicyViolation');
    expect(state.money).toBe(1600);
  });
});

describe('resources', () => {
  it('buys food at two coins per kilogram', () => {
    const state = makeZoo();
    expect(buyFood(state, 50).ok).toBe(true);
    expect(state).toMatchObject({ food: 50, money: 900 });
    expect(buyFood(state, 0).ok).toBe(false);
  });

  it('turns an ad budget into popularity', () => {
    const state = makeZoo();
    const outcome = launchAdCampaign(state, 110);
    expect(outcome.ok && outcome.value.popularityGain).toBe(5);
    expect(state).toMatchObject({ popularity: 55, money: 890 });
  });

  it('refuses every command once the game is over', () => {
    const state = makeZoo({ status: 'bankrupt' });
    const outcome = buyFood(state, 10);
    expect(outcome).toEqual({ ok: false, error: { kind: 'GameOver', message: 'The game is over.' } });
  });
});
