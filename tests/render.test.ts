import { describe, expect, it } from 'vitest';
import { renderAnimal, renderDayReport, renderMarket, renderStatus } from '../src/cli/render.js';
import { advanceDay } from '../src/sim/day.js';
import { ScriptedRandom } from './helpers/scripted-random.js';
import { makeAnimal, makeZoo } from './helpers/fixtures.js';

describe('render', () => {
  it('renders the zoo status', () => {
    expect(renderStatus(makeZoo())).toEqual([
      '=== Test Zoo ===',
      'Day: 1',
      'Money: 1000 coins',
      'Food: 0 kg',
      'Popularity: 50',
      'Animals: 0',
      'Enclosures: 0',
      'Employees: 1',
      'Expected visitors: 100'
    ]);
  });

  it('renders an animal with its parents', () => {
    const animal = makeAnimal({ name: 'Fern', species: 'Shadow Deer', ageInDays: 10, weight: 20, gender: 'F' });
    expect(renderAnimal(animal)).toBe(
      '- Fern, Shadow Deer, 10 days, 20 kg, Herbivore, Land, Climate: Forest, Gender: F, Parents unknown'
    );
  });

  it('renders an empty market', () => {
    expect(renderMarket([])).toEqual(['The market is empty.']);
  });

  it('renders a bankrupt day', () => {
    const state = makeZoo({ money: 10 });
    const report = advanceDay(state, new ScriptedRandom());
    if (!report.ok) throw new Error(report.error.message);
    expect(renderDayReport(report.value)).toEqual([
      '--- Day 1 ---',
      'Money before: 10 coins',
      'Visitors today: 100',
      'Income: +0 coins',
      'Expenses: salaries 50, upkeep 0, food 0',
      'Money after: -40 coins',
      'BANKRUPT! The zoo has run out of money.'
    ]);
  });
});
