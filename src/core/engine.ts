import { PRNG, type RandomSource } from './prng.js';
import type { ZooConfig } from './schema.js';
import type { ZooState } from './types.js';
import { nextId } from './ids.js';
import { STARTING_POPULARITY } from './constants.js';
import { createEmployee } from '../entities/employee.js';
import { generateMarket } from '../sim/market.js';

export function createRandomSource(config: Pick<ZooConfig, 'seed'>): RandomSource {
  return new PRNG(config.seed ?? Date.now());
}

export function createZoo(config: ZooConfig, rng: RandomSource): ZooState {
  const state: ZooState = {
    name: config.zoo.name,
    money: config.zoo.initialMoney,
    food: 0,
    popularity: STARTING_POPULARITY,
    day: 1,
    animalsBoughtToday: 0,
    enclosures: [],
    employees: [],
    market: [],
    dailyEvents: [],
    status: 'running',
    rules: { ...config.rules },
    counters: { animal: 0, enclosure: 0, employee: 0 }
  };
  state.employees.push(createEmployee(nextId(state, 'employee'), config.zoo.directorName, 'Director'));
  generateMarket(state, rng);
  return state;
}
