import type { Animal, Climate, Enclosure, ZooState } from '../../src/core/types.js';
import { createAnimal, type AnimalTraits } from '../../src/entities/animal.js';
import { createEnclosure } from '../../src/entities/enclosure.js';
import { createEmployee } from '../../src/entities/employee.js';

let serial = 0;

export function makeAnimal(overrides: Partial<AnimalTraits> = {}): Animal {
  serial += 1;
  return createAnimal(`test-animal-${serial}`, {
    name: `Animal ${serial}`,
    species: 'Shadow Deer',
    ageInDays: 10,
    weight: 20,
    climate: 'Forest',
    isCarnivore: false,
    gender: 'M',
    ...overrides
  });
}

export function makeEnclosure(climate: Climate, capacity: number, animals: Animal[] = []): Enclosure {
  serial += 1;
  const enclosure = createEnclosure(`test-enclosure-${serial}`, climate, capacity);
  enclosure.animals.push(...animals);
  return enclosure;
}

/** A running zoo with no randomness switched on and an empty market. */
export function makeZoo(overrides: Partial<ZooState> = {}): ZooState {
  return {
    name: 'Test Zoo',
    money: 1000,
    food: 0,
    popularity: 50,
    day: 1,
    animalsBoughtToday: 0,
    enclosures: [],
    employees: [createEmployee('employee-1', 'Test Director', 'Director')],
    market: [],
    dailyEvents: [],
    status: 'running',
    rules: {
      dayLimit: 30,
      marketSize: 10,
      marketRefreshFee: 150,
      freeRefreshUntilDay: 10,
      randomEvents: false,
      disease: false,
      popularityDrift: false
    },
    counters: { animal: 0, enclosure: 0, employee: 1 },
    ...overrides
  };
}
