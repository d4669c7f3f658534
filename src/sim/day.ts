import { coinFlip, type RandomSource } from '../core/prng.js';
import type { Animal, DayReport, DeathRecord, Employee, Enclosure, InfectionRecord, StaffLoad, ZooState } from '../core/types.js';
import { failure, success, type Outcome } from '../core/outcome.js';
import {
  VISITORS_PER_POPULARITY, FOOD_PER_ANIMAL_KG, FOOD_PRICE_PER_KG, POPULARITY_DRIFT_RATIO
} from '../core/constants.js';
import { diesOfOldAge, growOlder } from '../entities/animal.js';
import { countInfected, seedInfection, spreadDisease } from './disease.js';
import { processRandomEvents } from './events.js';

export function getTotalAnimals(state: ZooState): number {
  return state.enclosures.reduce((acc, enc) => acc + enc.animals.length, 0);
}

export function getInfectedCount(state: ZooState): number {
  return state.enclosures.reduce((acc, enc) => acc + countInfected(enc.animals), 0);
}

export function ageAnimals(enclosures: Enclosure[], rng: RandomSource): DeathRecord[] {
  const deaths: DeathRecord[] = [];
  for (const enclosure of enclosures) {
    const survivors: Animal[] = [];
    for (const animal of enclosure.animals) {
      growOlder(animal);
      if (diesOfOldAge(animal, rng)) {
        deaths.push({ animalId: animal.id, name: animal.name, species: animal.species, enclosureId: enclosure.id, cause: 'old-age' });
      } else {
        survivors.push(animal);
      }
    }
    enclosure.animals = survivors;
  }
  return deaths;
}

/**
 * Load accounting only: for each enclosure, every employee with spare room
 * takes up to the whole population, and the scan of that enclosure stops at
 * the first employee who reaches capacity.
 */
export function allocateStaff(enclosures: Enclosure[], employees: Employee[]): StaffLoad[] {
  for (const enclosure of enclosures) {
    for (const employee of employees) {
      const canTake = employee.maxAnimals - employee.currentAnimals;
      if (canTake <= 0) continue;
      employee.currentAnimals += Math.min(canTake, enclosure.animals.length);
      if (employee.currentAnimals >= employee.maxAnimals) break;
    }
  }
  return employees.map((e) => ({
    employeeId: e.id,
    name: e.name,
    position: e.position,
    assigned: e.currentAnimals,
    capacity: e.maxAnimals
  }));
}

export function starveAnimals(enclosures: Enclosure[], deficit: number, rng: RandomSource): DeathRecord[] {
  const deaths: DeathRecord[] = [];
  let remaining = deficit;
  for (const enclosure of enclosures) {
    if (remaining <= 0) break;
    const dead = new Set<string>();
    for (const animal of enclosure.animals) {
      if (remaining <= 0) break;
      if (coinFlip(rng)) {
        dead.add(animal.id);
        remaining -= 1;
        deaths.push({ animalId: animal.id, name: animal.name, species: animal.species, enclosureId: enclosure.id, cause: 'starvation' });
      }
    }
    enclosure.animals = enclosure.animals.filter((a) => !dead.has(a.id));
  }
  return deaths;
}

export function popularityDrift(popularity: number, rng: RandomSource): number {
  const fluctuation = Math.floor(popularity * POPULARITY_DRIFT_RATIO);
  return rng.nextInt(-fluctuation, fluctuation);
}

export function advanceDay(state: ZooState, rng: RandomSource): Outcome<DayReport> {
  if (state.status !== 'running') {
    return failure('GameOver', state.status === 'bankrupt' ? 'The zoo is bankrupt.' : 'The season is over.');
  }
  const day = state.day;
  const openingMoney = state.money;

  state.animalsBoughtToday = 0;
  state.dailyEvents = [];

  const event = state.rules.randomEvents ? processRandomEvents(state, rng) : undefined;

  const deaths: DeathRecord[] = ageAnimals(state.enclosures, rng);

  const infections: InfectionRecord[] = [];
  if (state.rules.disease) {
    for (const enclosure of state.enclosures) {
      const infection = seedInfection(enclosure, rng);
      if (infection) infections.push(infection);
    }
    for (const enclosure of state.enclosures) {
      const spread = spreadDisease(enclosure, rng);
      infections.push(...spread.infections);
      deaths.push(...spread.deaths);
    }
  }

  const infectedCount = getInfectedCount(state);
  state.popularity = Math.max(0, state.popularity - infectedCount);

  const visitors = VISITORS_PER_POPULARITY * state.popularity;
  const totalAnimals = getTotalAnimals(state);
  const income = visitors * totalAnimals;
  state.money += income;

  let salaries = 0;
  for (const employee of state.employees) {
    salaries += employee.salary;
    employee.currentAnimals = 0;
  }
  state.money -= salaries;

  const staffing = allocateStaff(state.enclosures, state.employees);

  const upkeep = state.enclosures.reduce((acc, enc) => acc + enc.dailyCost, 0);
  state.money -= upkeep;

  const required = totalAnimals * FOOD_PER_ANIMAL_KG;
  let foodExpense = 0;
  let consumed = 0;
  let deficit = 0;
  if (state.food >= required) {
    consumed = required;
    foodExpense = required * FOOD_PRICE_PER_KG;
    state.food -= required;
    state.money -= foodExpense;
  } else {
    consumed = state.food;
    deficit = required - state.food;
    state.food = 0;
    deaths.push(...starveAnimals(state.enclosures, deficit, rng));
  }

  const drift = state.rules.popularityDrift ? popularityDrift(state.popularity, rng) : 0;
  state.popularity = Math.max(0, state.popularity + drift);

  if (state.money < 0) {
    state.status = 'bankrupt';
  } else {
    state.day += 1;
    if (state.day > state.rules.dayLimit) {
      state.status = 'completed';
    }
  }

  return success({
    day,
    openingMoney,
    closingMoney: state.money,
    event,
    infections,
    deaths,
    infectedCount,
    visitors,
    income,
    expenses: { salaries, upkeep, food: foodExpense },
    staffing,
    food: { required, consumed, deficit },
    popularityDrift: drift,
    popularity: state.popularity,
    status: state.status
  });
}
