import type { RandomSource } from '../core/prng.js';
import type { Animal, Climate, Employee, Enclosure, Position, ZooState } from '../core/types.js';
import {
  failure, insufficientFunds, invalidSelection, policyViolation, selectAt, success, type Outcome
} from '../core/outcome.js';
import { nextId } from '../core/ids.js';
import {
  AD_COST_PER_POPULARITY, CURE_COST, ENCLOSURE_MAX_LEVEL, FOOD_PRICE_PER_KG, POSITIONS, UNLIMITED_PURCHASES_UNTIL_DAY
} from '../core/constants.js';
import { calculatePrice, calculateSellPrice } from '../entities/animal.js';
import {
  calculateCost, calculateUpgradeCost, canAddAnimal, createEnclosure, removeAnimal, upgrade
} from '../entities/enclosure.js';
import { createEmployee, dismissableEmployees } from '../entities/employee.js';
import { commitBreeding, planBreeding, type BreedingPlan, type BreedingResult } from '../breeding/breeding.js';
import { refreshMarket as regenerateMarket } from './market.js';

export type AnimalRef = { enclosureIndex: number; animalIndex: number };

function ensureRunning(state: ZooState): Outcome<ZooState> {
  if (state.status !== 'running') {
    return failure('GameOver', 'The game is over.');
  }
  return success(state);
}

function selectAnimal(state: ZooState, ref: AnimalRef): Outcome<{ enclosure: Enclosure; animal: Animal }> {
  const enclosure = selectAt(state.enclosures, ref.enclosureIndex, 'enclosure');
  if (!enclosure.ok) return enclosure;
  const animal = selectAt(enclosure.value.animals, ref.animalIndex, 'animal');
  if (!animal.ok) return animal;
  return success({ enclosure: enclosure.value, animal: animal.value });
}

export function suitableEnclosures(state: ZooState, animal: Animal): { index: number; enclosure: Enclosure }[] {
  return state.enclosures
    .map((enclosure, index) => ({ index, enclosure }))
    .filter(({ enclosure }) => canAddAnimal(enclosure, animal).allowed);
}

export function canBuyToday(state: ZooState): boolean {
  return state.day <= UNLIMITED_PURCHASES_UNTIL_DAY || state.animalsBoughtToday < 1;
}

export function buyAnimal(
  state: ZooState,
  request: { marketIndex: number; enclosureIndex: number; name: string }
): Outcome<{ animal: Animal; enclosure: Enclosure; price: number }> {
  const running = ensureRunning(state);
  if (!running.ok) return running;
  if (state.market.length === 0) {
    return invalidSelection('The market has no animals for sale.');
  }
  if (!canBuyToday(state)) {
    return policyViolation(`After day ${UNLIMITED_PURCHASES_UNTIL_DAY} only one animal may be bought per day.`);
  }
  const selected = selectAt(state.market, request.marketIndex, 'market animal');
  if (!selected.ok) return selected;
  const animal = selected.value;
  const price = calculatePrice(animal);
  if (state.money < price) {
    return insufficientFunds(price, state.money);
  }
  const enclosure = selectAt(state.enclosures, request.enclosureIndex, 'enclosure');
  if (!enclosure.ok) return enclosure;
  const admission = canAddAnimal(enclosure.value, animal);
  if (!admission.allowed) {
    return policyViolation(admission.reason);
  }

  animal.name = request.name;
  enclosure.value.animals.push(animal);
  state.market.splice(request.marketIndex, 1);
  state.money -= price;
  state.animalsBoughtToday += 1;
  return success({ animal, enclosure: enclosure.value, price });
}

export function sellAnimal(state: ZooState, ref: AnimalRef): Outcome<{ animal: Animal; price: number }> {
  const running = ensureRunning(state);
  if (!running.ok) return running;
  const selected = selectAnimal(state, ref);
  if (!selected.ok) return selected;
  const { enclosure, animal } = selected.value;
  const price = calculateSellPrice(animal);
  removeAnimal(enclosure, animal.id);
  state.money += price;
  return success({ animal, price });
}

export function cureAnimal(state: ZooState, ref: AnimalRef): Outcome<{ animal: Animal; cost: number }> {
  const running = ensureRunning(state);
  if (!running.ok) return running;
  const selected = selectAnimal(state, ref);
  if (!selected.ok) return selected;
  const { animal } = selected.value;
  if (!animal.isInfected) {
    return policyViolation(`"${animal.name}" is not infected.`);
  }
  if (state.money < CURE_COST) {
    return insufficientFunds(CURE_COST, state.money);
  }
  animal.isInfected = false;
  state.money -= CURE_COST;
  return success({ animal, cost: CURE_COST });
}

export function renameAnimal(state: ZooState, ref: AnimalRef & { name: string }): Outcome<Animal> {
  const selected = selectAnimal(state, ref);
  if (!selected.ok) return selected;
  selected.value.animal.name = ref.name;
  return success(selected.value.animal);
}

export function planBreedingIn(
  state: ZooState,
  enclosureIndex: number,
  rng: RandomSource,
  selection?: [number, number]
): Outcome<BreedingPlan> {
  const running = ensureRunning(state);
  if (!running.ok) return running;
  const enclosure = selectAt(state.enclosures, enclosureIndex, 'enclosure');
  if (!enclosure.ok) return enclosure;
  return breedingOutcome(planBreeding(enclosure.value, rng, selection));
}

function breedingOutcome(result: BreedingResult): Outcome<BreedingPlan> {
  switch (result.status) {
    case 'paired':
      return success(result.plan);
    case 'incompatible':
      return failure('IncompatibleBreeding', result.reason);
    default:
      return policyViolation(result.reason);
  }
}

export function commitBreedingIn(
  state: ZooState,
  enclosureIndex: number,
  plan: BreedingPlan,
  names: string[]
): Outcome<Animal[]> {
  const running = ensureRunning(state);
  if (!running.ok) return running;
  const enclosure = selectAt(state.enclosures, enclosureIndex, 'enclosure');
  if (!enclosure.ok) return enclosure;
  return commitBreeding(state, enclosure.value, plan, names);
}

/** Plan and commit in one step, for callers that confirm up front. */
export function breedAnimals(
  state: ZooState,
  request: { enclosureIndex: number; selection?: [number, number]; names: string[] },
  rng: RandomSource
): Outcome<{ plan: BreedingPlan; born: Animal[] }> {
  const plan = planBreedingIn(state, request.enclosureIndex, rng, request.selection);
  if (!plan.ok) return plan;
  const born = commitBreedingIn(state, request.enclosureIndex, plan.value, request.names);
  if (!born.ok) return born;
  return success({ plan: plan.value, born: born.value });
}

export function hireEmployee(state: ZooState, request: { name: string; position: Exclude<Position, 'Director'> }): Outcome<Employee> {
  const running = ensureRunning(state);
  if (!running.ok) return running;
  const { salary } = POSITIONS[request.position];
  if (state.money < salary) {
    return insufficientFunds(salary, state.money);
  }
  const employee = createEmployee(nextId(state, 'employee'), request.name, request.position);
  state.employees.push(employee);
  state.money -= employee.salary;
  return success(employee);
}

export function fireEmployee(state: ZooState, employeeIndex: number): Outcome<Employee> {
  const running = ensureRunning(state);
  if (!running.ok) return running;
  const selected = selectAt(dismissableEmployees(state.employees), employeeIndex, 'dismissable employee');
  if (!selected.ok) return selected;
  state.employees = state.employees.filter((e) => e.id !== selected.value.id);
  return success(selected.value);
}

export function quoteEnclosure(climate: Climate, capacity: number): number {
  return calculateCost({ climate, capacity });
}

export function buildEnclosure(state: ZooState, request: { climate: Climate; capacity: number }): Outcome<{ enclosure: Enclosure; cost: number }> {
  const running = ensureRunning(state);
  if (!running.ok) return running;
  if (!Number.isInteger(request.capacity) || request.capacity < 1) {
    return policyViolation('Capacity must be at least 1.');
  }
  const cost = quoteEnclosure(request.climate, request.capacity);
  if (state.money < cost) {
    return insufficientFunds(cost, state.money);
  }
  const enclosure = createEnclosure(nextId(state, 'enclosure'), request.climate, request.capacity);
  state.enclosures.push(enclosure);
  state.money -= cost;
  return success({ enclosure, cost });
}

export function upgradeEnclosure(state: ZooState, enclosureIndex: number): Outcome<{ enclosure: Enclosure; cost: number }> {
  const running = ensureRunning(state);
  if (!running.ok) return running;
  const selected = selectAt(state.enclosures, enclosureIndex, 'enclosure');
  if (!selected.ok) return selected;
  const enclosure = selected.value;
  if (enclosure.level >= ENCLOSURE_MAX_LEVEL) {
    return policyViolation('The enclosure is already at the maximum level.');
  }
  const cost = calculateUpgradeCost(enclosure);
  if (state.money < cost) {
    return insufficientFunds(cost, state.money);
  }
  if (!upgrade(enclosure)) {
    return policyViolation('The enclosure is already at the maximum level.');
  }
  state.money -= cost;
  return success({ enclosure, cost });
}

export function buyFood(state: ZooState, amount: number): Outcome<{ amount: number; cost: number }> {
  const running = ensureRunning(state);
  if (!running.ok) return running;
  if (!Number.isInteger(amount) || amount <= 0) {
    return invalidSelection('The amount must be a positive number of kilograms.');
  }
  const cost = amount * FOOD_PRICE_PER_KG;
  if (state.money < cost) {
    return insufficientFunds(cost, state.money);
  }
  state.food += amount;
  state.money -= cost;
  return success({ amount, cost });
}

export function launchAdCampaign(state: ZooState, budget: number): Outcome<{ cost: number; popularityGain: number }> {
  const running = ensureRunning(state);
  if (!running.ok) return running;
  if (!Number.isInteger(budget) || budget <= 0) {
    return invalidSelection('The campaign budget must be positive.');
  }
  if (state.money < budget) {
    return insufficientFunds(budget, state.money);
  }
  const popularityGain = Math.floor(budget / AD_COST_PER_POPULARITY);
  state.money -= budget;
  state.popularity += popularityGain;
  return success({ cost: budget, popularityGain });
}

export function refreshMarket(state: ZooState, rng: RandomSource): Outcome<{ fee: number; market: Animal[] }> {
  const running = ensureRunning(state);
  if (!running.ok) return running;
  return regenerateMarket(state, rng);
}
