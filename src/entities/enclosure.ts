import type { Animal, Climate, Enclosure } from '../core/types.js';
import { climateIndex, isAquatic } from './animal.js';
import {
  ENCLOSURE_BASE_COST, ENCLOSURE_MIN_COST, ENCLOSURE_COST_PER_PLACE, ENCLOSURE_CLIMATE_COST_STEP,
  ENCLOSURE_BASE_DAILY_COST, ENCLOSURE_MIN_DAILY_COST, ENCLOSURE_CLIMATE_DAILY_STEP,
  AQUATIC_DAILY_SURCHARGE, ENCLOSURE_MAX_LEVEL, UPGRADE_COST_PER_PLACE
} from '../core/constants.js';

export type Admission = { allowed: true } | { allowed: false; reason: string };

export function createEnclosure(id: string, climate: Climate, capacity: number): Enclosure {
  const enclosure: Enclosure = { id, climate, capacity, level: 1, dailyCost: 0, animals: [] };
  enclosure.dailyCost = calculateDailyCost(enclosure);
  return enclosure;
}

export function calculateCost(enclosure: Pick<Enclosure, 'climate' | 'capacity'>): number {
  const cost = ENCLOSURE_BASE_COST
    + enclosure.capacity * ENCLOSURE_COST_PER_PLACE
    + climateIndex(enclosure.climate) * ENCLOSURE_CLIMATE_COST_STEP;
  return Math.max(cost, ENCLOSURE_MIN_COST);
}

export function calculateDailyCost(enclosure: Enclosure): number {
  const aquaticCount = enclosure.animals.filter(isAquatic).length;
  const dailyCost = ENCLOSURE_BASE_DAILY_COST
    + Math.floor(enclosure.capacity / 10)
    + climateIndex(enclosure.climate) * ENCLOSURE_CLIMATE_DAILY_STEP
    + aquaticCount * AQUATIC_DAILY_SURCHARGE;
  return Math.max(dailyCost, ENCLOSURE_MIN_DAILY_COST);
}

export function calculateUpgradeCost(enclosure: Enclosure): number {
  return enclosure.capacity * UPGRADE_COST_PER_PLACE * (enclosure.level + 1);
}

/**
 * Doubles capacity and ratchets the daily cost up by half of the recomputed cost.
 * Payment is the caller's concern; returns false without touching anything at the top level.
 */
export function upgrade(enclosure: Enclosure): boolean {
  if (enclosure.level >= ENCLOSURE_MAX_LEVEL) {
    return false;
  }
  enclosure.capacity *= 2;
  enclosure.dailyCost += Math.floor(calculateDailyCost(enclosure) / 2);
  enclosure.level += 1;
  return true;
}

export function remainingCapacity(enclosure: Enclosure): number {
  return Math.max(0, enclosure.capacity - enclosure.animals.length);
}

export function canAddAnimal(enclosure: Enclosure, animal: Animal): Admission {
  if (enclosure.animals.length >= enclosure.capacity) {
    return { allowed: false, reason: 'The enclosure is full.' };
  }
  if (animal.climate !== enclosure.climate) {
    return { allowed: false, reason: `A ${animal.climate} animal cannot live in a ${enclosure.climate} enclosure.` };
  }
  if (enclosure.climate === 'Ocean' && !isAquatic(animal)) {
    return { allowed: false, reason: 'Only aquatic animals can live in an Ocean enclosure.' };
  }
  if (enclosure.climate !== 'Ocean' && isAquatic(animal)) {
    return { allowed: false, reason: 'Aquatic animals can only live in an Ocean enclosure.' };
  }
  const resident = enclosure.animals[0];
  if (resident && resident.isCarnivore !== animal.isCarnivore) {
    return { allowed: false, reason: 'Carnivores and herbivores cannot share an enclosure.' };
  }
  return { allowed: true };
}

export function addAnimal(enclosure: Enclosure, animal: Animal): Admission {
  const admission = canAddAnimal(enclosure, animal);
  if (admission.allowed) {
    enclosure.animals.push(animal);
  }
  return admission;
}

export function removeAnimal(enclosure: Enclosure, animalId: string): Animal | undefined {
  const idx = enclosure.animals.findIndex((a) => a.id === animalId);
  if (idx === -1) {
    return undefined;
  }
  const [removed] = enclosure.animals.splice(idx, 1);
  return removed;
}
