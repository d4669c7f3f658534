import type { RandomSource } from '../core/prng.js';
import type { Animal, Climate, Gender, HabitatType } from '../core/types.js';
import {
  CLIMATES, ANIMAL_BASE_PRICE, ANIMAL_MIN_PRICE, CARNIVORE_PRICE_BONUS, AQUATIC_PRICE_BONUS,
  CLIMATE_PRICE_STEP, AGE_PRICE_PERIOD_DAYS, AGE_PRICE_PENALTY, SELL_PRICE_RATIO, OLD_AGE_THRESHOLD_DAYS
} from '../core/constants.js';

export type AnimalTraits = Omit<Animal, 'id' | 'isInfected' | 'parents' | 'name'> & {
  name?: string;
  parents?: Animal['parents'];
};

export function createAnimal(id: string, traits: AnimalTraits): Animal {
  return {
    id,
    name: traits.name ?? '',
    species: traits.species,
    ageInDays: traits.ageInDays,
    weight: traits.weight,
    climate: traits.climate,
    isCarnivore: traits.isCarnivore,
    isInfected: false,
    gender: traits.gender,
    parents: traits.parents ?? { first: '', second: '' }
  };
}

export function climateIndex(climate: Climate): number {
  return CLIMATES.indexOf(climate);
}

export function habitatOf(climate: Climate): HabitatType {
  return climate === 'Ocean' ? 'Aquatic' : 'Land';
}

export function isAquatic(animal: Pick<Animal, 'climate'>): boolean {
  return habitatOf(animal.climate) === 'Aquatic';
}

export function calculateMaintenanceCost(animal: Animal): number {
  return isAquatic(animal) ? animal.weight * 2 : animal.weight;
}

export function calculatePrice(animal: Animal): number {
  let price = ANIMAL_BASE_PRICE + animal.weight * 2 - Math.floor(animal.ageInDays / AGE_PRICE_PERIOD_DAYS) * AGE_PRICE_PENALTY;
  price += animal.isCarnivore ? CARNIVORE_PRICE_BONUS : 0;
  price += climateIndex(animal.climate) * CLIMATE_PRICE_STEP;
  if (isAquatic(animal)) {
    price += AQUATIC_PRICE_BONUS;
  }
  return Math.max(price, ANIMAL_MIN_PRICE);
}

export function calculateSellPrice(animal: Animal): number {
  return Math.floor(calculatePrice(animal) * SELL_PRICE_RATIO);
}

export function growOlder(animal: Animal): void {
  animal.ageInDays += 1;
}

// One percent per day past the threshold; no draw is made below it.
export function diesOfOldAge(animal: Animal, rng: RandomSource): boolean {
  if (animal.ageInDays <= OLD_AGE_THRESHOLD_DAYS) {
    return false;
  }
  const deathChance = animal.ageInDays - OLD_AGE_THRESHOLD_DAYS;
  return rng.nextInt(0, 99) < deathChance;
}

export function randomGender(rng: RandomSource): Gender {
  return rng.nextInt(0, 1) === 0 ? 'M' : 'F';
}

export function describeParents(animal: Animal): string {
  const { first, second } = animal.parents;
  if (first === '' && second === '') {
    return 'Parents unknown';
  }
  return `Parents: ${first} and ${second}`;
}
