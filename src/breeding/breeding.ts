import { rollPercent, type RandomSource } from '../core/prng.js';
import type { Animal, Enclosure, Gender, ZooState } from '../core/types.js';
import { invalidSelection, success, type Outcome } from '../core/outcome.js';
import { nextId } from '../core/ids.js';
import { BREEDING_MIN_AGE_DAYS, TWIN_CHANCE_PERCENT } from '../core/constants.js';
import { createAnimal, randomGender } from '../entities/animal.js';
import { addAnimal, remainingCapacity } from '../entities/enclosure.js';
import { combineSpecies } from './species.js';

export type OffspringDraft = { species: string; gender: Gender };

export type BreedingPlan = {
  enclosureId: string;
  parents: [Animal, Animal];
  litter: OffspringDraft[];
};

export type BreedingResult =
  | { status: 'paired'; plan: BreedingPlan }
  | { status: 'no-eligible-pair'; reason: string }
  | { status: 'incompatible'; reason: string };

const isMature = (animal: Animal) => animal.ageInDays > BREEDING_MIN_AGE_DAYS;

export function findBreedingPair(animals: Animal[]): [Animal, Animal] | undefined {
  for (let i = 0; i < animals.length; i += 1) {
    for (let j = i + 1; j < animals.length; j += 1) {
      const a = animals[i];
      const b = animals[j];
      if (a.gender !== b.gender && isMature(a) && isMature(b)) {
        return [a, b];
      }
    }
  }
  return undefined;
}

function checkCompatibility(a: Animal, b: Animal): string | undefined {
  if (a.gender === b.gender) {
    return 'Both animals have the same gender.';
  }
  if (a.species === b.species) {
    return 'Animals of the same species cannot breed.';
  }
  return undefined;
}

function draftLitter(parents: [Animal, Animal], capacityLeft: number, rng: RandomSource): OffspringDraft[] {
  const wanted = rollPercent(rng, TWIN_CHANCE_PERCENT) ? 2 : 1;
  const count = Math.min(wanted, capacityLeft);
  const litter: OffspringDraft[] = [];
  for (let i = 0; i < count; i += 1) {
    const species = combineSpecies(parents[0].species, parents[1].species, rng);
    litter.push({ species, gender: randomGender(rng) });
  }
  return litter;
}

/**
 * Chooses the breeding pair and drafts the litter without mutating anything.
 * With `selection` the two given occupants are checked; otherwise the first
 * mature opposite-gender pair in occupant order is taken.
 */
export function planBreeding(
  enclosure: Enclosure,
  rng: RandomSource,
  selection?: [number, number]
): BreedingResult {
  const { animals } = enclosure;
  if (animals.length < 2) {
    return { status: 'no-eligible-pair', reason: 'Not enough animals to breed.' };
  }

  let pair: [Animal, Animal] | undefined;
  if (selection) {
    const [i, j] = selection;
    if (i === j || i < 0 || j < 0 || i >= animals.length || j >= animals.length) {
      return { status: 'no-eligible-pair', reason: 'Pick two different animals from the enclosure.' };
    }
    pair = [animals[i], animals[j]];
    const incompatibility = checkCompatibility(pair[0], pair[1]);
    if (incompatibility) {
      return { status: 'incompatible', reason: incompatibility };
    }
    if (!isMature(pair[0]) || !isMature(pair[1])) {
      return { status: 'no-eligible-pair', reason: `Both animals must be older than ${BREEDING_MIN_AGE_DAYS} days.` };
    }
  } else {
    pair = findBreedingPair(animals);
    if (!pair) {
      const genders = new Set(animals.map((a) => a.gender));
      if (genders.size === 1) {
        return { status: 'incompatible', reason: 'All animals in the enclosure have the same gender.' };
      }
      return { status: 'no-eligible-pair', reason: 'No suitable breeding pair was found.' };
    }
    const incompatibility = checkCompatibility(pair[0], pair[1]);
    if (incompatibility) {
      return { status: 'incompatible', reason: incompatibility };
    }
  }

  return {
    status: 'paired',
    plan: {
      enclosureId: enclosure.id,
      parents: pair,
      litter: draftLitter(pair, remainingCapacity(enclosure), rng)
    }
  };
}

export function commitBreeding(
  state: ZooState,
  enclosure: Enclosure,
  plan: BreedingPlan,
  names: string[] = []
): Outcome<Animal[]> {
  const [parent1, parent2] = plan.parents;
  const present = (animal: Animal) => enclosure.animals.some((a) => a.id === animal.id);
  if (enclosure.id !== plan.enclosureId || !present(parent1) || !present(parent2)) {
    return invalidSelection('The breeding pair is no longer in this enclosure.');
  }

  const litter = plan.litter.slice(0, remainingCapacity(enclosure));
  const born: Animal[] = [];
  litter.forEach((draft, idx) => {
    const offspring = createAnimal(nextId(state, 'animal'), {
      name: names[idx] ?? '',
      species: draft.species,
      ageInDays: 1,
      weight: Math.floor((parent1.weight + parent2.weight) / 2),
      climate: parent1.climate,
      isCarnivore: parent1.isCarnivore || parent2.isCarnivore,
      gender: draft.gender,
      parents: { first: parent1.name, second: parent2.name }
    });
    if (addAnimal(enclosure, offspring).allowed) {
      born.push(offspring);
    }
  });
  return success(born);
}
