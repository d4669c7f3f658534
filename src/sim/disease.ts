import { rollPercent, coinFlip, type RandomSource } from '../core/prng.js';
import type { Animal, DeathRecord, Enclosure, InfectionRecord } from '../core/types.js';
import { INFECTION_CHANCE_PERCENT, SPREAD_CONTACTS_PER_CARRIER } from '../core/constants.js';

export type DiseaseOutcome = {
  infections: InfectionRecord[];
  deaths: DeathRecord[];
};

const infectionOf = (animal: Animal, enclosure: Enclosure): InfectionRecord => ({
  animalId: animal.id,
  name: animal.name,
  enclosureId: enclosure.id
});

export function countInfected(animals: Animal[]): number {
  return animals.filter((a) => a.isInfected).length;
}

/** At most one new infection per enclosure per call. */
export function seedInfection(enclosure: Enclosure, rng: RandomSource): InfectionRecord | undefined {
  for (const animal of enclosure.animals) {
    if (!animal.isInfected && rollPercent(rng, INFECTION_CHANCE_PERCENT)) {
      animal.isInfected = true;
      return infectionOf(animal, enclosure);
    }
  }
  return undefined;
}

export function spreadDisease(enclosure: Enclosure, rng: RandomSource): DiseaseOutcome {
  const outcome: DiseaseOutcome = { infections: [], deaths: [] };
  let infected = countInfected(enclosure.animals);

  if (infected > Math.floor(enclosure.animals.length / 2)) {
    const dead = new Set<string>();
    let living = enclosure.animals.length;
    for (const animal of enclosure.animals) {
      if (infected <= Math.floor(living / 2)) break;
      if (animal.isInfected && coinFlip(rng)) {
        dead.add(animal.id);
        living -= 1;
        infected -= 1;
        outcome.deaths.push({
          animalId: animal.id,
          name: animal.name,
          species: animal.species,
          enclosureId: enclosure.id,
          cause: 'disease'
        });
      }
    }
    enclosure.animals = enclosure.animals.filter((a) => !dead.has(a.id));
    return outcome;
  }

  // Carriers infected earlier in this pass spread too, in occupant order.
  for (const carrier of enclosure.animals) {
    if (!carrier.isInfected) continue;
    let infections = 0;
    for (const contact of enclosure.animals) {
      if (infections >= SPREAD_CONTACTS_PER_CARRIER) break;
      if (!contact.isInfected && rollPercent(rng, INFECTION_CHANCE_PERCENT)) {
        contact.isInfected = true;
        infections += 1;
        outcome.infections.push(infectionOf(contact, enclosure));
      }
    }
  }
  return outcome;
}
