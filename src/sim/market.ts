import { coinFlip, pickOne, type RandomSource } from '../core/prng.js';
import type { Animal, ZooState } from '../core/types.js';
import { insufficientFunds, success, type Outcome } from '../core/outcome.js';
import { nextId } from '../core/ids.js';
import {
  CLIMATES, SPECIES_BY_CLIMATE, MARKET_AGE_MIN, MARKET_AGE_MAX, MARKET_WEIGHT_MIN, MARKET_WEIGHT_MAX
} from '../core/constants.js';
import { createAnimal, randomGender } from '../entities/animal.js';

export function generateMarketAnimal(id: string, rng: RandomSource): Animal {
  const ageInDays = rng.nextInt(MARKET_AGE_MIN, MARKET_AGE_MAX);
  const weight = rng.nextInt(MARKET_WEIGHT_MIN, MARKET_WEIGHT_MAX);
  const climate = pickOne(rng, CLIMATES);
  const isCarnivore = coinFlip(rng);
  const gender = randomGender(rng);
  const species = pickOne(rng, SPECIES_BY_CLIMATE[climate]);
  return createAnimal(id, { species, ageInDays, weight, climate, isCarnivore, gender });
}

export function generateMarket(state: ZooState, rng: RandomSource): Animal[] {
  const pool: Animal[] = [];
  for (let i = 0; i < state.rules.marketSize; i += 1) {
    pool.push(generateMarketAnimal(nextId(state, 'animal'), rng));
  }
  state.market = pool;
  return pool;
}

export function refreshFee(state: ZooState): number {
  if (state.day > state.rules.freeRefreshUntilDay && state.market.length > 0) {
    return state.rules.marketRefreshFee;
  }
  return 0;
}

export function refreshMarket(state: ZooState, rng: RandomSource): Outcome<{ fee: number; market: Animal[] }> {
  const fee = refreshFee(state);
  if (state.money < fee) {
    return insufficientFunds(fee, state.money);
  }
  state.money -= fee;
  return success({ fee, market: generateMarket(state, rng) });
}
