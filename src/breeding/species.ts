import { pickOne, type RandomSource } from '../core/prng.js';

export function speciesTokens(species: string): string[] {
  const tokens = species.split(/\s+/).filter((token) => token.length > 0);
  return tokens.length > 0 ? tokens : [species];
}

/** Lexical recombination: one word from each parent, e.g. "Ice Dragon" from "Ice Bear" and "Sea Dragon". */
export function combineSpecies(first: string, second: string, rng: RandomSource): string {
  const part1 = pickOne(rng, speciesTokens(first));
  const part2 = pickOne(rng, speciesTokens(second));
  return `${part1} ${part2}`;
}
