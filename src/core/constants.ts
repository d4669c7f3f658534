/**
 * Economic and simulation constants for the zoo.
 * Climate and position tables live here so the rest of the code never branches on display names.
 */

// ── Climates ──────────────────────────────────────────────────────
export const CLIMATES = ['Desert', 'Forest', 'Arctic', 'Ocean'] as const;

export const SPECIES_BY_CLIMATE = {
  Desert: ['Sand Dragon', 'Stone Scorpion', 'Sun Lizard', 'Desert Wolf', 'Giant Scorpion'],
  Forest: ['Forest Phoenix', 'Shadow Deer', 'Crystal Bear', 'Sparkling Fox', 'Mechanical Unicorn'],
  Arctic: ['Ice Bear', 'Snow Dragon', 'Arctic Wolf', 'Crystal Fish', 'Ice Eagle'],
  Ocean: ['Abyssal Kraken', 'Electric Shark', 'Sea Dragon', 'Water Spirit', 'Ocean Giant']
} as const;

// ── Staff ─────────────────────────────────────────────────────────
export const POSITIONS = {
  Director: { salary: 50, maxAnimals: 50 },
  Cleaner: { salary: 80, maxAnimals: 20 },
  Vet: { salary: 150, maxAnimals: 10 },
  Feeder: { salary: 100, maxAnimals: 30 }
} as const;

export const HIREABLE_POSITIONS = ['Cleaner', 'Vet', 'Feeder'] as const;

// ── Animals ───────────────────────────────────────────────────────
export const ANIMAL_BASE_PRICE = 60;
export const ANIMAL_MIN_PRICE = 10;
export const CARNIVORE_PRICE_BONUS = 100;
export const AQUATIC_PRICE_BONUS = 200;
export const CLIMATE_PRICE_STEP = 50;
export const AGE_PRICE_PERIOD_DAYS = 30;
export const AGE_PRICE_PENALTY = 5;
export const SELL_PRICE_RATIO = 0.8;
export const OLD_AGE_THRESHOLD_DAYS = 60;

// ── Enclosures ────────────────────────────────────────────────────
export const ENCLOSURE_BASE_COST = 100;
export const ENCLOSURE_MIN_COST = 150;
export const ENCLOSURE_COST_PER_PLACE = 10;
export const ENCLOSURE_CLIMATE_COST_STEP = 50;
export const ENCLOSURE_BASE_DAILY_COST = 10;
export const ENCLOSURE_MIN_DAILY_COST = 10;
export const ENCLOSURE_CLIMATE_DAILY_STEP = 5;
export const AQUATIC_DAILY_SURCHARGE = 10;
export const ENCLOSURE_MAX_LEVEL = 3;
export const UPGRADE_COST_PER_PLACE = 5;

// ── Breeding ──────────────────────────────────────────────────────
export const BREEDING_MIN_AGE_DAYS = 5;
export const TWIN_CHANCE_PERCENT = 10;

// ── Disease ───────────────────────────────────────────────────────
export const INFECTION_CHANCE_PERCENT = 30;
export const SPREAD_CONTACTS_PER_CARRIER = 2;

// ── Economy ───────────────────────────────────────────────────────
export const STARTING_POPULARITY = 50;
export const VISITORS_PER_POPULARITY = 2;
export const FOOD_PRICE_PER_KG = 2;
export const FOOD_PER_ANIMAL_KG = 1;
export const CURE_COST = 30;
export const AD_COST_PER_POPULARITY = 20;
export const POPULARITY_DRIFT_RATIO = 0.1;
export const EVENT_CHANCE_PERCENT = 20;

// ── Market ────────────────────────────────────────────────────────
export const MARKET_AGE_MIN = 1;
export const MARKET_AGE_MAX = 20;
export const MARKET_WEIGHT_MIN = 5;
export const MARKET_WEIGHT_MAX = 100;
export const UNLIMITED_PURCHASES_UNTIL_DAY = 10;
