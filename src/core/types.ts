import type { CLIMATES, POSITIONS } from './constants.js';

export type Climate = (typeof CLIMATES)[number];

export type HabitatType = 'Land' | 'Aquatic';

export type Gender = 'M' | 'F';

export type Position = keyof typeof POSITIONS;

export type Animal = {
  id: string;
  name: string;
  species: string;
  ageInDays: number;
  weight: number;
  climate: Climate;
  isCarnivore: boolean;
  isInfected: boolean;
  gender: Gender;
  parents: { first: string; second: string };
};

export type Enclosure = {
  id: string;
  climate: Climate;
  capacity: number;
  level: number;
  dailyCost: number;
  animals: Animal[];
};

export type Employee = {
  id: string;
  name: string;
  position: Position;
  salary: number;
  maxAnimals: number;
  currentAnimals: number;
};

export type ZooRules = {
  dayLimit: number;
  marketSize: number;
  marketRefreshFee: number;
  freeRefreshUntilDay: number;
  randomEvents: boolean;
  disease: boolean;
  popularityDrift: boolean;
};

export type ZooStatus = 'running' | 'bankrupt' | 'completed';

export type ZooState = {
  name: string;
  money: number;
  food: number;
  popularity: number;
  day: number;
  animalsBoughtToday: number;
  enclosures: Enclosure[];
  employees: Employee[];
  market: Animal[];
  dailyEvents: string[];
  status: ZooStatus;
  rules: ZooRules;
  counters: { animal: number; enclosure: number; employee: number };
};

export type DeathCause = 'old-age' | 'disease' | 'starvation';

export type DeathRecord = {
  animalId: string;
  name: string;
  species: string;
  enclosureId: string;
  cause: DeathCause;
};

export type InfectionRecord = {
  animalId: string;
  name: string;
  enclosureId: string;
};

export type EventDelta = { money: number; popularity: number };

export type FiredEvent = {
  kind: 'positive' | 'negative';
  title: string;
  description: string;
  delta: EventDelta;
};

export type StaffLoad = {
  employeeId: string;
  name: string;
  position: Position;
  assigned: number;
  capacity: number;
};

export type DayReport = {
  day: number;
  openingMoney: number;
  closingMoney: number;
  event?: FiredEvent;
  infections: InfectionRecord[];
  deaths: DeathRecord[];
  infectedCount: number;
  visitors: number;
  income: number;
  expenses: { salaries: number; upkeep: number; food: number };
  staffing: StaffLoad[];
  food: { required: number; consumed: number; deficit: number };
  popularityDrift: number;
  popularity: number;
  status: ZooStatus;
};
