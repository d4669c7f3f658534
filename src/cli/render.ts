import type { Animal, DayReport, DeathCause, Employee, Enclosure, ZooState } from '../core/types.js';
import { calculatePrice, describeParents, habitatOf } from '../entities/animal.js';
import { getTotalAnimals } from '../sim/day.js';
import { VISITORS_PER_POPULARITY } from '../core/constants.js';

const DEATH_CAUSES: Record<DeathCause, string> = {
  'old-age': 'died of old age',
  disease: 'died of the virus',
  starvation: 'starved to death'
};

const diet = (animal: Animal) => (animal.isCarnivore ? 'Carnivore' : 'Herbivore');

export function renderStatus(state: ZooState): string[] {
  return [
    `=== ${state.name} ===`,
    `Day: ${state.day}`,
    `Money: ${state.money} coins`,
    `Food: ${state.food} kg`,
    `Popularity: ${state.popularity}`,
    `Animals: ${getTotalAnimals(state)}`,
    `Enclosures: ${state.enclosures.length}`,
    `Employees: ${state.employees.length}`,
    `Expected visitors: ${VISITORS_PER_POPULARITY * state.popularity}`
  ];
}

export function renderEnclosure(enclosure: Enclosure, position: number): string {
  return `${position}. Climate: ${enclosure.climate}, Level: ${enclosure.level}, `
    + `Animals: ${enclosure.animals.length}/${enclosure.capacity}, Daily cost: ${enclosure.dailyCost}`;
}

export function renderEnclosures(enclosures: Enclosure[]): string[] {
  if (enclosures.length === 0) return ['You have no enclosures.'];
  return enclosures.map((enc, idx) => renderEnclosure(enc, idx + 1));
}

export function renderMarketAnimal(animal: Animal, position: number): string {
  return `${position}. ${animal.species}, Climate: ${animal.climate}, Age: ${animal.ageInDays} days, `
    + `Weight: ${animal.weight} kg, Gender: ${animal.gender}, ${diet(animal)}, `
    + `Habitat: ${habitatOf(animal.climate)}, Price: ${calculatePrice(animal)}`;
}

export function renderMarket(market: Animal[]): string[] {
  if (market.length === 0) return ['The market is empty.'];
  return market.map((animal, idx) => renderMarketAnimal(animal, idx + 1));
}

export function renderAnimal(animal: Animal): string {
  const infected = animal.isInfected ? ', INFECTED' : '';
  return `- ${animal.name || '(unnamed)'}, ${animal.species}, ${animal.ageInDays} days, ${animal.weight} kg, `
    + `${diet(animal)}, ${habitatOf(animal.climate)}, Climate: ${animal.climate}, Gender: ${animal.gender}, `
    + `${describeParents(animal)}${infected}`;
}

export function renderAnimals(enclosures: Enclosure[]): string[] {
  const lines = enclosures.flatMap((enc) => enc.animals.map(renderAnimal));
  return lines.length > 0 ? lines : ['You have no animals.'];
}

export function renderEmployee(employee: Employee): string {
  return `- ${employee.name} (${employee.position}) Salary: ${employee.salary}, `
    + `Caring for: ${employee.currentAnimals}/${employee.maxAnimals} animals`;
}

export function renderDayReport(report: DayReport): string[] {
  const lines = [`--- Day ${report.day} ---`, `Money before: ${report.openingMoney} coins`];
  if (report.event) {
    lines.push(`Event: ${report.event.title}. ${report.event.description}`);
  }
  for (const infection of report.infections) {
    lines.push(`"${infection.name}" caught the virus!`);
  }
  lines.push(`Visitors today: ${report.visitors}`);
  lines.push(`Income: +${report.income} coins`);
  lines.push(`Expenses: salaries ${report.expenses.salaries}, upkeep ${report.expenses.upkeep}, food ${report.expenses.food}`);
  if (report.food.deficit > 0) {
    lines.push(`Food shortage: ${report.food.deficit} kg missing`);
  }
  lines.push(`Money after: ${report.closingMoney} coins`);
  if (report.deaths.length > 0) {
    lines.push('--- Notifications ---');
    for (const death of report.deaths) {
      lines.push(`"${death.name}" ${DEATH_CAUSES[death.cause]}.`);
    }
  }
  if (report.status === 'bankrupt') {
    lines.push('BANKRUPT! The zoo has run out of money.');
  } else if (report.status === 'completed') {
    lines.push('Congratulations! You ran the zoo for the whole season!');
  }
  return lines;
}
