import type { RandomSource } from '../core/prng.js';
import type { Logger } from '../core/logger.js';
import type { Outcome } from '../core/outcome.js';
import type { Climate, ZooState, ZooStatus } from '../core/types.js';
import { CLIMATES, CURE_COST, HIREABLE_POSITIONS, POSITIONS, AD_COST_PER_POPULARITY, FOOD_PRICE_PER_KG } from '../core/constants.js';
import { calculatePrice, calculateSellPrice } from '../entities/animal.js';
import { calculateUpgradeCost } from '../entities/enclosure.js';
import { dismissableEmployees } from '../entities/employee.js';
import { advanceDay } from '../sim/day.js';
import { refreshFee } from '../sim/market.js';
import {
  buildEnclosure, buyAnimal, buyFood, canBuyToday, commitBreedingIn, cureAnimal, fireEmployee, hireEmployee,
  launchAdCampaign, planBreedingIn, quoteEnclosure, refreshMarket, renameAnimal, sellAnimal, suitableEnclosures,
  upgradeEnclosure
} from '../sim/commands.js';
import {
  renderAnimals, renderDayReport, renderEmployee, renderEnclosures, renderMarket, renderStatus
} from './render.js';

export interface Terminal {
  ask(question: string): Promise<string>;
  print(line: string): void;
}

export type MenuResult = ZooStatus | 'quit';

type Session = { state: ZooState; rng: RandomSource; term: Terminal; logger: Logger };

export async function askInt(term: Terminal, question: string): Promise<number> {
  for (;;) {
    const answer = (await term.ask(question)).trim();
    if (/^-?\d+$/.test(answer)) {
      return Number(answer);
    }
    term.print('Invalid input. Please enter a whole number.');
  }
}

async function confirm(term: Terminal, question: string): Promise<boolean> {
  term.print(question);
  term.print('1. Yes\n2. No');
  return (await askInt(term, 'Your choice: ')) === 1;
}

function printAll(term: Terminal, lines: string[]): void {
  for (const line of lines) term.print(line);
}

function settle<T>(term: Terminal, outcome: Outcome<T>, onSuccess: (value: T) => string): void {
  term.print(outcome.ok ? onSuccess(outcome.value) : outcome.error.message);
}

async function pickEnclosure(session: Session, question = 'Enclosure number: '): Promise<number | undefined> {
  const { state, term } = session;
  if (state.enclosures.length === 0) {
    term.print('You have no enclosures!');
    return undefined;
  }
  printAll(term, renderEnclosures(state.enclosures));
  return (await askInt(term, question)) - 1;
}

async function pickAnimal(session: Session, enclosureIndex: number, question: string): Promise<number | undefined> {
  const { state, term } = session;
  const enclosure = state.enclosures[enclosureIndex];
  if (!enclosure) {
    term.print('Invalid enclosure number!');
    return undefined;
  }
  if (enclosure.animals.length === 0) {
    term.print('There are no animals in this enclosure!');
    return undefined;
  }
  enclosure.animals.forEach((animal, idx) => {
    term.print(`${idx + 1}. ${animal.name || '(unnamed)'}, ${animal.species}, Age: ${animal.ageInDays} days, `
      + `Weight: ${animal.weight}, Price: ${calculatePrice(animal)}${animal.isInfected ? ', INFECTED' : ''}`);
  });
  return (await askInt(term, question)) - 1;
}

async function buyFromMarket(session: Session): Promise<void> {
  const { state, term } = session;
  if (state.market.length === 0) {
    term.print('The market has no animals for sale!');
    return;
  }
  if (!canBuyToday(state)) {
    term.print('You have already bought an animal today.');
    return;
  }
  printAll(term, renderMarket(state.market));
  const marketIndex = (await askInt(term, 'Animal number to buy: ')) - 1;
  const animal = state.market[marketIndex];
  if (!animal) {
    term.print('Invalid number!');
    return;
  }
  const price = calculatePrice(animal);
  if (!(await confirm(term, `Final price: ${price} coins. Buy this animal?`))) {
    term.print('Purchase cancelled.');
    return;
  }
  const candidates = suitableEnclosures(state, animal);
  if (candidates.length === 0) {
    term.print('No suitable enclosure for this animal!');
    return;
  }
  const name = await term.ask('Name for the animal: ');
  candidates.forEach(({ enclosure }, idx) => {
    term.print(`${idx + 1}. Climate: ${enclosure.climate}, Animals: ${enclosure.animals.length}/${enclosure.capacity}`);
  });
  const choice = candidates[(await askInt(term, 'Enclosure number: ')) - 1];
  if (!choice) {
    term.print('Invalid enclosure number!');
    return;
  }
  settle(term, buyAnimal(state, { marketIndex, enclosureIndex: choice.index, name }),
    ({ animal: bought }) => `"${bought.name}" has moved into the enclosure!`);
}

async function sell(session: Session): Promise<void> {
  const { state, term } = session;
  const enclosureIndex = await pickEnclosure(session);
  if (enclosureIndex === undefined) return;
  const animalIndex = await pickAnimal(session, enclosureIndex, 'Animal number to sell: ');
  if (animalIndex === undefined) return;
  const animal = state.enclosures[enclosureIndex].animals[animalIndex];
  if (!animal) {
    term.print('Invalid animal number!');
    return;
  }
  if (!(await confirm(term, `"${animal.name}" can be sold for ${calculateSellPrice(animal)} coins. Sell it?`))) {
    term.print('Sale cancelled.');
    return;
  }
  settle(term, sellAnimal(state, { enclosureIndex, animalIndex }),
    ({ animal: sold, price }) => `"${sold.name}" sold for ${price} coins.`);
}

async function cure(session: Session): Promise<void> {
  const { state, term } = session;
  const enclosureIndex = await pickEnclosure(session);
  if (enclosureIndex === undefined) return;
  const enclosure = state.enclosures[enclosureIndex];
  if (!enclosure) {
    term.print('Invalid enclosure number!');
    return;
  }
  const sick = enclosure.animals
    .map((animal, animalIndex) => ({ animal, animalIndex }))
    .filter(({ animal }) => animal.isInfected);
  if (sick.length === 0) {
    term.print('There are no sick animals in this enclosure!');
    return;
  }
  sick.forEach(({ animal }, idx) => term.print(`${idx + 1}. ${animal.name}, Age: ${animal.ageInDays}, Weight: ${animal.weight}`));
  const choice = sick[(await askInt(term, 'Animal number to treat: ')) - 1];
  if (!choice) {
    term.print('Invalid animal number!');
    return;
  }
  if (!(await confirm(term, `Treating "${choice.animal.name}" costs ${CURE_COST} coins. Continue?`))) {
    term.print('Treatment cancelled.');
    return;
  }
  settle(term, cureAnimal(state, { enclosureIndex, animalIndex: choice.animalIndex }),
    ({ animal }) => `"${animal.name}" has been cured!`);
}

async function refresh(session: Session): Promise<void> {
  const { state, term, rng } = session;
  const fee = refreshFee(state);
  if (fee > 0 && !(await confirm(term, `After day ${state.rules.freeRefreshUntilDay} a market refresh costs ${fee} coins. Pay?`))) {
    term.print('Refresh cancelled.');
    return;
  }
  settle(term, refreshMarket(state, rng), () => 'The animal market has been refreshed!');
}

async function breed(session: Session): Promise<void> {
  const { state, term, rng } = session;
  const enclosureIndex = await pickEnclosure(session);
  if (enclosureIndex === undefined) return;
  const plan = planBreedingIn(state, enclosureIndex, rng);
  if (!plan.ok) {
    term.print(plan.error.message);
    return;
  }
  const [first, second] = plan.value.parents;
  term.print('Breeding pair found:');
  term.print(`1. ${first.name}, Species: ${first.species}`);
  term.print(`2. ${second.name}, Species: ${second.species}`);
  if (!(await confirm(term, 'Breed these animals?'))) {
    term.print('Breeding cancelled.');
    return;
  }
  if (plan.value.litter.length === 0) {
    term.print('The enclosure is full! No room for offspring.');
    return;
  }
  const names: string[] = [];
  for (const draft of plan.value.litter) {
    names.push(await term.ask(`Name for the newborn (${draft.species}): `));
  }
  settle(term, commitBreedingIn(state, enclosureIndex, plan.value, names),
    (born) => born.map((a) => `Born: ${a.name} (${a.gender}), Species: ${a.species}`).join('\n'));
}

async function rename(session: Session): Promise<void> {
  const { state, term } = session;
  const enclosureIndex = await pickEnclosure(session);
  if (enclosureIndex === undefined) return;
  const animalIndex = await pickAnimal(session, enclosureIndex, 'Animal number to rename: ');
  if (animalIndex === undefined) return;
  const name = await term.ask('New name: ');
  settle(term, renameAnimal(state, { enclosureIndex, animalIndex, name }), (a) => `Name changed to "${a.name}".`);
}

async function animalsMenu(session: Session): Promise<void> {
  const { state, term } = session;
  term.print('--- Animals ---');
  term.print('1. Buy an animal\n2. Sell an animal\n3. List animals\n4. Treat animals');
  term.print(`5. Refresh the market\n6. Breed animals\n7. Rename an animal\n0. Back`);
  switch (await askInt(term, 'Choose an action: ')) {
    case 1: return buyFromMarket(session);
    case 2: return sell(session);
    case 3: return printAll(term, renderAnimals(state.enclosures));
    case 4: return cure(session);
    case 5: return refresh(session);
    case 6: return breed(session);
    case 7: return rename(session);
    default: return undefined;
  }
}

async function employeesMenu(session: Session): Promise<void> {
  const { state, term } = session;
  term.print('--- Employees ---');
  term.print('1. Hire\n2. Dismiss\n3. List\n0. Back');
  switch (await askInt(term, 'Choose an action: ')) {
    case 1: {
      const name = await term.ask('Name: ');
      HIREABLE_POSITIONS.forEach((position, idx) => {
        term.print(`${idx + 1}. ${position} (salary ${POSITIONS[position].salary}, up to ${POSITIONS[position].maxAnimals} animals)`);
      });
      const position = HIREABLE_POSITIONS[(await askInt(term, 'Position: ')) - 1];
      if (!position) {
        term.print('Invalid choice!');
        return;
      }
      settle(term, hireEmployee(state, { name, position }), (e) => `${e.name} hired as ${e.position}!`);
      return;
    }
    case 2: {
      const candidates = dismissableEmployees(state.employees);
      if (candidates.length === 0) {
        term.print('There is nobody to dismiss.');
        return;
      }
      candidates.forEach((e, idx) => term.print(`${idx + 1}. ${e.name} (${e.position})`));
      settle(term, fireEmployee(state, (await askInt(term, 'Employee number: ')) - 1), (e) => `${e.name} dismissed.`);
      return;
    }
    case 3:
      printAll(term, state.employees.map(renderEmployee));
      return;
    default:
      return;
  }
}

async function enclosuresMenu(session: Session): Promise<void> {
  const { state, term } = session;
  term.print('--- Enclosures ---');
  term.print('1. Build an enclosure\n2. Upgrade an enclosure\n3. List enclosures\n0. Back');
  switch (await askInt(term, 'Choose an action: ')) {
    case 1: {
      CLIMATES.forEach((climate, idx) => term.print(`${idx + 1}. ${climate}`));
      const climate: Climate | undefined = CLIMATES[(await askInt(term, 'Climate: ')) - 1];
      if (!climate) {
        term.print('Invalid climate!');
        return;
      }
      const capacity = await askInt(term, 'Capacity: ');
      if (capacity < 1) {
        term.print('Capacity must be at least 1.');
        return;
      }
      if (!(await confirm(term, `The enclosure costs ${quoteEnclosure(climate, capacity)} coins. Build it?`))) {
        term.print('Construction cancelled.');
        return;
      }
      settle(term, buildEnclosure(state, { climate, capacity }), () => 'Enclosure built!');
      return;
    }
    case 2: {
      const enclosureIndex = await pickEnclosure(session, 'Enclosure number to upgrade: ');
      if (enclosureIndex === undefined) return;
      const enclosure = state.enclosures[enclosureIndex];
      if (!enclosure) {
        term.print('Invalid number!');
        return;
      }
      if (!(await confirm(term, `The upgrade costs ${calculateUpgradeCost(enclosure)} coins. Upgrade?`))) {
        term.print('Upgrade cancelled.');
        return;
      }
      settle(term, upgradeEnclosure(state, enclosureIndex), ({ enclosure: e }) => `Enclosure upgraded to level ${e.level}!`);
      return;
    }
    case 3:
      printAll(term, renderEnclosures(state.enclosures));
      return;
    default:
      return;
  }
}

async function resourcesMenu(session: Session): Promise<void> {
  const { state, term } = session;
  term.print('--- Resources ---');
  term.print(`1. Buy food (${FOOD_PRICE_PER_KG} coins per kg)\n2. Order advertising\n0. Back`);
  switch (await askInt(term, 'Choose an action: ')) {
    case 1:
      settle(term, buyFood(state, await askInt(term, 'How many kg of food? ')),
        ({ amount, cost }) => `Bought ${amount} kg of food for ${cost} coins.`);
      return;
    case 2:
      term.print(`One point of popularity costs ${AD_COST_PER_POPULARITY} coins.`);
      settle(term, launchAdCampaign(state, await askInt(term, 'Campaign budget: ')),
        ({ popularityGain }) => `Popularity increased by ${popularityGain}!`);
      return;
    default:
      return;
  }
}

export async function runMenu(state: ZooState, rng: RandomSource, term: Terminal, logger: Logger): Promise<MenuResult> {
  const session: Session = { state, rng, term, logger };
  while (state.status === 'running') {
    term.print('');
    printAll(term, renderStatus(state));
    term.print('\n[1] Animals\n[2] Employees\n[3] Enclosures\n[4] Resources\n[0] Next day\n[9] Quit');
    const choice = await askInt(term, 'Your choice: ');
    if (choice === 0) {
      const report = advanceDay(state, rng);
      if (!report.ok) {
        term.print(report.error.message);
        break;
      }
      logger.debug({ report: report.value }, 'day settled');
      printAll(term, renderDayReport(report.value));
    } else if (choice === 1) {
      await animalsMenu(session);
    } else if (choice === 2) {
      await employeesMenu(session);
    } else if (choice === 3) {
      await enclosuresMenu(session);
    } else if (choice === 4) {
      await resourcesMenu(session);
    } else if (choice === 9) {
      return 'quit';
    }
  }
  logger.info({ status: state.status, day: state.day, money: state.money }, 'game finished');
  return state.status;
}
