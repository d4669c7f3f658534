import { coinFlip, pickOne, rollPercent, type RandomSource } from '../core/prng.js';
import type { EventDelta, FiredEvent, ZooState } from '../core/types.js';
import { EVENT_CHANCE_PERCENT } from '../core/constants.js';

export type EventDefinition = {
  title: string;
  description: string;
  delta: EventDelta;
};

export const POSITIVE_EVENTS: readonly EventDefinition[] = [
  { title: 'Famous visitor', description: 'Popularity increased by 10.', delta: { money: 0, popularity: 10 } },
  { title: 'Sponsor donation', description: 'Received 500 coins.', delta: { money: 500, popularity: 0 } },
  { title: 'Rare guest', description: 'Popularity increased by 5.', delta: { money: 0, popularity: 5 } },
  { title: 'Animal welfare day', description: 'Popularity increased by 15.', delta: { money: 0, popularity: 15 } },
  { title: 'Charity fund', description: 'Received 1000 coins.', delta: { money: 1000, popularity: 0 } }
];

export const NEGATIVE_EVENTS: readonly EventDefinition[] = [
  { title: 'Animal escape', description: 'Popularity decreased by 10.', delta: { money: 0, popularity: -10 } },
  { title: 'Water supply leak', description: 'Lost 300 coins.', delta: { money: -300, popularity: 0 } },
  { title: 'Staff conflict', description: 'Popularity decreased by 5.', delta: { money: 0, popularity: -5 } },
  { title: 'Fire at the zoo', description: 'Popularity decreased by 15, lost 500 coins.', delta: { money: -500, popularity: -15 } },
  { title: 'Environmental fine', description: 'Lost 200 coins.', delta: { money: -200, popularity: 0 } }
];

export function applyEvent(state: ZooState, event: EventDefinition, kind: FiredEvent['kind']): FiredEvent {
  state.money += event.delta.money;
  state.popularity += event.delta.popularity;
  state.dailyEvents.push(`${event.title}: ${event.description}`);
  return { kind, title: event.title, description: event.description, delta: { ...event.delta } };
}

export function processRandomEvents(state: ZooState, rng: RandomSource): FiredEvent | undefined {
  if (!rollPercent(rng, EVENT_CHANCE_PERCENT)) {
    return undefined;
  }
  const positive = coinFlip(rng);
  const event = pickOne(rng, positive ? POSITIVE_EVENTS : NEGATIVE_EVENTS);
  return applyEvent(state, event, positive ? 'positive' : 'negative');
}
