import type { ZooState } from './types.js';

type IdKind = keyof ZooState['counters'];

export function nextId(state: ZooState, kind: IdKind): string {
  state.counters[kind] += 1;
  return `${kind}-${state.counters[kind]}`;
}
