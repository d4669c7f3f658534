export type FailureKind = 'InvalidSelection' | 'InsufficientFunds' | 'PolicyViolation' | 'IncompatibleBreeding' | 'GameOver';

export type Failure = { kind: FailureKind; message: string };

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: Failure };

export function success<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function failure<T = never>(kind: FailureKind, message: string): Outcome<T> {
  return { ok: false, error: { kind, message } };
}

export const invalidSelection = <T = never>(message: string) => failure<T>('InvalidSelection', message);

export const insufficientFunds = <T = never>(needed: number, available: number) =>
  failure<T>('InsufficientFunds', `Not enough money: ${needed} needed, ${available} available.`);

export const policyViolation = <T = never>(message: string) => failure<T>('PolicyViolation', message);

export function selectAt<T>(items: readonly T[], index: number, label: string): Outcome<T> {
  if (items.length === 0) {
    return invalidSelection(`There are no ${label}s.`);
  }
  if (!Number.isInteger(index) || index < 0 || index >= items.length) {
    return invalidSelection(`No ${label} number ${index + 1}.`);
  }
  return success(items[index]);
}
