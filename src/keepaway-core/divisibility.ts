import type { DivisibilityTest, Item, RoutePreference, WorkerId } from './types';

export function passesTest(test: DivisibilityTest, value: Item): boolean {
  return value % test.divisor === 0n;
}

export function selectTarget(route: RoutePreference, passed: boolean): WorkerId {
  return passed ? route.ifTrue : route.ifFalse;
}
