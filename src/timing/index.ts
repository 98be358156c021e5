// pattern: Functional Core

export type { Clock } from './clock.ts';
export { systemClock, sleep, withDeadline, abortReason } from './clock.ts';
