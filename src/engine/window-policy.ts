/**
 * Betting window arithmetic. Pure functions of the current time and the last settlement.
 *
 *   |--------- open ---------|--- closed ---|
 *   lastSettlement      deadline        lastSettlement + interval
 *
 * deadline = lastSettlement + interval - cutoff. The deadline itself counts as closed.
 */

export interface WindowInput {
  now: number;
  lastSettlement: number;
  interval: number;
  cutoff: number;
}

export function bettingDeadline(lastSettlement: number, interval: number, cutoff: number): number {
  return lastSettlement + interval - cutoff;
}

export function settlementTime(lastSettlement: number, interval: number): number {
  return lastSettlement + interval;
}

export function bettingOpen(input: WindowInput & { paused: boolean }): boolean {
  if (input.paused) return false;
  return input.now < bettingDeadline(input.lastSettlement, input.interval, input.cutoff);
}

export function timeUntilBettingCloses(input: WindowInput): number {
  return Math.max(0, bettingDeadline(input.lastSettlement, input.interval, input.cutoff) - input.now);
}

export function timeUntilSettlement(input: Omit<WindowInput, "cutoff">): number {
  return Math.max(0, settlementTime(input.lastSettlement, input.interval) - input.now);
}

export function settlementDue(input: Omit<WindowInput, "cutoff">): boolean {
  return input.now >= settlementTime(input.lastSettlement, input.interval);
}
