export interface ClockPort {
  nowIso(): string;
}

export class SystemClock implements ClockPort {
  nowIso(): string {
    return new Date().toISOString();
  }
}

export function epochMillis(clock: ClockPort): number {
  return Date.parse(clock.nowIso());
}

/** Whole seconds, used for generated order and session ids. */
export function epochSeconds(clock: ClockPort): number {
  return Math.floor(epochMillis(clock) / 1000);
}
