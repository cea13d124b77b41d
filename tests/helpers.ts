import { Clock } from "../src/utils/date";

export const TODAY = "2026-10-19";

/** Clock pinned to a local date and hour; can be moved explicitly. */
export class TestClock implements Clock {
  private current: Date;

  constructor(date: string = TODAY, hour: number = 12) {
    const [y, m, d] = date.split("-").map(Number);
    this.current = new Date(y, m - 1, d, hour, 0, 0);
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}
