/**
 * Shared test fixtures, exported as `@meetsync/lib/testing`
 *
 * @module __tests__/fixtures
 */

import type { Clock } from '../../clock';

/** Clock whose sleep advances time instead of waiting */
export class VirtualClock implements Clock {
  private current: number;

  /** Every sleep requested, in order */
  readonly sleeps: number[] = [];

  constructor(start: number | string = Date.UTC(2024, 0, 15, 9, 0, 0)) {
    this.current = typeof start === 'string' ? Date.parse(start) : start;
  }

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    const wait = Math.max(0, ms);
    this.sleeps.push(wait);
    this.current += wait;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(time: number | string): void {
    this.current = typeof time === 'string' ? Date.parse(time) : time;
  }
}
