/**
 * Clock interface
 * Abstracts time so run ids and run summaries are deterministic in tests
 */

export interface Clock {
  /**
   * Get the current time as a Date object
   */
  now(): Date;

  /**
   * Get the current time as a Unix timestamp (milliseconds)
   */
  timestamp(): number;

  /**
   * Get the current time as an ISO 8601 string
   */
  iso(): string;
}

/**
 * Real implementation of Clock using system time
 */
export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  timestamp(): number {
    return Date.now();
  }

  iso(): string {
    return new Date().toISOString();
  }
}

/**
 * Mock implementation of Clock for testing
 */
export class MockClock implements Clock {
  private currentTime: Date;

  constructor(initialTime?: Date) {
    this.currentTime = initialTime ?? new Date('2025-01-01T00:00:00.000Z');
  }

  now(): Date {
    return new Date(this.currentTime);
  }

  timestamp(): number {
    return this.currentTime.getTime();
  }

  iso(): string {
    return this.currentTime.toISOString();
  }

  /**
   * Advance time by the specified duration
   */
  advance(ms: number): void {
    this.currentTime = new Date(this.currentTime.getTime() + ms);
  }

  setTime(time: Date): void {
    this.currentTime = new Date(time);
  }
}

/**
 * Format a run id (`YYYYMMDD-HHMMSS`, local time) from a date
 */
export function formatRunId(date: Date): string {
  const pad = (value: number): string => value.toString().padStart(2, '0');
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}-${time}`;
}
