/**
 * Clock interface
 * Abstracts the current time so results directory names are deterministic in tests
 */

export interface Clock {
  /**
   * Get the current time as a Date object
   */
  now(): Date;

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

  iso(): string {
    return this.currentTime.toISOString();
  }

  /**
   * Advance time by the specified duration
   */
  advance(ms: number): void {
    this.currentTime = new Date(this.currentTime.getTime() + ms);
  }
}
