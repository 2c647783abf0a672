/**
 * Abstractions over wall-clock time and timers.
 * The relay measures open latency and enforces deadlines through these,
 * so tests can drive time deterministically.
 */
export interface Clock {
  /** Current timestamp in milliseconds */
  now(): number;
}

export interface TimerService {
  setTimeout(fn: () => void, ms: number): NodeJS.Timeout;
  clearTimeout(id: NodeJS.Timeout): void;
}
