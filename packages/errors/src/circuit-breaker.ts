import CircuitBreaker from "opossum";

export type CircuitState = "open" | "halfOpen" | "close";

export interface CircuitBreakerOptions {
  /** Timeout in milliseconds after which the call is considered failed. Default: 10000 */
  timeout?: number;
  /** Error percentage at which to open the circuit. Default: 50 */
  errorThresholdPercentage?: number;
  /** Time in milliseconds to wait before attempting to close the circuit. Default: 30000 */
  resetTimeout?: number;
  /** Minimum number of calls in the rolling window before the circuit may open. Default: 5 */
  volumeThreshold?: number;
  /** Errors for which this returns true do not count as failures. */
  errorFilter?: (err: unknown) => boolean;
  /** Called on every state transition. Defaults to a console warning. */
  onStateChange?: (name: string, state: CircuitState) => void;
}

const DEFAULT_OPTIONS = {
  timeout: 10_000,
  errorThresholdPercentage: 50,
  resetTimeout: 30_000,
  volumeThreshold: 5,
};

function warnStateChange(name: string, state: CircuitState): void {
  console.warn(`[circuit-breaker] ${name}: circuit ${state.toUpperCase()}`);
}

/**
 * Wrap an async call in a breaker. Every call is bounded by `timeout`
 * whether or not the circuit ever opens.
 */
export function createCircuitBreaker<TI extends unknown[], TR>(
  name: string,
  fn: (...args: TI) => Promise<TR>,
  options?: CircuitBreakerOptions,
): CircuitBreaker<TI, TR> {
  const { onStateChange = warnStateChange, ...rest } = options ?? {};
  const breaker = new CircuitBreaker(fn, { ...DEFAULT_OPTIONS, ...rest, name });

  breaker.on("open", () => onStateChange(name, "open"));
  breaker.on("halfOpen", () => onStateChange(name, "halfOpen"));
  breaker.on("close", () => onStateChange(name, "close"));

  return breaker;
}
