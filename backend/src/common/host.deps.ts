/**
 * Host Dependencies Contract
 *
 * Services never read the wall clock or write to a concrete logger
 * directly; both are injected so tests can pin them.
 */

// ═══════════════════════════════════════════════════════════════
// LOGGER
// ═══════════════════════════════════════════════════════════════

export interface Logger {
  info: (obj: Record<string, unknown>, msg?: string) => void;
  warn: (obj: Record<string, unknown>, msg?: string) => void;
  error: (obj: Record<string, unknown>, msg?: string) => void;
  debug?: (obj: Record<string, unknown>, msg?: string) => void;
}

/**
 * Services log through a pino child of `app.log`; tests pass this one
 * or a `vi.fn` double.
 */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};

// ═══════════════════════════════════════════════════════════════
// CLOCK
// ═══════════════════════════════════════════════════════════════

export interface Clock {
  now: () => number; // milliseconds epoch
  utcNow: () => Date;
  today: () => string; // YYYY-MM-DD, UTC
}

export const systemClock: Clock = {
  now: () => Date.now(),
  utcNow: () => new Date(),
  today: () => new Date().toISOString().slice(0, 10),
};

/**
 * Clock pinned to a fixed instant; `set` moves it.
 */
export function fixedClock(iso: string): Clock & { set: (iso: string) => void } {
  let current = Date.parse(iso);
  return {
    now: () => current,
    utcNow: () => new Date(current),
    today: () => new Date(current).toISOString().slice(0, 10),
    set: (next: string) => {
      current = Date.parse(next);
    },
  };
}
