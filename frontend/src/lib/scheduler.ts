export type Cancel = () => void;

/** Repeating-timer seam so clocks and pollers can be driven by hand in tests. */
export interface Scheduler {
  every(ms: number, fn: () => void): Cancel;
}

export const intervalScheduler: Scheduler = {
  every(ms, fn) {
    const handle = setInterval(fn, ms);
    return () => clearInterval(handle);
  }
};
