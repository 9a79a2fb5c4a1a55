import { fmtClock } from '../lib/format.js';
import { intervalScheduler, type Cancel, type Scheduler } from '../lib/scheduler.js';

export const CLOCK_INTERVAL_MS = 1000;

export class Clock {
  private cancel: Cancel | null = null;

  constructor(
    private readonly target: HTMLElement,
    private readonly scheduler: Scheduler = intervalScheduler,
    private readonly now: () => Date = () => new Date()
  ) {}

  start() {
    if (this.cancel) return;
    this.render();
    this.cancel = this.scheduler.every(CLOCK_INTERVAL_MS, () => this.render());
  }

  stop() {
    this.cancel?.();
    this.cancel = null;
  }

  render() {
    this.target.textContent = fmtClock(this.now());
  }
}
