import { intervalScheduler, type Scheduler } from './lib/scheduler.js';
import { Clock } from './modules/clock.js';
import type { FetchLike } from './modules/fetch.js';
import { StockPoller } from './modules/stock-poller.js';
import { ThemeToggle } from './modules/theme.js';
import { isCheckbox, requireElement } from './shared/utils/dom-utils.js';
import { DashboardStateStore } from './state/store.js';

export interface DashboardEnv {
  document: Document;
  storage: Pick<Storage, 'getItem' | 'setItem'> | null;
  fetchImpl?: FetchLike;
  scheduler?: Scheduler;
  now?: () => Date;
  log?: (message: string, err: unknown) => void;
}

export interface Dashboard {
  state: DashboardStateStore;
  clock: Clock;
  theme: ThemeToggle;
  poller: StockPoller;
  start(): void;
  stop(): void;
}

// Element ids in index.html
export const DOM_IDS = {
  clock: 'datetime',
  themeToggle: 'theme-toggle',
  container: 'stock-container'
} as const;

export function createDashboard(env: DashboardEnv): Dashboard {
  const doc = env.document;
  const scheduler = env.scheduler ?? intervalScheduler;
  const now = env.now ?? (() => new Date());

  const toggle = requireElement(doc, DOM_IDS.themeToggle);
  if (!isCheckbox(toggle)) throw new Error(`#${DOM_IDS.themeToggle} must be a checkbox`);
  const container = requireElement(doc, DOM_IDS.container);

  const state = new DashboardStateStore();
  const clock = new Clock(requireElement(doc, DOM_IDS.clock), scheduler, now);
  const theme = new ThemeToggle(toggle, doc.body, env.storage, state);
  const poller = new StockPoller({
    container,
    state,
    scheduler,
    fetchImpl: env.fetchImpl,
    now: () => now().getTime(),
    log: env.log
  });

  let unsubscribe: (() => void) | null = null;

  return {
    state,
    clock,
    theme,
    poller,
    start() {
      if (!unsubscribe) {
        unsubscribe = state.subscribe((snap, change) => {
          if (change.status) container.setAttribute('aria-busy', String(snap.status === 'fetching'));
        });
      }
      theme.start();
      clock.start();
      poller.start();
    },
    stop() {
      poller.stop();
      clock.stop();
      theme.stop();
      unsubscribe?.();
      unsubscribe = null;
    }
  };
}
