// Page-scoped dashboard state. One store per dashboard instance, created on
// load and dropped with the page; subscribe() is how the view reacts to it.

export type Theme = 'light' | 'dark';
export type PollStatus = 'idle' | 'fetching' | 'rendered' | 'empty' | 'error';

export interface DashboardSnapshot {
  theme: Theme;
  status: PollStatus;
  generation: number;      // last poll whose outcome reached the view
  cardCount: number;
  lastRenderedAt: number | null;
}

type Listener = (s: DashboardSnapshot, change: Partial<DashboardSnapshot>) => void;

export class DashboardStateStore {
  private _theme: Theme = 'light';
  private _status: PollStatus = 'idle';
  private _generation = 0;
  private _cardCount = 0;
  private _lastRenderedAt: number | null = null;
  private _lastOutcome: PollStatus = 'idle';
  private pending = 0;
  private listeners = new Set<Listener>();

  snapshot(): DashboardSnapshot {
    return {
      theme: this._theme,
      status: this._status,
      generation: this._generation,
      cardCount: this._cardCount,
      lastRenderedAt: this._lastRenderedAt
    };
  }

  subscribe(fn: Listener) {
    this.listeners.add(fn);
    return () => {
      this.listeners.delete(fn);
    };
  }

  setTheme(theme: Theme) {
    if (theme === this._theme) return;
    this._theme = theme;
    this.emit({ theme });
  }

  /** Status stays "fetching" until every poll that began has finished or been dropped. */
  beginPoll() {
    this.pending++;
    if (this.pending > 1) return;
    this._status = 'fetching';
    this.emit({ status: 'fetching' });
  }

  finishPoll(generation: number, status: Exclude<PollStatus, 'idle' | 'fetching'>, cardCount: number, at: number) {
    this.pending = Math.max(0, this.pending - 1);
    this._generation = generation;
    this._lastOutcome = status;
    this._status = this.pending > 0 ? 'fetching' : status;
    this._cardCount = cardCount;
    this._lastRenderedAt = at;
    this.emit({ generation, status: this._status, cardCount, lastRenderedAt: at });
  }

  // A poll that ended without reaching the view
  dropPoll() {
    if (this.pending === 0) return;
    this.pending--;
    if (this.pending > 0) return;
    this._status = this._lastOutcome;
    this.emit({ status: this._status });
  }

  // Forgets polls still in flight, e.g. after they were aborted
  resetPolls() {
    this.pending = 0;
    if (this._status === 'idle') return;
    this._status = 'idle';
    this.emit({ status: 'idle' });
  }

  private emit(change: Partial<DashboardSnapshot>) {
    const snap = this.snapshot();
    for (const l of Array.from(this.listeners)) {
      try {
        l(snap, change);
      } catch (err) {
        console.error('Dashboard state listener failed:', err);
      }
    }
  }
}
