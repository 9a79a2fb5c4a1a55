import type { DashboardStateStore, Theme } from '../state/store.js';

export const THEME_STORAGE_KEY = 'theme';
export const DARK_MODE_CLASS = 'dark-mode';

type ThemeStorage = Pick<Storage, 'getItem' | 'setItem'>;

// Anything other than "dark" (including nothing stored) means light
export function readTheme(storage: ThemeStorage | null): Theme {
  try {
    return storage?.getItem(THEME_STORAGE_KEY) === 'dark' ? 'dark' : 'light';
  } catch (err) {
    console.warn('Theme preference unreadable:', err);
    return 'light';
  }
}

export class ThemeToggle {
  private readonly onChange = () => this.select(this.control.checked ? 'dark' : 'light');

  constructor(
    private readonly control: HTMLInputElement,
    private readonly body: HTMLElement,
    private readonly storage: ThemeStorage | null,
    private readonly state: DashboardStateStore
  ) {}

  start() {
    const theme = readTheme(this.storage);
    this.control.checked = theme === 'dark';
    this.apply(theme);
    this.control.addEventListener('change', this.onChange);
  }

  stop() {
    this.control.removeEventListener('change', this.onChange);
  }

  /** Applies and persists; the stored value is overwritten on every call. */
  select(theme: Theme) {
    this.apply(theme);
    try {
      this.storage?.setItem(THEME_STORAGE_KEY, theme);
    } catch (err) {
      console.warn('Theme preference not saved:', err);
    }
  }

  private apply(theme: Theme) {
    this.body.classList.toggle(DARK_MODE_CLASS, theme === 'dark');
    this.state.setTheme(theme);
  }
}
