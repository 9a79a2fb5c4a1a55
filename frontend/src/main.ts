// Browser entry: wires the dashboard to the live page.
import { createDashboard } from './dashboard.js';

function pageStorage(): Storage | null {
  try {
    return window.localStorage;
  } catch (err) {
    console.warn('localStorage unavailable, theme will not persist:', err);
    return null;
  }
}

const dashboard = createDashboard({ document, storage: pageStorage() });
dashboard.start();
window.addEventListener('pagehide', () => dashboard.stop(), { once: true });
