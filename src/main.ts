/**
 * Toggle Sync demo entry point
 * Renders the classification panel, then starts the synchronizer against
 * its toggle and exposes the debug helpers on window.
 */

import { ClassificationPanel } from '@/views/ClassificationPanel';
import { getToggleSync } from '@/lib/toggleSync';
import { installDebugGlobals } from '@/lib/debugTools';
import { LOG_PREFIX } from '@/lib/config';

// Styles
import '@/assets/styles/base.css';
import '@/assets/styles/toggle.css';

function bootstrap(): void {
  const appContainer = document.getElementById('app');
  if (!appContainer) {
    console.error(`${LOG_PREFIX} application container not found`);
    return;
  }

  const panel = new ClassificationPanel(appContainer, {
    initialChoice: 'no',
    rerenderOnChange: true,
    onChoice: (choice) => console.log(`${LOG_PREFIX} classification mode: ${choice}`)
  });

  // The panel is rendered late on purpose so the locator has to wait for it
  setTimeout(() => panel.render(), 300);

  const sync = getToggleSync({ verbose: true });
  sync.start();
  installDebugGlobals(sync);

  console.log(`${LOG_PREFIX} debug helpers: debugToggleSync(), forceToggleSync(), testToggleSync()`);
}

// Global error handlers
window.addEventListener('error', (e) => {
  console.error('Uncaught error:', e.error);
});

window.addEventListener('unhandledrejection', (e) => {
  console.error('Unhandled rejection:', e.reason);
});

if (document.readyState === 'loading') {
  document.addEventListener('DOMContentLoaded', bootstrap);
} else {
  bootstrap();
}
