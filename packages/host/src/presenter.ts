/**
 * Headless presentation layer: reports pending state to the log and
 * acknowledges it, completing the produce/consume cycle of each field.
 */
import type { Logger } from './logger.js';
import type { BridgeStore } from './store.js';

export function attachConsolePresenter(store: BridgeStore, logger: Logger): () => void {
  return store.subscribe((state) => {
    if (state.pendingError !== null) {
      logger.warn(`Error: ${state.pendingError}`);
      store.send({ type: 'errorDismissed' });
    }
    if (state.pendingNavigationTarget !== null) {
      logger.info(`Open requested: ${state.pendingNavigationTarget}`);
      store.send({ type: 'urlOpened' });
    }
    if (state.pendingNotification !== null) {
      logger.info(`Toast: ${state.pendingNotification}`);
      store.send({ type: 'toastShown' });
    }
  });
}
