/**
 * Shared constants for HostBridge.
 */
import type { BridgeMessageType } from './types/bridge.js';

/** Scheme of locally bundled content */
export const LOCAL_CONTENT_SCHEME = 'file';

/** Entry placed in the trusted-origin list to trust local content */
export const LOCAL_CONTENT_ORIGIN = 'file://';

/** Default WebSocket port for content surface ↔ host communication */
export const SURFACE_DEFAULT_PORT = 18180;

/** Default WebSocket bind address */
export const SURFACE_DEFAULT_HOST = '127.0.0.1';

/** Default global under which the page client registers its callbacks */
export const PAGE_CALLBACK_NAMESPACE = '__hostbridge';

/** Reply sent when an envelope cannot be decoded */
export const GENERIC_FAILURE_MESSAGE = 'Unable to process the request.';

/** Status messages carried by every reply, by request tag */
export const REPLY_MESSAGES: Record<
  BridgeMessageType,
  { success: string; failure: string }
> = {
  greeting: {
    success: 'Message received.',
    failure: 'Failed to deliver the message.',
  },
  getUserInfo: {
    success: 'Loaded user info.',
    failure: 'Failed to load user info.',
  },
  getAppVersion: {
    success: 'Loaded app version info.',
    failure: 'Failed to load app version info.',
  },
  openUrl: {
    success: 'Opening the URL in a new screen.',
    failure: 'Invalid URL.',
  },
  showToast: {
    success: 'Showing the toast.',
    failure: 'No message provided.',
  },
};
