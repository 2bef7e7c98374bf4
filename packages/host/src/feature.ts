/**
 * Bridge feature: protocol state, actions and the reducer.
 *
 * `reduce` is pure. Replies are returned as deferred {@link Effect}s and are
 * only produced and delivered by the store, after the transition is applied.
 */
import type {
  AnyBridgeResponse,
  BridgeRequest,
  BridgeResponse,
  BridgeResponseDataMap,
} from 'hostbridge-shared';
import {
  REPLY_MESSAGES,
  decodePayload,
  encodeResponse,
  failureResponse,
  greetingRequestSchema,
  openUrlRequestSchema,
  showToastRequestSchema,
  successResponse,
} from 'hostbridge-shared';
import type { HostEnvironment } from './environment.js';

export interface ProtocolState {
  /** Load progress in [0, 1] */
  readonly loadProgress: number;
  /** Set by failures, cleared by `errorDismissed` */
  readonly pendingError: string | null;
  /** Set by openUrl, cleared by `urlOpened` */
  readonly pendingNavigationTarget: string | null;
  /** Set by showToast, cleared by `toastShown` */
  readonly pendingNotification: string | null;
}

export type ProtocolAction =
  // navigation lifecycle
  | { type: 'progressUpdated'; progress: number }
  | { type: 'errorOccurred'; message: string }
  // bridge
  | { type: 'bridgeMessageReceived'; request: BridgeRequest }
  // consumption by the presentation layer
  | { type: 'errorDismissed' }
  | { type: 'urlOpened' }
  | { type: 'toastShown' };

/** Produces the reply once the environment is available */
export type ResponseThunk = (environment: HostEnvironment) => Promise<AnyBridgeResponse>;

export type Effect =
  | { kind: 'none' }
  | {
      kind: 'send';
      /** Target callback; undefined means the reply is discarded */
      callback: string | undefined;
      response: ResponseThunk;
    };

export interface Transition {
  state: ProtocolState;
  effect: Effect;
}

/** Resolved reply ready for a dispatch sink */
export interface Delivery {
  callback: string;
  json: string;
}

export const initialProtocolState: ProtocolState = Object.freeze({
  loadProgress: 0,
  pendingError: null,
  pendingNavigationTarget: null,
  pendingNotification: null,
});

export const noEffect: Effect = Object.freeze({ kind: 'none' });

export function createInitialState(): ProtocolState {
  return { ...initialProtocolState };
}

function clampProgress(progress: number): number {
  if (!Number.isFinite(progress)) return 0;
  return Math.min(1, Math.max(0, progress));
}

/** Effect replying with a fixed response */
export function sendEffect(callback: string | undefined, response: AnyBridgeResponse): Effect {
  return { kind: 'send', callback, response: async () => response };
}

function none(state: ProtocolState): Transition {
  return { state, effect: noEffect };
}

export function reduce(state: ProtocolState, action: ProtocolAction): Transition {
  switch (action.type) {
    case 'progressUpdated':
      return none({ ...state, loadProgress: clampProgress(action.progress) });

    case 'errorOccurred':
      return none({ ...state, loadProgress: 0, pendingError: action.message });

    case 'bridgeMessageReceived':
      return handleBridgeMessage(state, action.request);

    case 'errorDismissed':
      return none(state.pendingError === null ? state : { ...state, pendingError: null });

    case 'urlOpened':
      return none(
        state.pendingNavigationTarget === null
          ? state
          : { ...state, pendingNavigationTarget: null }
      );

    case 'toastShown':
      return none(
        state.pendingNotification === null ? state : { ...state, pendingNotification: null }
      );

    default:
      return assertNever(action);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled action: ${JSON.stringify(value)}`);
}

// --- Per-type handlers ---

function handleBridgeMessage(state: ProtocolState, request: BridgeRequest): Transition {
  switch (request.type) {
    case 'greeting':
      return handleGreeting(state, request);
    case 'getUserInfo':
      return handleGetUserInfo(state, request);
    case 'getAppVersion':
      return handleGetAppVersion(state, request);
    case 'openUrl':
      return handleOpenUrl(state, request);
    case 'showToast':
      return handleShowToast(state, request);
    default:
      return assertNever(request.type);
  }
}

function handleGreeting(state: ProtocolState, request: BridgeRequest): Transition {
  const messages = REPLY_MESSAGES.greeting;
  const data = decodePayload(request, greetingRequestSchema);
  if (!data) {
    return { state, effect: sendEffect(request.callback, failureResponse(messages.failure)) };
  }
  const response: BridgeResponse<BridgeResponseDataMap['greeting']> = successResponse(
    messages.success,
    { text: data.text }
  );
  return { state, effect: sendEffect(request.callback, response) };
}

function handleGetUserInfo(state: ProtocolState, request: BridgeRequest): Transition {
  const messages = REPLY_MESSAGES.getUserInfo;
  return {
    state,
    effect: {
      kind: 'send',
      callback: request.callback,
      response: async (env) => {
        try {
          const [name, device, osVersion] = await Promise.all([
            env.userName(),
            env.deviceModel(),
            env.osVersion(),
          ]);
          return successResponse(messages.success, { name, device, osVersion });
        } catch {
          return failureResponse(messages.failure);
        }
      },
    },
  };
}

function handleGetAppVersion(state: ProtocolState, request: BridgeRequest): Transition {
  const messages = REPLY_MESSAGES.getAppVersion;
  return {
    state,
    effect: {
      kind: 'send',
      callback: request.callback,
      response: async (env) => {
        try {
          const [appVersion, osVersion, device] = await Promise.all([
            env.appVersion(),
            env.osVersion(),
            env.deviceIdentifier(),
          ]);
          return successResponse(messages.success, { appVersion, osVersion, device });
        } catch {
          return failureResponse(messages.failure);
        }
      },
    },
  };
}

function handleOpenUrl(state: ProtocolState, request: BridgeRequest): Transition {
  const messages = REPLY_MESSAGES.openUrl;
  const data = decodePayload(request, openUrlRequestSchema);
  if (!data) {
    return { state, effect: sendEffect(request.callback, failureResponse(messages.failure)) };
  }
  return {
    state: { ...state, pendingNavigationTarget: data.url },
    effect: sendEffect(request.callback, successResponse(messages.success)),
  };
}

function handleShowToast(state: ProtocolState, request: BridgeRequest): Transition {
  const messages = REPLY_MESSAGES.showToast;
  const data = decodePayload(request, showToastRequestSchema);
  if (!data) {
    return { state, effect: sendEffect(request.callback, failureResponse(messages.failure)) };
  }
  return {
    state: { ...state, pendingNotification: data.message },
    effect: sendEffect(request.callback, successResponse(messages.success)),
  };
}

// --- Effect resolution ---

/**
 * Produce the reply for a send effect.
 * Resolves to null for `none` effects and for replies without a callback.
 */
export async function resolveEffect(
  effect: Effect,
  environment: HostEnvironment
): Promise<Delivery | null> {
  if (effect.kind === 'none' || effect.callback === undefined) return null;
  const response = await effect.response(environment);
  return { callback: effect.callback, json: encodeResponse(response) };
}
