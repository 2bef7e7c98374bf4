/**
 * Page-side bridge client.
 *
 * Sends request envelopes to the host and routes replies back to the caller.
 * Each request gets a one-shot callback registered under
 * `<namespace>.callbacks.cb<N>` on `scope`, so a host that evaluates
 * `callback(json);` and a host that sends callback frames reach the same
 * function.
 */
import type { ZodType, ZodTypeDef } from 'zod';
import type {
  AppVersionResponseData,
  BridgeMessageType,
  BridgeRequest,
  BridgeResponse,
  GreetingResponseData,
  UserInfoResponseData,
} from 'hostbridge-shared';
import {
  PAGE_CALLBACK_NAMESPACE,
  appVersionResponseSchema,
  bridgeResponseSchema,
  callbackFrameSchema,
  greetingResponseSchema,
  isValidCallbackName,
  userInfoResponseSchema,
} from 'hostbridge-shared';

interface PendingRequest {
  resolve: (value: BridgeResponse<unknown>) => void;
  reject: (error: Error) => void;
}

export interface PageBridgeOptions {
  /** Hands an envelope to the host */
  post: (message: BridgeRequest) => void;
  /** Object the callbacks are registered on; defaults to globalThis */
  scope?: object;
  namespace?: string;
}

export interface PageBridge {
  /** Send a request and wait for its reply */
  request(type: BridgeMessageType, data?: unknown): Promise<BridgeResponse<unknown>>;
  /** Send a request without a callback */
  notify(type: BridgeMessageType, data?: unknown): void;
  greet(text: string): Promise<BridgeResponse<GreetingResponseData>>;
  getUserInfo(): Promise<BridgeResponse<UserInfoResponseData>>;
  getAppVersion(): Promise<BridgeResponse<AppVersionResponseData>>;
  openUrl(url: string): Promise<BridgeResponse>;
  showToast(message: string): Promise<BridgeResponse>;
  /** Handle a frame sent by a host over a message transport */
  receive(frame: unknown): boolean;
  /** Reject every outstanding request */
  dispose(): void;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function ensureCallbacks(scope: object, namespace: string): Record<string, unknown> {
  const existing: unknown = Reflect.get(scope, namespace);
  if (isRecord(existing) && isRecord(existing.callbacks)) return existing.callbacks;

  const callbacks: Record<string, unknown> = {};
  Reflect.set(scope, namespace, { callbacks });
  return callbacks;
}

/** Walk a dotted callback name through own properties, starting at `scope` */
function lookup(scope: object, name: string): unknown {
  let current: unknown = scope;
  for (const part of name.split('.')) {
    if (typeof current !== 'object' && typeof current !== 'function') return undefined;
    if (current === null || !Object.prototype.hasOwnProperty.call(current, part)) {
      return undefined;
    }
    current = Reflect.get(current, part);
  }
  return current;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function createPageBridge(options: PageBridgeOptions): PageBridge {
  const scope = options.scope ?? globalThis;
  const namespace = options.namespace ?? PAGE_CALLBACK_NAMESPACE;
  const callbacks = ensureCallbacks(scope, namespace);
  const pending = new Map<string, PendingRequest>();
  let nextId = 1;

  function release(key: string): void {
    delete callbacks[key];
    pending.delete(key);
  }

  function request(type: BridgeMessageType, data?: unknown): Promise<BridgeResponse<unknown>> {
    return new Promise((resolve, reject) => {
      const key = `cb${nextId++}`;
      pending.set(key, { resolve, reject });
      callbacks[key] = (response: unknown) => {
        release(key);
        const parsed = bridgeResponseSchema.safeParse(response);
        if (parsed.success) {
          resolve(parsed.data);
        } else {
          reject(new Error('Malformed reply from host'));
        }
      };

      const envelope: BridgeRequest = { type, callback: `${namespace}.callbacks.${key}` };
      if (data !== undefined) envelope.data = data;
      try {
        options.post(envelope);
      } catch (err) {
        release(key);
        reject(toError(err));
      }
    });
  }

  async function requestData<T>(
    type: BridgeMessageType,
    data: unknown,
    schema: ZodType<T, ZodTypeDef, unknown>
  ): Promise<BridgeResponse<T>> {
    const response = await request(type, data);
    if (!response.success) return response;
    const parsed = schema.safeParse(response.data);
    if (!parsed.success) throw new Error(`Malformed ${type} reply from host`);
    return { success: true, message: response.message, data: parsed.data };
  }

  async function requestStatus(type: BridgeMessageType, data: unknown): Promise<BridgeResponse> {
    const response = await request(type, data);
    if (!response.success) return response;
    return { success: true, message: response.message };
  }

  return {
    request,

    notify(type, data) {
      const envelope: BridgeRequest = { type };
      if (data !== undefined) envelope.data = data;
      options.post(envelope);
    },

    greet: (text) =>
      requestData('greeting', { text, timestamp: new Date().toISOString() }, greetingResponseSchema),
    getUserInfo: () => requestData('getUserInfo', undefined, userInfoResponseSchema),
    getAppVersion: () => requestData('getAppVersion', undefined, appVersionResponseSchema),
    openUrl: (url) => requestStatus('openUrl', { url }),
    showToast: (message) => requestStatus('showToast', { message }),

    receive(frame) {
      const parsed = callbackFrameSchema.safeParse(frame);
      if (!parsed.success || !isValidCallbackName(parsed.data.callback)) return false;

      const target = lookup(scope, parsed.data.callback);
      if (typeof target !== 'function') return false;

      let payload: unknown;
      try {
        payload = JSON.parse(parsed.data.payload);
      } catch {
        return false;
      }
      target(payload);
      return true;
    },

    dispose() {
      for (const [key, entry] of pending) {
        delete callbacks[key];
        entry.reject(new Error('Page bridge disposed'));
      }
      pending.clear();
    },
  };
}
