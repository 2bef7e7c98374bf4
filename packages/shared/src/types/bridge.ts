/**
 * Wire protocol between a content surface (a page) and the host.
 *
 * Content surface → host: a request envelope posted as a JSON object.
 * Host → content surface: a response envelope delivered as a synthesized
 * call `<callback>(<json>);`.
 */

/** Closed set of request tags the host understands */
export const BRIDGE_MESSAGE_TYPES = [
  'greeting',
  'getUserInfo',
  'getAppVersion',
  'openUrl',
  'showToast',
] as const;

/** All bridge request tags for type-safe dispatch */
export type BridgeMessageType = (typeof BRIDGE_MESSAGE_TYPES)[number];

/** Request from the content surface */
export interface BridgeRequest<T extends BridgeMessageType = BridgeMessageType> {
  type: T;
  /** Page-side function to call with the reply; absent means fire and forget */
  callback?: string;
  /** Untyped payload, decoded per type on demand */
  data?: unknown;
}

/** Successful reply, optionally carrying typed data */
export interface BridgeSuccess<T = undefined> {
  success: true;
  message: string;
  data?: T;
}

/** Failed reply. Never carries data. */
export interface BridgeFailure {
  success: false;
  message: string;
}

/** Reply from the host to the content surface */
export type BridgeResponse<T = undefined> = BridgeSuccess<T> | BridgeFailure;

/** greeting request payload */
export interface GreetingRequestData {
  text: string;
  timestamp?: string | null;
}

/** openUrl request payload */
export interface OpenUrlRequestData {
  url: string;
}

/** showToast request payload */
export interface ShowToastRequestData {
  message: string;
}

/** greeting reply data */
export interface GreetingResponseData {
  text: string;
}

/** getUserInfo reply data */
export interface UserInfoResponseData {
  name: string;
  device: string;
  osVersion: string;
}

/** getAppVersion reply data */
export interface AppVersionResponseData {
  appVersion: string;
  osVersion: string;
  device: string;
}

/** Reply data by request tag; `undefined` for tags that only report success */
export interface BridgeResponseDataMap {
  greeting: GreetingResponseData;
  getUserInfo: UserInfoResponseData;
  getAppVersion: AppVersionResponseData;
  openUrl: undefined;
  showToast: undefined;
}

/** Any reply the host can produce */
export type AnyBridgeResponse = BridgeResponse<
  BridgeResponseDataMap[BridgeMessageType]
>;

/** Frame the host sends over a message transport to deliver a reply */
export interface CallbackFrame {
  kind: 'callback';
  callback: string;
  /** Encoded response envelope */
  payload: string;
}
