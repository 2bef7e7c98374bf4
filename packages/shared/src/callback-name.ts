/**
 * Callback name validation.
 *
 * A callback name supplied by the page is interpolated into a script of the
 * form `name(json);`. Only plain, optionally dotted identifiers are accepted,
 * so the name can never close the call expression or start a new statement.
 */

const CALLBACK_NAME_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$.]*$/;

/** True when `name` is safe to use as the callee of a synthesized call */
export function isValidCallbackName(name: unknown): name is string {
  return typeof name === 'string' && CALLBACK_NAME_PATTERN.test(name);
}

/**
 * Build the script that hands `json` to the page-side callback.
 * Returns null for an invalid name; the reply must then be dropped.
 */
export function buildCallbackScript(name: string, json: string): string | null {
  if (!isValidCallbackName(name)) return null;
  return `${name}(${json});`;
}
