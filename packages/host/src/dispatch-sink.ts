/**
 * Dispatch sinks deliver encoded replies into a content surface.
 */
import { buildCallbackScript } from 'hostbridge-shared';

export interface DispatchSink {
  /** Deliver `json` to the page-side function `callback` */
  deliver(callback: string, json: string): Promise<void>;
}

/** A surface that can evaluate script, such as an embedded web view */
export interface ScriptSurface {
  evaluate(script: string): Promise<void>;
}

export class InvalidCallbackError extends Error {
  constructor(readonly callback: string) {
    super(`Invalid callback name: ${JSON.stringify(callback)}`);
    this.name = 'InvalidCallbackError';
  }
}

/** Delivers replies by evaluating `callback(json);` in the surface */
export class ScriptDispatchSink implements DispatchSink {
  constructor(private readonly surface: ScriptSurface) {}

  async deliver(callback: string, json: string): Promise<void> {
    const script = buildCallbackScript(callback, json);
    if (script === null) throw new InvalidCallbackError(callback);
    await this.surface.evaluate(script);
  }
}

/** Keeps deliveries in memory instead of sending them anywhere */
export class RecordingDispatchSink implements DispatchSink {
  readonly deliveries: Array<{ callback: string; json: string }> = [];

  async deliver(callback: string, json: string): Promise<void> {
    this.deliveries.push({ callback, json });
  }
}
