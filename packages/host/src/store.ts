/**
 * Single-writer store for one content surface.
 *
 * `send` applies the reducer synchronously, so every action sees the state
 * left by the previous one. Actions sent by a listener wait until every
 * listener has seen the current transition. Effects are chained on a per-store queue: replies
 * leave in the order their requests were accepted, and intake never waits for
 * a delivery to finish.
 */
import { formatBridgeError, isValidCallbackName } from 'hostbridge-shared';
import type { DispatchSink } from './dispatch-sink.js';
import type { HostEnvironment } from './environment.js';
import type { Delivery, Effect, ProtocolAction, ProtocolState } from './feature.js';
import { createInitialState, reduce, resolveEffect } from './feature.js';
import type { Logger } from './logger.js';
import { createConsoleLogger } from './logger.js';

export type StateListener = (state: ProtocolState, action: ProtocolAction) => void;

export interface BridgeStoreOptions {
  sink: DispatchSink;
  environment: HostEnvironment;
  logger?: Logger;
  initialState?: ProtocolState;
}

export class BridgeStore {
  private current: ProtocolState;
  private queue: Promise<void> = Promise.resolve();
  private listeners = new Set<StateListener>();
  private pending: ProtocolAction[] = [];
  private dispatching = false;
  private disposed = false;
  private readonly sink: DispatchSink;
  private readonly environment: HostEnvironment;
  private readonly logger: Logger;

  constructor(options: BridgeStoreOptions) {
    this.sink = options.sink;
    this.environment = options.environment;
    this.logger = options.logger ?? createConsoleLogger();
    this.current = options.initialState ?? createInitialState();
  }

  get state(): ProtocolState {
    return this.current;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /** Apply an action and schedule its effect */
  send(action: ProtocolAction): void {
    if (this.disposed) return;
    this.pending.push(action);
    if (this.dispatching) return;

    this.dispatching = true;
    try {
      let next = this.pending.shift();
      while (next !== undefined && !this.disposed) {
        this.apply(next);
        next = this.pending.shift();
      }
    } finally {
      this.dispatching = false;
      this.pending = [];
    }
  }

  private apply(action: ProtocolAction): void {
    const { state, effect } = reduce(this.current, action);
    if (state !== this.current) {
      this.current = state;
      for (const listener of this.listeners) {
        listener(state, action);
      }
    }
    this.enqueue(effect);
  }

  /** Schedule an effect produced outside the reducer */
  enqueue(effect: Effect): void {
    if (this.disposed || effect.kind === 'none') return;
    this.queue = this.queue.then(() => this.perform(effect));
  }

  /**
   * Observe state changes. Returns an unsubscribe function.
   * A listener may call `send`; the action runs after the current notification.
   */
  subscribe(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Resolves once every scheduled effect has been performed */
  settled(): Promise<void> {
    return this.queue;
  }

  /** Stop accepting actions; queued effects are dropped */
  dispose(): void {
    this.disposed = true;
    this.listeners.clear();
  }

  private async perform(effect: Effect): Promise<void> {
    if (this.disposed) return;

    let delivery: Delivery | null;
    try {
      delivery = await resolveEffect(effect, this.environment);
    } catch (err) {
      this.logger.error('Failed to build reply', err);
      return;
    }
    if (!delivery || this.disposed) return;

    if (!isValidCallbackName(delivery.callback)) {
      this.logger.warn(
        formatBridgeError(
          'INVALID_CALLBACK',
          `Dropped reply for invalid callback name ${JSON.stringify(delivery.callback)}`
        )
      );
      return;
    }

    try {
      await this.sink.deliver(delivery.callback, delivery.json);
    } catch (err) {
      this.logger.error(`Failed to deliver reply to ${delivery.callback}`, err);
    }
  }
}
