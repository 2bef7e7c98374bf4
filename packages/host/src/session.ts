/**
 * One content-surface instance: its store, inbound handler and navigation
 * policy. Popups get a child session with freshly initialized state.
 */
import { BridgeHandler } from './bridge-handler.js';
import type { DispatchSink } from './dispatch-sink.js';
import type { HostEnvironment } from './environment.js';
import type { Logger } from './logger.js';
import { NavigationPolicy } from './navigation-policy.js';
import type { SecurityGate } from './security-gate.js';
import { BridgeStore } from './store.js';

export interface BridgeSessionOptions {
  gate: SecurityGate;
  environment: HostEnvironment;
  sink: DispatchSink;
  logger?: Logger;
}

export class BridgeSession {
  readonly store: BridgeStore;
  readonly handler: BridgeHandler;
  readonly navigation: NavigationPolicy;
  private children = new Set<BridgeSession>();

  constructor(private readonly options: BridgeSessionOptions) {
    this.store = new BridgeStore({
      sink: options.sink,
      environment: options.environment,
      logger: options.logger,
    });
    this.handler = new BridgeHandler(options.gate, this.store, options.logger);
    this.navigation = new NavigationPolicy(options.gate, this.store, options.logger);
  }

  /**
   * Create a session for a popup opened by this surface.
   * The child shares the gate and environment but owns its own state.
   */
  openChild(sink: DispatchSink): BridgeSession {
    const child = new BridgeSession({ ...this.options, sink });
    this.children.add(child);
    return child;
  }

  /** Close a popup session opened by this surface */
  closeChild(child: BridgeSession): void {
    if (this.children.delete(child)) child.close();
  }

  /** Tear down this session and every popup it opened */
  close(): void {
    for (const child of this.children) {
      child.close();
    }
    this.children.clear();
    this.store.dispose();
  }
}
