import { describe, it, expect, vi } from 'vitest';
import { BridgeStore } from '../store.js';
import { RecordingDispatchSink } from '../dispatch-sink.js';
import type { DispatchSink } from '../dispatch-sink.js';
import { createStaticEnvironment } from '../environment.js';
import type { HostEnvironment } from '../environment.js';
import { sendEffect } from '../feature.js';
import type { Logger } from '../logger.js';

const environment = createStaticEnvironment({
  userName: 'Test User',
  deviceModel: 'TestDevice',
  deviceIdentifier: 'test-1,1',
  osVersion: '17.2',
  appVersion: '2.3.4',
});

function createLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function createStore(options: { sink?: DispatchSink; env?: HostEnvironment; logger?: Logger } = {}) {
  const sink = options.sink ?? new RecordingDispatchSink();
  const logger = options.logger ?? createLogger();
  const store = new BridgeStore({ sink, environment: options.env ?? environment, logger });
  return { store, sink, logger };
}

describe('BridgeStore', () => {
  it('applies state changes synchronously', () => {
    const { store } = createStore();
    store.send({
      type: 'bridgeMessageReceived',
      request: { type: 'openUrl', data: { url: 'https://www.apple.com' } },
    });
    expect(store.state.pendingNavigationTarget).toBe('https://www.apple.com');
  });

  it('delivers replies to the sink', async () => {
    const sink = new RecordingDispatchSink();
    const { store } = createStore({ sink });
    store.send({
      type: 'bridgeMessageReceived',
      request: { type: 'greeting', callback: 'cb', data: { text: 'Hello' } },
    });
    await store.settled();
    expect(sink.deliveries).toEqual([
      { callback: 'cb', json: '{"data":{"text":"Hello"},"message":"Message received.","success":true}' },
    ]);
  });

  it('delivers replies in the order requests were accepted', async () => {
    let releaseUser: (name: string) => void = () => {};
    const slowEnv: HostEnvironment = {
      ...environment,
      userName: () =>
        new Promise<string>((resolve) => {
          releaseUser = resolve;
        }),
    };
    const sink = new RecordingDispatchSink();
    const { store } = createStore({ sink, env: slowEnv });

    store.send({ type: 'bridgeMessageReceived', request: { type: 'getUserInfo', callback: 'first' } });
    store.send({
      type: 'bridgeMessageReceived',
      request: { type: 'greeting', callback: 'second', data: { text: 'Hi' } },
    });

    // Intake is not blocked by the pending lookup.
    expect(sink.deliveries).toEqual([]);
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(sink.deliveries).toEqual([]);

    releaseUser('Late User');
    await store.settled();
    expect(sink.deliveries.map((d) => d.callback)).toEqual(['first', 'second']);
  });

  it('drops replies for invalid callback names', async () => {
    const sink = new RecordingDispatchSink();
    const logger = createLogger();
    const { store } = createStore({ sink, logger });
    store.send({
      type: 'bridgeMessageReceived',
      request: { type: 'greeting', callback: 'alert(1);cb', data: { text: 'x' } },
    });
    await store.settled();
    expect(sink.deliveries).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(
      'INVALID_CALLBACK: Dropped reply for invalid callback name "alert(1);cb"'
    );
  });

  it('sends nothing for requests without a callback', async () => {
    const sink = new RecordingDispatchSink();
    const { store } = createStore({ sink });
    store.send({ type: 'bridgeMessageReceived', request: { type: 'getAppVersion' } });
    await store.settled();
    expect(sink.deliveries).toEqual([]);
  });

  it('logs delivery failures without touching state', async () => {
    const failing: DispatchSink = {
      deliver: vi.fn(async () => {
        throw new Error('surface gone');
      }),
    };
    const logger = createLogger();
    const { store } = createStore({ sink: failing, logger });
    store.send({ type: 'bridgeMessageReceived', request: { type: 'getAppVersion', callback: 'cb' } });
    const before = store.state;
    await store.settled();
    expect(logger.error).toHaveBeenCalledWith('Failed to deliver reply to cb', expect.any(Error));
    expect(store.state).toBe(before);
    expect(store.state.pendingError).toBeNull();
  });

  it('keeps delivering after a failed delivery', async () => {
    const delivered: string[] = [];
    const sink: DispatchSink = {
      deliver: async (callback) => {
        if (callback === 'bad') throw new Error('surface gone');
        delivered.push(callback);
      },
    };
    const { store } = createStore({ sink });
    store.enqueue(sendEffect('bad', { success: true, message: 'a' }));
    store.enqueue(sendEffect('good', { success: true, message: 'b' }));
    await store.settled();
    expect(delivered).toEqual(['good']);
  });

  it('notifies subscribers on state changes only', () => {
    const { store } = createStore();
    const listener = vi.fn();
    const unsubscribe = store.subscribe(listener);

    store.send({ type: 'errorDismissed' });
    expect(listener).not.toHaveBeenCalled();

    store.send({ type: 'errorOccurred', message: 'boom' });
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(store.state, { type: 'errorOccurred', message: 'boom' });

    unsubscribe();
    store.send({ type: 'errorDismissed' });
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('drops queued effects and ignores actions after dispose', async () => {
    const sink = new RecordingDispatchSink();
    const { store } = createStore({ sink });
    store.send({
      type: 'bridgeMessageReceived',
      request: { type: 'greeting', callback: 'cb', data: { text: 'Hello' } },
    });
    store.dispose();
    store.send({ type: 'errorOccurred', message: 'late' });
    await store.settled();
    expect(sink.deliveries).toEqual([]);
    expect(store.state.pendingError).toBeNull();
    expect(store.isDisposed).toBe(true);
  });

  it('runs actions sent by a listener after every listener has seen the current one', () => {
    const { store } = createStore();
    const seen: Array<[string, string | null]> = [];
    store.subscribe((_state, action) => {
      if (action.type === 'errorOccurred') store.send({ type: 'errorDismissed' });
    });
    store.subscribe((state, action) => {
      seen.push([action.type, state.pendingError]);
    });

    store.send({ type: 'errorOccurred', message: 'boom' });

    expect(seen).toEqual([
      ['errorOccurred', 'boom'],
      ['errorDismissed', null],
    ]);
    expect(store.state.pendingError).toBeNull();
  });

  it('keeps replies in order when a listener sends a request', async () => {
    const sink = new RecordingDispatchSink();
    const { store } = createStore({ sink });
    store.subscribe((_state, action) => {
      if (action.type === 'bridgeMessageReceived' && action.request.callback === 'outer') {
        store.send({
          type: 'bridgeMessageReceived',
          request: { type: 'greeting', callback: 'inner', data: { text: 'Hello' } },
        });
      }
    });

    store.send({
      type: 'bridgeMessageReceived',
      request: { type: 'showToast', callback: 'outer', data: { message: 'Saved' } },
    });
    await store.settled();

    expect(sink.deliveries.map((d) => d.callback)).toEqual(['outer', 'inner']);
  });
});
