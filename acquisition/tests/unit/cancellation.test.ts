// tests/unit/cancellation.test.ts - Cancellation Signal Tests

import { EventEmitter } from 'events';
import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  CancellationToken,
  installSignalHandlers,
  processCancellation,
  resetProcessCancellation,
  signalHandlersInstalled,
} from '../../src/cancellation';

afterEach(() => {
  resetProcessCancellation();
});

describe('CancellationToken', () => {
  it('starts running and cancels once', () => {
    const token = new CancellationToken();
    expect(token.isCancelled).toBe(false);

    token.cancel('first');
    token.cancel('second');

    expect(token.isCancelled).toBe(true);
    expect(token.reason).toBe('first');
  });

  it('notifies listeners once with the reason', () => {
    const token = new CancellationToken();
    const listener = vi.fn();
    token.onCancel(listener);

    token.cancel('stop');
    token.cancel('again');

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith('stop');
  });

  it('runs a listener immediately when already cancelled', () => {
    const token = new CancellationToken();
    token.cancel('done');
    const listener = vi.fn();

    token.onCancel(listener);

    expect(listener).toHaveBeenCalledWith('done');
  });

  it('does not call an unsubscribed listener', () => {
    const token = new CancellationToken();
    const listener = vi.fn();
    const unsubscribe = token.onCancel(listener);

    unsubscribe();
    token.cancel();

    expect(listener).not.toHaveBeenCalled();
  });
});

describe('installSignalHandlers', () => {
  it('subscribes once however often it is called', () => {
    const signals = new EventEmitter();

    installSignalHandlers(() => {}, signals);
    installSignalHandlers(() => {}, signals);

    expect(signals.listenerCount('SIGINT')).toBe(1);
    expect(signals.listenerCount('SIGTERM')).toBe(1);
    expect(signalHandlersInstalled()).toBe(true);
  });

  it('cancels the process token on the first signal only', () => {
    const signals = new EventEmitter();
    const write = vi.fn();
    installSignalHandlers(write, signals);

    signals.emit('SIGTERM', 'SIGTERM');
    signals.emit('SIGINT', 'SIGINT');

    expect(processCancellation().isCancelled).toBe(true);
    expect(processCancellation().reason).toBe('SIGTERM');
    expect(write).toHaveBeenCalledTimes(1);
    expect(write).toHaveBeenCalledWith('\nShutting down...\n');
  });

  it('reset gives a fresh token and removes the handlers', () => {
    const signals = new EventEmitter();
    installSignalHandlers(() => {}, signals);
    processCancellation().cancel();

    resetProcessCancellation();

    expect(processCancellation().isCancelled).toBe(false);
    expect(signals.listenerCount('SIGINT')).toBe(0);
    expect(signalHandlersInstalled()).toBe(false);
  });
});
