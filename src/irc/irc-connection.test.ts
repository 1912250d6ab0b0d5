import { describe, expect, it, vi } from 'vitest';
import type { IrcWriter } from './irc-link.js';
import { runIrcLoop } from './irc-connection.js';
import type { IrcSession } from './irc-connection.js';

function makeSession(closed: Promise<Error | null>, quit: (message?: string) => void = () => {}): IrcSession {
  const writer: IrcWriter = { write: () => {}, capEnabled: () => false, currentNick: () => 'bridge' };
  return { writer, closed, quit };
}

describe('runIrcLoop', () => {
  it('reconnects after each close until aborted', async () => {
    const stop = new AbortController();
    const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const onDisconnected = vi.fn();
    const lost = new Error('ECONNRESET');
    let attempts = 0;
    const connect = vi.fn(() => {
      attempts++;
      if (attempts === 3) stop.abort();
      return makeSession(Promise.resolve(attempts === 1 ? lost : null));
    });

    await runIrcLoop({ connect, onDisconnected, reconnectDelayMs: 0, signal: stop.signal, log });

    expect(connect).toHaveBeenCalledTimes(3);
    expect(onDisconnected).toHaveBeenCalledTimes(3);
    expect(log.warn).toHaveBeenCalledTimes(2);
    expect(log.warn).toHaveBeenNthCalledWith(1, { err: lost, retryInMs: 0 }, 'irc:disconnected, reconnecting');
  });

  it('quits the live session when aborted', async () => {
    const stop = new AbortController();
    const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    let close: (err: Error | null) => void = () => {};
    const closed = new Promise<Error | null>((resolve) => { close = resolve; });
    const quit = vi.fn(() => close(null));

    const loop = runIrcLoop({
      connect: () => makeSession(closed, quit),
      onDisconnected: () => {},
      reconnectDelayMs: 60_000,
      signal: stop.signal,
      log,
    });
    stop.abort();
    await loop;

    expect(quit).toHaveBeenCalledWith('Shutting down');
    expect(log.warn).not.toHaveBeenCalled();
  });

  it('waits the reconnect delay between attempts', async () => {
    vi.useFakeTimers();
    const stop = new AbortController();
    const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const connect = vi.fn(() => makeSession(Promise.resolve(null)));

    const loop = runIrcLoop({ connect, onDisconnected: () => {}, reconnectDelayMs: 15_000, signal: stop.signal, log });
    await vi.advanceTimersByTimeAsync(0);
    expect(connect).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(15_000);
    expect(connect).toHaveBeenCalledTimes(2);

    stop.abort();
    await vi.advanceTimersByTimeAsync(0);
    await loop;
  });
});
