import IRC from 'irc-framework';
import type { LoggerLike } from '../logging/logger-like.js';
import type { IrcWriter } from './irc-link.js';
import { MESSAGE_REDACTION_CAP } from './irc-link.js';
import type { IrcMessage } from './irc-message.js';
import { parseIrcLine, serializeIrcMessage } from './irc-message.js';

export const REQUESTED_CAPS = ['message-tags', 'echo-message', MESSAGE_REDACTION_CAP];

export type IrcConnectionOptions = {
  host: string;
  port: number;
  tls: boolean;
  nick: string;
  username: string;
  realname: string;
  /** Log every raw line in both directions at debug. */
  debug: boolean;
};

export type IrcConnectionHandlers = {
  onConnected(writer: IrcWriter): void;
  onMessage(msg: IrcMessage, writer: IrcWriter): Promise<void>;
};

export type IrcSession = {
  writer: IrcWriter;
  /** Settles once the connection is gone; carries the socket error if there was one. */
  closed: Promise<Error | null>;
  quit(message?: string): void;
};

/** Opens one IRC connection. Reconnecting is the caller's job. */
export function connectIrc(
  opts: IrcConnectionOptions,
  handlers: IrcConnectionHandlers,
  log?: LoggerLike,
): IrcSession {
  const client = new IRC.Client();
  const writer: IrcWriter = {
    write: (message) => client.raw(serializeIrcMessage(message)),
    capEnabled: (cap) => client.network.cap.isEnabled(cap),
    currentNick: () => client.user.nick,
  };

  let lastError: Error | null = null;
  const closed = new Promise<Error | null>((resolve) => {
    client.on('socket error', (err) => {
      lastError = err;
    });
    client.on('socket close', () => resolve(lastError));
    client.on('close', () => resolve(lastError));
  });

  client.on('socket connected', () => {
    log?.info({ host: opts.host, port: opts.port, tls: opts.tls }, 'irc:connected');
    handlers.onConnected(writer);
  });

  client.on('raw', (event) => {
    if (opts.debug) log?.debug?.({ line: event.line }, event.from_server ? 'irc:<<<' : 'irc:>>>');
    if (!event.from_server) return;
    const msg = parseIrcLine(event.line);
    if (!msg) return;
    void handlers.onMessage(msg, writer);
  });

  client.requestCap(REQUESTED_CAPS);
  client.connect({
    host: opts.host,
    port: opts.port,
    tls: opts.tls,
    nick: opts.nick,
    username: opts.username,
    gecos: opts.realname,
    auto_reconnect: false,
    enable_echomessage: true,
  });

  return {
    writer,
    closed,
    quit: (message) => client.quit(message),
  };
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

export type IrcLoopOptions = {
  connect: () => IrcSession;
  onDisconnected: (writer: IrcWriter) => void;
  reconnectDelayMs: number;
  signal: AbortSignal;
  log: LoggerLike;
};

/**
 * Connects, waits for the connection to end, waits `reconnectDelayMs`, and
 * repeats until `signal` aborts. Quitting the current session on abort is
 * what ends the wait.
 */
export async function runIrcLoop(opts: IrcLoopOptions): Promise<void> {
  while (!opts.signal.aborted) {
    const session = opts.connect();
    const onAbort = () => session.quit('Shutting down');
    opts.signal.addEventListener('abort', onAbort, { once: true });
    const err = await session.closed;
    opts.signal.removeEventListener('abort', onAbort);
    opts.onDisconnected(session.writer);
    if (opts.signal.aborted) break;
    opts.log.warn({ err, retryInMs: opts.reconnectDelayMs }, 'irc:disconnected, reconnecting');
    await sleep(opts.reconnectDelayMs, opts.signal);
  }
}
