import type { IrcLink, IrcWriter } from '../irc/irc-link.js';
import type { IrcMessage } from '../irc/irc-message.js';
import { lastParam } from '../irc/irc-message.js';
import type { LoggerLike } from '../logging/logger-like.js';

export type IrcConnectionState = 'disconnected' | 'handshaking' | 'ready';

/** Token sent in the post-registration PING; its PONG marks the link ready. */
export const READY_PING_TOKEN = 'ready';

/**
 * Registration handshake for one IRC connection.
 *
 *   socket connect -> handshaking
 *   001            -> JOIN every channel, publish the writer on the link
 *   005            -> MODE <nick> +<BOT mode> when advertised, then PING ready
 *   PONG ready     -> ready
 *   close / error  -> disconnected, link cleared
 */
export class IrcReadinessGate {
  private current: IrcConnectionState = 'disconnected';

  constructor(
    private readonly link: IrcLink,
    private readonly ircChannels: () => string[],
    private readonly log?: LoggerLike,
  ) {}

  get state(): IrcConnectionState {
    return this.current;
  }

  get ready(): boolean {
    return this.current === 'ready';
  }

  connected(): void {
    this.current = 'handshaking';
  }

  disconnected(writer?: IrcWriter): void {
    this.current = 'disconnected';
    this.link.detach(writer);
  }

  /** Returns true when `msg` was a handshake line and needs no further dispatch. */
  handle(msg: IrcMessage, writer: IrcWriter): boolean {
    switch (msg.command) {
      case '001':
        for (const channel of this.ircChannels()) {
          writer.write({ command: 'JOIN', params: [channel] });
        }
        this.link.attach(writer);
        this.log?.info({ nick: writer.currentNick() }, 'irc:registered');
        return true;
      case '005':
        // params: <nick> <token>... :are supported by this server
        for (const token of msg.params.slice(1, -1)) {
          const eq = token.indexOf('=');
          const key = eq >= 0 ? token.slice(0, eq) : token;
          const value = eq >= 0 ? token.slice(eq + 1) : '';
          if (key === 'BOT' && value) {
            writer.write({ command: 'MODE', params: [writer.currentNick(), `+${value}`] });
          }
        }
        writer.write({ command: 'PING', params: [READY_PING_TOKEN] });
        return true;
      case 'PONG':
        if (lastParam(msg) === READY_PING_TOKEN) {
          if (this.current !== 'ready') this.log?.info({}, 'irc:ready');
          this.current = 'ready';
        }
        return true;
      default:
        return false;
    }
  }
}
