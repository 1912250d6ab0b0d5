import type { LoggerLike } from '../logging/logger-like.js';
import type { IrcOutboundMessage } from './irc-message.js';

export const MESSAGE_REDACTION_CAP = 'draft/message-redaction';

/** What the bridge needs from a live IRC connection. */
export interface IrcWriter {
  write(message: IrcOutboundMessage): void;
  capEnabled(cap: string): boolean;
  currentNick(): string;
}

/**
 * Holds the current live IRC connection, or nothing while disconnected.
 * Sends made without a connection are dropped, never queued.
 */
export class IrcLink {
  private writer: IrcWriter | null = null;

  constructor(private readonly log?: LoggerLike) {}

  attach(writer: IrcWriter): void {
    this.writer = writer;
  }

  /** Clears the link only if `writer` is still the current one. */
  detach(writer?: IrcWriter): void {
    if (writer === undefined || this.writer === writer) this.writer = null;
  }

  get connected(): boolean {
    return this.writer !== null;
  }

  currentNick(): string | null {
    return this.writer ? this.writer.currentNick() : null;
  }

  send(message: IrcOutboundMessage): boolean {
    const writer = this.writer;
    if (!writer) {
      this.log?.debug?.({ command: message.command }, 'irc:send dropped (not connected)');
      return false;
    }
    if (message.command === 'REDACT' && !writer.capEnabled(MESSAGE_REDACTION_CAP)) {
      this.log?.debug?.({ command: message.command }, `irc:send dropped (${MESSAGE_REDACTION_CAP} not enabled)`);
      return false;
    }
    writer.write(message);
    return true;
  }
}
