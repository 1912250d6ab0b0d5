import type { IrcLink } from '../irc/irc-link.js';
import type { IrcOutboundMessage } from '../irc/irc-message.js';
import type { LoggerLike } from '../logging/logger-like.js';
import type { RosterSource } from '../roster/roster.js';
import type { ChannelMap } from './channel-map.js';
import type { CorrelationStore } from './correlation-store.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type BridgeAction =
  /** `correlateWith` is the IRC msgid to link with the id Discord assigns. */
  | { type: 'discordSend'; channelId: string; content: string; replyToId?: string; correlateWith?: string }
  | { type: 'discordDelete'; channelId: string; messageId: string }
  | { type: 'discordTyping'; channelId: string }
  | { type: 'ircWrite'; message: IrcOutboundMessage };

/** Outbound half of the Discord connection. `send` resolves to the new message id. */
export interface DiscordOutbound {
  send(channelId: string, content: string, replyToId?: string): Promise<string | null>;
  delete(channelId: string, messageId: string): Promise<void>;
  typing(channelId: string): Promise<void>;
}

/** Everything dispatch reads or writes; one instance per running bridge. */
export type BridgeContext = {
  channels: ChannelMap;
  correlations: CorrelationStore;
  irc: IrcLink;
  discord: DiscordOutbound;
  roster: RosterSource;
  log: LoggerLike;
  /** Our own Discord user id, null before login completes. */
  discordUserId(): string | null;
  now?: () => Date;
  /** IANA zone for rendered timestamps; the host zone when unset. */
  timeZone?: string;
};

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

async function executeAction(ctx: BridgeContext, action: BridgeAction): Promise<void> {
  switch (action.type) {
    case 'discordSend': {
      const id = await ctx.discord.send(action.channelId, action.content, action.replyToId);
      if (id && action.correlateWith) {
        ctx.correlations.recordPair(action.correlateWith, id);
      }
      return;
    }
    case 'discordDelete':
      await ctx.discord.delete(action.channelId, action.messageId);
      return;
    case 'discordTyping':
      await ctx.discord.typing(action.channelId);
      return;
    case 'ircWrite':
      ctx.irc.send(action.message);
      return;
  }
}

/**
 * Performs actions in order. A failed action is logged and does not stop the
 * rest; a failed send records no correlation.
 */
export async function executeActions(ctx: BridgeContext, actions: readonly BridgeAction[]): Promise<void> {
  for (const action of actions) {
    try {
      await executeAction(ctx, action);
    } catch (err) {
      ctx.log.warn({ err, action: action.type }, 'bridge:action failed');
    }
  }
}
