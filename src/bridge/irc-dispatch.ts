import { CTCP_DELIMITER, IRC_BOLD, IRC_ITALIC, IRC_RESET } from '../format/control-codes.js';
import { formatIrcForDiscord } from '../format/irc-to-discord.js';
import { resolveDiscordReferences } from '../format/mentions.js';
import type { IrcWriter } from '../irc/irc-link.js';
import type { IrcMessage } from '../irc/irc-message.js';
import { executeActions } from './actions.js';
import type { BridgeAction, BridgeContext } from './actions.js';
import type { IrcReadinessGate } from './readiness.js';

// A lone link to an image or video, relayed on its own so Discord embeds it.
const MEDIA_LINK = /^https?:\/\/[^\s\x01-\x16]+\.(?:jpg|jpeg|png|gif|mp4|webm)$/;

function sameNick(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/** IRC-formatted text to Discord content, with mentions and emoji resolved for the channel's guild. */
export function ircTextToDiscord(ctx: BridgeContext, channelId: string, ircText: string): string {
  const formatted = formatIrcForDiscord(ircText);
  const guild = ctx.roster.guildForChannel(channelId);
  return guild ? resolveDiscordReferences(formatted, guild) : formatted;
}

function notice(nick: string, rest: string): string {
  return `${IRC_ITALIC}${nick}${IRC_RESET} ${rest}`;
}

function withReason(text: string, reason: string | undefined): string {
  return reason ? `${text}: ${reason}` : text;
}

/**
 * Maps one IRC line to the Discord actions it causes. Handshake lines and the
 * readiness gate are handled by the caller.
 */
export function translateIrcMessage(ctx: BridgeContext, msg: IrcMessage, ownNick: string): BridgeAction[] {
  if (msg.command !== 'PRIVMSG' && sameNick(msg.nick, ownNick)) return [];

  const msgId = msg.tags['msgid'] || undefined;
  const replyTargets = ctx.correlations.lookupBySource(msg.tags['+draft/reply'] ?? '');
  const replyToId = replyTargets[replyTargets.length - 1];

  const send = (channelId: string, ircText: string, correlateWith = msgId): BridgeAction => ({
    type: 'discordSend',
    channelId,
    content: ircTextToDiscord(ctx, channelId, ircText),
    replyToId,
    correlateWith,
  });
  const mapped = (ircChannel: string | undefined) =>
    ircChannel === undefined ? undefined : ctx.channels.discordChannel(ircChannel);
  const [first, second, third] = msg.params;

  switch (msg.command) {
    case 'NICK':
      return ctx.channels.discordChannelIds().map((id) => send(id, notice(msg.nick, `is now known as ${first ?? ''}`)));

    case 'QUIT':
      return ctx.channels.discordChannelIds().map((id) => send(id, withReason(notice(msg.nick, 'has quit'), first)));

    case 'JOIN': {
      const channelId = mapped(first);
      return channelId ? [send(channelId, notice(msg.nick, 'has joined the channel'))] : [];
    }

    case 'PART': {
      const channelId = mapped(first);
      return channelId ? [send(channelId, withReason(notice(msg.nick, 'has left the channel'), second))] : [];
    }

    case 'KICK': {
      const channelId = mapped(first);
      if (!channelId || second === undefined) return [];
      return [send(channelId, withReason(notice(second, `was kicked off the channel by ${msg.nick}`), third))];
    }

    case 'REDACT': {
      const channelId = mapped(first);
      if (!channelId || !second) return [];
      return ctx.correlations.lookupBySource(second).map((messageId): BridgeAction => ({
        type: 'discordDelete',
        channelId,
        messageId,
      }));
    }

    case 'TAGMSG': {
      const channelId = mapped(first);
      if (!channelId || msg.tags['+typing'] !== 'active') return [];
      return [{ type: 'discordTyping', channelId }];
    }

    case 'PRIVMSG': {
      const channelId = mapped(first);
      if (!channelId) return [];

      if (sameNick(msg.nick, ownNick)) {
        // Echo of a line we relayed from Discord: link the server's msgid to it.
        const discordId = msg.tags['+discord'];
        if (msgId && discordId) ctx.correlations.recordPair(msgId, discordId);
        return [];
      }

      let body = second ?? '';
      if (replyToId !== undefined) {
        const addressed = `${ownNick}: `;
        if (body.startsWith(addressed)) body = body.slice(addressed.length);
      }
      if (body.startsWith(CTCP_DELIMITER)) {
        const ctcp = body.replace(/^\x01+|\x01+$/g, '');
        const space = ctcp.indexOf(' ');
        const verb = space >= 0 ? ctcp.slice(0, space) : ctcp;
        if (verb !== 'ACTION') return [];
        body = IRC_ITALIC + (space >= 0 ? ctcp.slice(space + 1) : '');
      }
      if (!body) return [];

      if (!body.includes(' ') && MEDIA_LINK.test(body)) {
        return [
          { type: 'discordSend', channelId, content: ircTextToDiscord(ctx, channelId, `${IRC_BOLD}<${msg.nick}>`), replyToId },
          send(channelId, body),
        ];
      }
      return [send(channelId, `${IRC_BOLD}<${msg.nick}>${IRC_RESET} ${body}`)];
    }

    default:
      // NOTICE and everything else stays on IRC.
      return [];
  }
}

/**
 * Entry point for every parsed line of a connection: handshake first, then
 * relay once the gate reports ready. Errors are logged, never thrown.
 */
/**
 * Lines are handled one at a time in arrival order: a line's Discord sends and
 * correlations complete before the next line is translated, so a reply or
 * REDACT sees the ids recorded for the message it refers to.
 */
export function createIrcMessageHandler(ctx: BridgeContext, gate: IrcReadinessGate) {
  const handleLine = async (msg: IrcMessage, writer: IrcWriter): Promise<void> => {
    try {
      const ownNick = writer.currentNick();
      if (msg.command !== 'PRIVMSG' && sameNick(msg.nick, ownNick)) return;
      if (gate.handle(msg, writer)) return;
      if (!gate.ready) return;
      await executeActions(ctx, translateIrcMessage(ctx, msg, ownNick));
    } catch (err) {
      ctx.log.error({ err, command: msg.command }, 'irc:handler failed');
    }
  };

  let queue: Promise<void> = Promise.resolve();
  return (msg: IrcMessage, writer: IrcWriter): Promise<void> => {
    queue = queue.then(() => handleLine(msg, writer));
    return queue;
  };
}
