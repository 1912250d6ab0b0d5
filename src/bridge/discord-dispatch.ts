import { IRC_RESET } from '../format/control-codes.js';
import { parseDiscordMarkdown } from '../format/discord-markdown.js';
import { renderRichTextForIrc } from '../format/discord-to-irc.js';
import type { BridgeAction, BridgeContext } from './actions.js';
import { breakHighlight, ircNickColor } from './nick-color.js';

// ---------------------------------------------------------------------------
// Event shapes (filled from discord.js objects in src/discord.ts)
// ---------------------------------------------------------------------------

export type DiscordMessageEvent = {
  id: string;
  channelId: string;
  guildId: string | null;
  authorId: string;
  username: string;
  /** Guild nickname, null when unset or outside a guild. */
  nickname: string | null;
  /** Highest colored role of the member; 0 when none. */
  memberColor: number;
  accentColor: number | null;
  content: string;
  attachmentUrls: string[];
  referencedMessageId: string | null;
};

export type DiscordDeleteEvent = {
  id: string;
  channelId: string;
  /** Usually unknown: Discord omits the author on deletions of uncached messages. */
  authorId: string | null;
};

export type DiscordReactionEvent = {
  messageId: string;
  channelId: string;
  userId: string;
  emojiName: string | null;
};

export type DiscordTypingEvent = {
  channelId: string;
  userId: string;
};

// ---------------------------------------------------------------------------
// Translation
// ---------------------------------------------------------------------------

const NEWLINES = /\r\n|\n|\r/g;

function isSelf(ctx: BridgeContext, userId: string | null): boolean {
  const self = ctx.discordUserId();
  return self !== null && userId === self;
}

/** First IRC msgid recorded for a Discord message. */
function firstIrcId(ctx: BridgeContext, discordId: string | null): string | undefined {
  return discordId ? ctx.correlations.lookupByTarget(discordId)[0] : undefined;
}

export function translateDiscordMessage(ctx: BridgeContext, ev: DiscordMessageEvent): BridgeAction[] {
  if (isSelf(ctx, ev.authorId)) return [];
  const ircChannel = ctx.channels.ircChannel(ev.channelId);
  if (!ircChannel) return [];

  const replyTo = firstIrcId(ctx, ev.referencedMessageId);
  const color = ircNickColor(ev.username, ev.memberColor || ev.accentColor);
  const prefix = `<${color}${breakHighlight(ev.nickname || ev.username)}${IRC_RESET}> `;
  const tags: Record<string, string> = { '+discord': ev.id };
  if (replyTo) tags['+draft/reply'] = replyTo;

  const privmsg = (text: string): BridgeAction => ({
    type: 'ircWrite',
    message: { tags: { ...tags }, command: 'PRIVMSG', params: [ircChannel, prefix + text] },
  });

  const actions: BridgeAction[] = [];
  if (ev.content.length > 0) {
    const body = renderRichTextForIrc(parseDiscordMarkdown(ev.content), {
      roster: ctx.roster,
      guildId: ev.guildId,
      now: ctx.now ? ctx.now() : new Date(),
      timeZone: ctx.timeZone,
    });
    actions.push(privmsg(body.replace(NEWLINES, ' ')));
  }
  for (const url of ev.attachmentUrls) {
    actions.push(privmsg(url));
  }
  return actions;
}

export function translateDiscordDelete(ctx: BridgeContext, ev: DiscordDeleteEvent): BridgeAction[] {
  if (isSelf(ctx, ev.authorId)) return [];
  const ircChannel = ctx.channels.ircChannel(ev.channelId);
  if (!ircChannel) return [];
  return ctx.correlations.lookupByTarget(ev.id).map((msgId): BridgeAction => ({
    type: 'ircWrite',
    message: { command: 'REDACT', params: [ircChannel, msgId] },
  }));
}

export function translateDiscordReaction(ctx: BridgeContext, ev: DiscordReactionEvent): BridgeAction[] {
  if (isSelf(ctx, ev.userId)) return [];
  const ircChannel = ctx.channels.ircChannel(ev.channelId);
  if (!ircChannel || !ev.emojiName) return [];
  const replyTo = firstIrcId(ctx, ev.messageId);
  if (!replyTo) return [];
  return [{
    type: 'ircWrite',
    message: {
      tags: { '+draft/react': ev.emojiName, '+draft/reply': replyTo },
      command: 'TAGMSG',
      params: [ircChannel],
    },
  }];
}

export function translateDiscordTyping(ctx: BridgeContext, ev: DiscordTypingEvent): BridgeAction[] {
  if (isSelf(ctx, ev.userId)) return [];
  const ircChannel = ctx.channels.ircChannel(ev.channelId);
  if (!ircChannel) return [];
  return [{
    type: 'ircWrite',
    message: { tags: { '+typing': 'active' }, command: 'TAGMSG', params: [ircChannel] },
  }];
}
