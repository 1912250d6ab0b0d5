import { executeActions } from '../bridge/actions.js';
import type { BridgeAction, BridgeContext } from '../bridge/actions.js';
import {
  translateDiscordDelete,
  translateDiscordMessage,
  translateDiscordReaction,
  translateDiscordTyping,
} from '../bridge/discord-dispatch.js';
import type {
  DiscordDeleteEvent,
  DiscordMessageEvent,
  DiscordReactionEvent,
  DiscordTypingEvent,
} from '../bridge/discord-dispatch.js';

// ---------------------------------------------------------------------------
// Structural views of the discord.js objects each event delivers
// ---------------------------------------------------------------------------

export type MessageLike = {
  id: string;
  channelId: string;
  guildId: string | null;
  content: string;
  author: { id: string; username: string; accentColor?: number | null };
  member: { nickname: string | null; displayColor: number } | null;
  attachments: { values(): Iterable<{ url: string }> };
  reference: { messageId?: string } | null;
};

export type PartialMessageLike = {
  id: string;
  channelId: string;
  author: { id: string } | null;
};

export type ReactionLike = {
  emoji: { name: string | null };
  message: { id: string; channelId: string };
};

export type TypingLike = {
  channel: { id: string };
  user: { id: string };
};

export function toMessageEvent(message: MessageLike): DiscordMessageEvent {
  return {
    id: message.id,
    channelId: message.channelId,
    guildId: message.guildId,
    authorId: message.author.id,
    username: message.author.username,
    nickname: message.member?.nickname ?? null,
    memberColor: message.member?.displayColor ?? 0,
    accentColor: message.author.accentColor ?? null,
    content: message.content,
    attachmentUrls: Array.from(message.attachments.values(), (a) => a.url),
    referencedMessageId: message.reference?.messageId ?? null,
  };
}

export function toDeleteEvent(message: PartialMessageLike): DiscordDeleteEvent {
  return { id: message.id, channelId: message.channelId, authorId: message.author?.id ?? null };
}

export function toReactionEvent(reaction: ReactionLike, user: { id: string }): DiscordReactionEvent {
  return {
    messageId: reaction.message.id,
    channelId: reaction.message.channelId,
    userId: user.id,
    emojiName: reaction.emoji.name,
  };
}

export function toTypingEvent(typing: TypingLike): DiscordTypingEvent {
  return { channelId: typing.channel.id, userId: typing.user.id };
}

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

/**
 * Listener functions for the relayed Discord events. Each one translates,
 * executes, and logs failures; none rejects.
 */
export function createDiscordEventHandlers(ctx: BridgeContext) {
  const relay = async (event: string, translate: () => BridgeAction[]): Promise<void> => {
    try {
      await executeActions(ctx, translate());
    } catch (err) {
      ctx.log.error({ err, event }, 'discord:handler failed');
    }
  };

  return {
    messageCreate: (message: MessageLike) =>
      relay('messageCreate', () => translateDiscordMessage(ctx, toMessageEvent(message))),
    messageDelete: (message: PartialMessageLike) =>
      relay('messageDelete', () => translateDiscordDelete(ctx, toDeleteEvent(message))),
    messageReactionAdd: (reaction: ReactionLike, user: { id: string }) =>
      relay('messageReactionAdd', () => translateDiscordReaction(ctx, toReactionEvent(reaction, user))),
    typingStart: (typing: TypingLike) =>
      relay('typingStart', () => translateDiscordTyping(ctx, toTypingEvent(typing))),
  };
}
