import type { MessageCreateOptions } from 'discord.js';
import type { DiscordOutbound } from '../bridge/actions.js';
import { BRIDGE_ALLOWED_MENTIONS } from './allowed-mentions.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Structural view of a guild text channel; any discord.js text channel fits. */
export type SendableChannelLike = {
  send(opts: MessageCreateOptions): Promise<{ id: string }>;
  sendTyping(): Promise<unknown>;
  messages: { delete(messageId: string): Promise<unknown> };
};

/** The part of discord.js `Client` used to find a channel by id. */
export type ChannelResolverLike = {
  channels: {
    cache: { get(id: string): unknown };
    fetch(id: string): Promise<unknown>;
  };
};

function isSendableChannel(channel: unknown): channel is SendableChannelLike {
  return typeof channel === 'object'
    && channel !== null
    && 'send' in channel
    && typeof channel.send === 'function'
    && 'sendTyping' in channel
    && typeof channel.sendTyping === 'function'
    && 'messages' in channel
    && typeof channel.messages === 'object'
    && channel.messages !== null;
}

async function sendableChannel(client: ChannelResolverLike, channelId: string): Promise<SendableChannelLike> {
  const channel = client.channels.cache.get(channelId) ?? await client.channels.fetch(channelId);
  if (!isSendableChannel(channel)) {
    throw new Error(`Discord channel ${channelId} is not a text channel`);
  }
  return channel;
}

// ---------------------------------------------------------------------------
// Outbound
// ---------------------------------------------------------------------------

/** DiscordOutbound over a logged-in discord.js client. Empty content is not sent. */
export function createDiscordOutbound(client: ChannelResolverLike): DiscordOutbound {
  return {
    async send(channelId, content, replyToId) {
      if (!content.trim()) return null;
      const channel = await sendableChannel(client, channelId);
      const sent = await channel.send({
        content,
        allowedMentions: BRIDGE_ALLOWED_MENTIONS,
        ...(replyToId ? { reply: { messageReference: replyToId, failIfNotExists: false } } : {}),
      });
      return sent.id;
    },
    async delete(channelId, messageId) {
      const channel = await sendableChannel(client, channelId);
      await channel.messages.delete(messageId);
    },
    async typing(channelId) {
      const channel = await sendableChannel(client, channelId);
      await channel.sendTyping();
    },
  };
}
