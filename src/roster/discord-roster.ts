import type { Client, Guild, GuildEmoji, GuildMember, Role } from 'discord.js';
import type { GuildRoster, RosterEmoji, RosterMember, RosterRole, RosterSource } from './roster.js';

function toMember(member: GuildMember): RosterMember {
  return {
    id: member.id,
    username: member.user.username,
    discriminator: member.user.discriminator,
    nickname: member.nickname,
    displayName: member.displayName,
  };
}

function toRole(role: Role): RosterRole {
  return { id: role.id, name: role.name, mentionable: role.mentionable };
}

function toEmoji(emoji: GuildEmoji): RosterEmoji {
  return {
    id: emoji.id,
    name: emoji.name ?? '',
    animated: emoji.animated === true,
    available: emoji.available === true,
  };
}

function* mapValues<T, U>(values: Iterable<T>, fn: (value: T) => U): Iterable<U> {
  for (const value of values) yield fn(value);
}

function guildRoster(guild: Guild): GuildRoster {
  return {
    id: guild.id,
    members: () => mapValues(guild.members.cache.values(), toMember),
    roles: () => mapValues(guild.roles.cache.values(), toRole),
    emojis: () => mapValues(guild.emojis.cache.values(), toEmoji),
  };
}

/** Roster backed by the discord.js caches of a logged-in client. */
export function createDiscordRoster(client: Client): RosterSource {
  return {
    guildForChannel(channelId) {
      const channel = client.channels.cache.get(channelId);
      if (!channel || channel.isDMBased()) return undefined;
      return guildRoster(channel.guild);
    },
    channelName(channelId) {
      const channel = client.channels.cache.get(channelId);
      if (!channel || channel.isDMBased()) return undefined;
      return channel.name;
    },
    role(guildId, roleId) {
      const role = client.guilds.cache.get(guildId)?.roles.cache.get(roleId);
      return role ? toRole(role) : undefined;
    },
    member(guildId, userId) {
      const member = client.guilds.cache.get(guildId)?.members.cache.get(userId);
      return member ? toMember(member) : undefined;
    },
  };
}
