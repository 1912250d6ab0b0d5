/**
 * Read-only view of the Discord state cache used for name resolution.
 * Implementations must not fetch: every lookup answers from what is cached now.
 */
export type RosterMember = {
  id: string;
  username: string;
  /** Legacy 4-digit tag; "0" for migrated accounts. */
  discriminator: string;
  nickname: string | null;
  displayName: string;
};

export type RosterRole = {
  id: string;
  name: string;
  mentionable: boolean;
};

export type RosterEmoji = {
  id: string;
  name: string;
  animated: boolean;
  available: boolean;
};

export interface GuildRoster {
  readonly id: string;
  members(): Iterable<RosterMember>;
  roles(): Iterable<RosterRole>;
  emojis(): Iterable<RosterEmoji>;
}

export interface RosterSource {
  /** Guild owning a channel, or undefined for DMs and unknown channels. */
  guildForChannel(channelId: string): GuildRoster | undefined;
  channelName(channelId: string): string | undefined;
  role(guildId: string, roleId: string): RosterRole | undefined;
  member(guildId: string, userId: string): RosterMember | undefined;
}

export type StaticGuild = {
  id: string;
  channels?: Record<string, string>;
  members?: RosterMember[];
  roles?: RosterRole[];
  emojis?: RosterEmoji[];
};

/** In-memory roster over fixed data. */
export function createStaticRoster(guilds: StaticGuild[]): RosterSource {
  const toGuildRoster = (g: StaticGuild): GuildRoster => ({
    id: g.id,
    members: () => g.members ?? [],
    roles: () => g.roles ?? [],
    emojis: () => g.emojis ?? [],
  });
  const byId = (id: string) => guilds.find((g) => g.id === id);

  return {
    guildForChannel(channelId) {
      const g = guilds.find((candidate) => candidate.channels?.[channelId] !== undefined);
      return g ? toGuildRoster(g) : undefined;
    },
    channelName(channelId) {
      for (const g of guilds) {
        const name = g.channels?.[channelId];
        if (name !== undefined) return name;
      }
      return undefined;
    },
    role(guildId, roleId) {
      return byId(guildId)?.roles?.find((r) => r.id === roleId);
    },
    member(guildId, userId) {
      return byId(guildId)?.members?.find((m) => m.id === userId);
    },
  };
}
