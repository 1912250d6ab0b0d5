import fs from 'node:fs/promises';

export type ChannelPair = {
  discordChannelId: string;
  ircChannel: string;
};

function foldIrcChannel(name: string): string {
  return name.toLowerCase();
}

/** Immutable 1:1 mapping between Discord channel ids and IRC channel names. */
export class ChannelMap {
  private readonly ircByDiscord: ReadonlyMap<string, string>;
  private readonly discordByIrc: ReadonlyMap<string, string>;

  constructor(pairs: Iterable<ChannelPair>) {
    const ircByDiscord = new Map<string, string>();
    const discordByIrc = new Map<string, string>();
    for (const { discordChannelId, ircChannel } of pairs) {
      if (ircByDiscord.has(discordChannelId)) {
        throw new Error(`Discord channel ${discordChannelId} is mapped more than once`);
      }
      const folded = foldIrcChannel(ircChannel);
      if (discordByIrc.has(folded)) {
        throw new Error(`IRC channel ${ircChannel} is mapped more than once`);
      }
      ircByDiscord.set(discordChannelId, ircChannel);
      discordByIrc.set(folded, discordChannelId);
    }
    this.ircByDiscord = ircByDiscord;
    this.discordByIrc = discordByIrc;
  }

  ircChannel(discordChannelId: string): string | undefined {
    return this.ircByDiscord.get(discordChannelId);
  }

  discordChannel(ircChannel: string): string | undefined {
    return this.discordByIrc.get(foldIrcChannel(ircChannel));
  }

  discordChannelIds(): string[] {
    return [...this.ircByDiscord.keys()];
  }

  ircChannels(): string[] {
    return [...this.ircByDiscord.values()];
  }

  get size(): number {
    return this.ircByDiscord.size;
  }
}

/** Parses `discordId=#channel` pairs separated by commas or whitespace. */
export function parseChannelPairs(raw: string | undefined): ChannelPair[] {
  const pairs: ChannelPair[] = [];
  for (const part of String(raw ?? '').split(/[,\s]+/g)) {
    const entry = part.trim();
    if (!entry) continue;
    const eq = entry.indexOf('=');
    const discordChannelId = entry.slice(0, eq).trim();
    const ircChannel = entry.slice(eq + 1).trim();
    if (eq <= 0 || !/^\d+$/.test(discordChannelId) || !isIrcChannelName(ircChannel)) {
      throw new Error(`Invalid channel mapping "${entry}" (expected <discordChannelId>=#channel)`);
    }
    pairs.push({ discordChannelId, ircChannel });
  }
  return pairs;
}

export function isIrcChannelName(name: string): boolean {
  return /^[#&+!][^\s,\x07]+$/.test(name);
}

/** Reads a JSON object of `{ "<discordChannelId>": "#channel" }`. */
export async function loadChannelPairsFile(filePath: string): Promise<ChannelPair[]> {
  const raw = await fs.readFile(filePath, 'utf8');
  const parsed: unknown = JSON.parse(raw);
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`${filePath}: channel mapping must be a JSON object`);
  }
  const pairs: ChannelPair[] = [];
  for (const [discordChannelId, ircChannel] of Object.entries(parsed)) {
    if (!/^\d+$/.test(discordChannelId) || typeof ircChannel !== 'string' || !isIrcChannelName(ircChannel)) {
      throw new Error(`${filePath}: invalid mapping ${JSON.stringify(discordChannelId)} -> ${JSON.stringify(ircChannel)}`);
    }
    pairs.push({ discordChannelId, ircChannel });
  }
  return pairs;
}

/** Env pairs plus the file's pairs, if any. Duplicates across both are errors. */
export async function loadChannelMap(pairs: ChannelPair[], filePath?: string): Promise<ChannelMap> {
  const all = filePath ? [...pairs, ...await loadChannelPairsFile(filePath)] : pairs;
  if (all.length === 0) {
    throw new Error('No channels to bridge');
  }
  return new ChannelMap(all);
}
