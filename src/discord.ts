import { Client, Events, GatewayIntentBits, Partials } from 'discord.js';
import type { BridgeContext } from './bridge/actions.js';
import { createDiscordEventHandlers } from './discord/events.js';
import type { LoggerLike } from './logging/logger-like.js';

export function createDiscordClient(): Client {
  return new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.GuildMembers,
      GatewayIntentBits.GuildMessages,
      GatewayIntentBits.MessageContent,
      GatewayIntentBits.GuildMessageReactions,
      GatewayIntentBits.GuildMessageTyping,
      GatewayIntentBits.GuildEmojisAndStickers,
    ],
    // Deletions and reactions arrive for messages sent before we connected.
    partials: [Partials.Channel, Partials.Message, Partials.Reaction],
  });
}

/** Registers the relay listeners. Members are fetched per guild on ready so mentions resolve. */
export function wireDiscordBridge(client: Client, ctx: BridgeContext): void {
  const handlers = createDiscordEventHandlers(ctx);

  client.on(Events.ClientReady, async (ready) => {
    ctx.log.info({ user: ready.user.tag, guilds: ready.guilds.cache.size }, 'discord:ready');
    for (const guild of ready.guilds.cache.values()) {
      try {
        await guild.members.fetch();
      } catch (err) {
        ctx.log.warn({ err, guildId: guild.id }, 'discord:member fetch failed');
      }
    }
  });

  client.on(Events.MessageCreate, handlers.messageCreate);
  client.on(Events.MessageDelete, handlers.messageDelete);
  client.on(Events.MessageReactionAdd, handlers.messageReactionAdd);
  client.on(Events.TypingStart, handlers.typingStart);
  client.on(Events.Error, (err) => ctx.log.error({ err }, 'discord:client error'));
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

export type LoginTarget = Pick<Client, 'login'>;

/**
 * Retries the initial login with a fixed delay until it succeeds or `signal`
 * aborts. Once logged in, discord.js keeps the gateway connected itself.
 */
export async function loginWithRetry(
  client: LoginTarget,
  token: string,
  opts: { delayMs: number; signal: AbortSignal; log: LoggerLike },
): Promise<boolean> {
  while (!opts.signal.aborted) {
    try {
      await client.login(token);
      return true;
    } catch (err) {
      opts.log.warn({ err, retryInMs: opts.delayMs }, 'discord:login failed, retrying');
      await sleep(opts.delayMs, opts.signal);
    }
  }
  return false;
}
