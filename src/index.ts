import 'dotenv/config';
import pino from 'pino';

import { parseConfig } from './config.js';
import type { BridgeContext } from './bridge/actions.js';
import { loadChannelMap } from './bridge/channel-map.js';
import { CorrelationStore } from './bridge/correlation-store.js';
import { createIrcMessageHandler } from './bridge/irc-dispatch.js';
import { IrcReadinessGate } from './bridge/readiness.js';
import { createDiscordClient, loginWithRetry, wireDiscordBridge } from './discord.js';
import { createDiscordOutbound } from './discord/outbound.js';
import { connectIrc, runIrcLoop } from './irc/irc-connection.js';
import { IrcLink } from './irc/irc-link.js';
import { createDiscordRoster } from './roster/discord-roster.js';

const log = pino({ level: process.env.LOG_LEVEL ?? 'info' });

let parsedConfig;
try {
  parsedConfig = parseConfig(process.env);
} catch (err) {
  log.error({ err }, 'Invalid configuration');
  process.exit(1);
}
for (const warning of parsedConfig.warnings) {
  log.warn(warning);
}
for (const info of parsedConfig.infos) {
  log.info(info);
}
const cfg = parsedConfig.config;

const channels = await loadChannelMap(cfg.channelPairs, cfg.channelsFile).catch((err: unknown) => {
  log.error({ err, channelsFile: cfg.channelsFile }, 'Invalid channel mapping');
  return process.exit(1);
});
log.info({ channels: channels.size }, 'bridge:channels loaded');

const client = createDiscordClient();
const ircLink = new IrcLink(log);

const ctx: BridgeContext = {
  channels,
  correlations: new CorrelationStore(cfg.correlationMax),
  irc: ircLink,
  discord: createDiscordOutbound(client),
  roster: createDiscordRoster(client),
  log,
  discordUserId: () => client.user?.id ?? null,
};

const gate = new IrcReadinessGate(ircLink, () => channels.ircChannels(), log);
const onIrcMessage = createIrcMessageHandler(ctx, gate);
const stop = new AbortController();

wireDiscordBridge(client, ctx);

const ircLoop = runIrcLoop({
  connect: () => connectIrc(
    {
      host: cfg.ircHost,
      port: cfg.ircPort,
      tls: cfg.ircTls,
      nick: cfg.ircNick,
      username: cfg.ircUsername,
      realname: cfg.ircRealname,
      debug: cfg.ircDebug,
    },
    {
      onConnected: () => gate.connected(),
      onMessage: onIrcMessage,
    },
    log,
  ),
  onDisconnected: (writer) => gate.disconnected(writer),
  reconnectDelayMs: cfg.reconnectDelayMs,
  signal: stop.signal,
  log,
}).catch((err: unknown) => log.error({ err }, 'irc:loop stopped'));

let shuttingDown = false;
const shutdown = async () => {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info('shutdown:requested');
  stop.abort();
  await ircLoop;
  await client.destroy().catch((err) => log.warn({ err }, 'shutdown:discord destroy error'));
  process.exit(0);
};
process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);

await loginWithRetry(client, cfg.token, { delayMs: cfg.reconnectDelayMs, signal: stop.signal, log });
