import { parseChannelPairs } from './bridge/channel-map.js';
import type { ChannelPair } from './bridge/channel-map.js';

export const DEFAULT_IRC_USERNAME = 'ircordbridge';
export const DEFAULT_IRC_REALNAME = 'IRC/Discord bridge';
export const DEFAULT_RECONNECT_DELAY_MS = 15_000;
export const DEFAULT_CORRELATION_MAX = 10_000;

type ParseResult = {
  config: BridgeConfig;
  warnings: string[];
  infos: string[];
};

export type BridgeConfig = {
  token: string;

  ircHost: string;
  ircPort: number;
  ircTls: boolean;
  ircNick: string;
  ircUsername: string;
  ircRealname: string;
  ircDebug: boolean;

  /** Pairs from BRIDGE_CHANNELS; the file's pairs are merged in at startup. */
  channelPairs: ChannelPair[];
  channelsFile?: string;

  reconnectDelayMs: number;
  correlationMax: number;
};

function parseBoolean(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: boolean,
): boolean {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const normalized = raw.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true') return true;
  if (normalized === '0' || normalized === 'false') return false;
  throw new Error(`${name} must be "0"/"1" or "true"/"false", got "${raw}"`);
}

function parseNonNegativeInt(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: number,
): number {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return n;
}

function parsePositiveInt(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: number,
): number {
  const n = parseNonNegativeInt(env, name, defaultValue);
  if (n === 0) {
    throw new Error(`${name} must be a positive integer, got "${env[name]}"`);
  }
  return n;
}

function parseTrimmedString(
  env: NodeJS.ProcessEnv,
  name: string,
): string | undefined {
  const raw = env[name];
  if (raw == null) return undefined;
  const trimmed = raw.trim();
  return trimmed || undefined;
}

function parseServer(env: NodeJS.ProcessEnv, name: string): { host: string; port: number } {
  const raw = parseTrimmedString(env, name);
  if (!raw) throw new Error(`Missing ${name}`);
  const match = /^(?:\[([^\]]+)\]|([^:\s]+)):(\d+)$/.exec(raw);
  const host = match?.[1] ?? match?.[2];
  const port = Number(match?.[3]);
  if (!host || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`${name} must be "host:port", got "${raw}"`);
  }
  return { host, port };
}

export function parseConfig(env: NodeJS.ProcessEnv): ParseResult {
  const warnings: string[] = [];
  const infos: string[] = [];

  const token = parseTrimmedString(env, 'DISCORD_TOKEN');
  if (!token) {
    throw new Error('Missing DISCORD_TOKEN');
  }

  const { host: ircHost, port: ircPort } = parseServer(env, 'IRC_SERVER');
  const ircTls = parseBoolean(env, 'IRC_TLS', true);
  if (!ircTls) {
    warnings.push('IRC_TLS is disabled: the IRC connection is unencrypted');
  }

  const ircNick = parseTrimmedString(env, 'IRC_NICK');
  if (!ircNick) {
    throw new Error('Missing IRC_NICK');
  }
  if (/[\s,:!@]/.test(ircNick)) {
    throw new Error(`IRC_NICK contains characters not allowed in a nickname, got "${ircNick}"`);
  }

  let channelPairs: ChannelPair[];
  try {
    channelPairs = parseChannelPairs(env.BRIDGE_CHANNELS);
  } catch (err) {
    throw new Error(`BRIDGE_CHANNELS: ${err instanceof Error ? err.message : String(err)}`);
  }
  const channelsFile = parseTrimmedString(env, 'BRIDGE_CHANNELS_FILE');
  if (channelPairs.length === 0 && !channelsFile) {
    throw new Error('No channels to bridge: set BRIDGE_CHANNELS or BRIDGE_CHANNELS_FILE');
  }

  const correlationMax = parseNonNegativeInt(env, 'BRIDGE_CORRELATION_MAX', DEFAULT_CORRELATION_MAX);
  if (correlationMax === 0) {
    infos.push('BRIDGE_CORRELATION_MAX=0: message correlations are kept for the life of the process');
  }

  return {
    config: {
      token,
      ircHost,
      ircPort,
      ircTls,
      ircNick,
      ircUsername: parseTrimmedString(env, 'IRC_USERNAME') ?? DEFAULT_IRC_USERNAME,
      ircRealname: parseTrimmedString(env, 'IRC_REALNAME') ?? DEFAULT_IRC_REALNAME,
      ircDebug: parseBoolean(env, 'IRC_DEBUG', false),
      channelPairs,
      channelsFile,
      reconnectDelayMs: parsePositiveInt(env, 'BRIDGE_RECONNECT_DELAY_MS', DEFAULT_RECONNECT_DELAY_MS),
      correlationMax,
    },
    warnings,
    infos,
  };
}
