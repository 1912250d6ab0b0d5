import { describe, expect, it } from 'vitest';
import type { GuildRoster } from '../roster/roster.js';
import { formatIrcForDiscord } from './irc-to-discord.js';
import { resolveDiscordReferences, resolveEmoji, resolveMention, splitCodeSpans } from './mentions.js';

const guild: GuildRoster = {
  id: 'g1',
  members: () => [
    { id: '200000000000000001', username: 'alice', discriminator: '0', nickname: null, displayName: 'alice' },
    { id: '200000000000000002', username: 'bob', discriminator: '0', nickname: 'Ally', displayName: 'Ally' },
    { id: '200000000000000003', username: 'foo_bar', discriminator: '0', nickname: null, displayName: 'foo_bar' },
    { id: '200000000000000004', username: 'carol', discriminator: '1234', nickname: null, displayName: 'carol' },
    { id: '200000000000000005', username: 'ally', discriminator: '0', nickname: null, displayName: 'ally' },
  ],
  roles: () => [
    { id: '400000000000000001', name: 'Mods', mentionable: true },
    { id: '400000000000000002', name: 'admins', mentionable: false },
  ],
  emojis: () => [
    { id: '300000000000000001', name: 'wave', animated: false, available: true },
    { id: '300000000000000002', name: 'party', animated: true, available: true },
    { id: '300000000000000003', name: 'gone', animated: false, available: false },
  ],
};

describe('resolveMention', () => {
  it('prefers nicknames over usernames', () => {
    expect(resolveMention('ally', undefined, guild)).toBe('<@200000000000000002>');
  });

  it('falls back to usernames, then mentionable roles', () => {
    expect(resolveMention('ALICE', undefined, guild)).toBe('<@200000000000000001>');
    expect(resolveMention('mods', undefined, guild)).toBe('<@&400000000000000001>');
    expect(resolveMention('admins', undefined, guild)).toBeNull();
  });

  it('requires an exact username and discriminator when one is given', () => {
    expect(resolveMention('carol', '1234', guild)).toBe('<@200000000000000004>');
    expect(resolveMention('carol', '9999', guild)).toBeNull();
  });
});

describe('resolveEmoji', () => {
  it('formats static and animated emoji', () => {
    expect(resolveEmoji('wave', guild)).toBe('<:wave:300000000000000001>');
    expect(resolveEmoji('Party', guild)).toBe('<a:party:300000000000000002>');
  });

  it('never matches unavailable emoji', () => {
    expect(resolveEmoji('gone', guild)).toBeNull();
  });
});

describe('splitCodeSpans', () => {
  it('separates code spans from prose', () => {
    expect(splitCodeSpans('a `b` c')).toEqual([
      { code: false, text: 'a ' },
      { code: true, text: '`b`' },
      { code: false, text: ' c' },
    ]);
  });

  it('skips escaped backticks', () => {
    expect(splitCodeSpans('a \\` b')).toEqual([{ code: false, text: 'a \\` b' }]);
  });
});

describe('resolveDiscordReferences', () => {
  it('resolves mentions and emoji outside code spans', () => {
    expect(resolveDiscordReferences('hi @alice :wave: `@alice :wave:`', guild))
      .toBe('hi <@200000000000000001> <:wave:300000000000000001> `@alice :wave:`');
  });

  it('only treats @ at a word start as a mention', () => {
    expect(resolveDiscordReferences('mail@alice', guild)).toBe('mail@alice');
  });

  it('resolves a mention that opens a styled run', () => {
    const styled = formatIrcForDiscord('\x02@bob');
    expect(styled).toBe('\u200B**@bob**');
    expect(resolveDiscordReferences(styled, guild)).toBe('\u200B**<@200000000000000002>**');
  });

  it('leaves unknown names untouched', () => {
    expect(resolveDiscordReferences('@nobody :nope: @carol#9999', guild)).toBe('@nobody :nope: @carol#9999');
  });

  it('matches names escaped by the IRC formatter', () => {
    expect(resolveDiscordReferences(formatIrcForDiscord('@foo_bar hi'), guild)).toBe('<@200000000000000003> hi');
  });
});
