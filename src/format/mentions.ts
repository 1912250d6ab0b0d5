import type { GuildRoster } from '../roster/roster.js';

// `@name` or `@name#1234` at the start of a segment, after whitespace, or
// right after the style markers and zero-width space formatIrcForDiscord
// emits. The name may carry backslash escapes it added (`foo\_bar`).
const MENTION = /(^|[\s\u200B*_~])@((?:\\[\\*_~`]|[^\s\u200B#*_~`\\])+)(?:#(\d+))?/g;
const EMOJI = /:((?:\w|\\_)+):/g;

function unescapeMarkdown(s: string): string {
  return s.replace(/\\(.)/g, '$1');
}

/**
 * Resolve a name typed on IRC to a Discord mention.
 * With a discriminator only the exact username#discriminator matches;
 * otherwise nickname, then username, then mentionable role name.
 */
export function resolveMention(name: string, discriminator: string | undefined, guild: GuildRoster): string | null {
  const wanted = name.toLowerCase();
  if (discriminator !== undefined) {
    for (const m of guild.members()) {
      if (m.username.toLowerCase() === wanted && m.discriminator === discriminator) return `<@${m.id}>`;
    }
    return null;
  }
  for (const m of guild.members()) {
    if (m.nickname && m.nickname.toLowerCase() === wanted) return `<@${m.id}>`;
  }
  for (const m of guild.members()) {
    if (m.username.toLowerCase() === wanted) return `<@${m.id}>`;
  }
  for (const r of guild.roles()) {
    if (r.mentionable && r.name.toLowerCase() === wanted) return `<@&${r.id}>`;
  }
  return null;
}

/** Only emoji the bot can currently use are matched. */
export function resolveEmoji(name: string, guild: GuildRoster): string | null {
  const wanted = name.toLowerCase();
  for (const e of guild.emojis()) {
    if (e.available && e.name.toLowerCase() === wanted) {
      return `<${e.animated ? 'a' : ''}:${e.name}:${e.id}>`;
    }
  }
  return null;
}

function resolveSegment(segment: string, guild: GuildRoster): string {
  const withMentions = segment.replace(MENTION, (original, lead: string, name: string, discriminator: string | undefined) => {
    const mention = resolveMention(unescapeMarkdown(name), discriminator, guild);
    return mention ? lead + mention : original;
  });
  return withMentions.replace(EMOJI, (original, name: string) => resolveEmoji(unescapeMarkdown(name), guild) ?? original);
}

/**
 * Split Discord-formatted text into prose and code spans. Code spans are the
 * unescaped backtick pairs left by formatIrcForDiscord; their content is
 * returned untouched.
 */
export function splitCodeSpans(text: string): Array<{ code: boolean; text: string }> {
  const segments: Array<{ code: boolean; text: string }> = [];
  let start = 0;
  let i = 0;
  while (i < text.length) {
    const c = text[i];
    if (c === '\\') {
      i += 2;
      continue;
    }
    if (c === '`') {
      const close = text.indexOf('`', i + 1);
      if (close > i) {
        if (i > start) segments.push({ code: false, text: text.slice(start, i) });
        segments.push({ code: true, text: text.slice(i, close + 1) });
        start = close + 1;
        i = close + 1;
        continue;
      }
    }
    i++;
  }
  if (start < text.length) segments.push({ code: false, text: text.slice(start) });
  return segments;
}

/** Turn `@name` and `:emoji:` typed on IRC into Discord references, outside code spans. */
export function resolveDiscordReferences(text: string, guild: GuildRoster): string {
  return splitCodeSpans(text)
    .map((segment) => (segment.code ? segment.text : resolveSegment(segment.text, guild)))
    .join('');
}
