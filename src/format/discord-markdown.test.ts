import { describe, expect, it } from 'vitest';
import { parseDiscordMarkdown, toRichNodes } from './discord-markdown.js';
import type { RichNode } from './rich-text.js';

function plainText(nodes: RichNode[]): string {
  return nodes.map((n) => ('children' in n ? plainText(n.children) : n.kind === 'text' ? n.content : '')).join('');
}

describe('toRichNodes', () => {
  it('maps style containers', () => {
    expect(toRichNodes([
      { type: 'strong', content: [{ type: 'text', content: 'b' }] },
      { type: 'em', content: [{ type: 'text', content: 'i' }] },
      { type: 'underline', content: [{ type: 'text', content: 'u' }] },
      { type: 'strikethrough', content: [{ type: 'text', content: 's' }] },
      { type: 'spoiler', content: [{ type: 'text', content: 'p' }] },
      { type: 'blockQuote', content: [{ type: 'text', content: 'q' }] },
    ])).toEqual([
      { kind: 'bold', children: [{ kind: 'text', content: 'b' }] },
      { kind: 'italic', children: [{ kind: 'text', content: 'i' }] },
      { kind: 'underline', children: [{ kind: 'text', content: 'u' }] },
      { kind: 'strikethrough', children: [{ kind: 'text', content: 's' }] },
      { kind: 'spoiler', children: [{ kind: 'text', content: 'p' }] },
      { kind: 'blockQuote', children: [{ kind: 'text', content: 'q' }] },
    ]);
  });

  it('maps leaves', () => {
    expect(toRichNodes([
      { type: 'inlineCode', content: 'x' },
      { type: 'codeBlock', lang: 'ts', content: 'y' },
      { type: 'url', target: 'https://example.com' },
      { type: 'emoji', name: 'wave', id: '300000000000000001' },
      { type: 'twemoji', name: '👍' },
      { type: 'channel', id: '100000000000000001' },
      { type: 'role', id: '400000000000000001' },
      { type: 'user', id: '200000000000000001' },
      { type: 'everyone' },
      { type: 'here' },
      { type: 'timestamp', timestamp: '1700000000', format: 'R' },
      { type: 'br' },
    ])).toEqual([
      { kind: 'code', language: '', content: 'x' },
      { kind: 'code', language: 'ts', content: 'y' },
      { kind: 'url', url: 'https://example.com' },
      { kind: 'emoji', name: 'wave' },
      { kind: 'text', content: '👍' },
      { kind: 'channelMention', id: '100000000000000001' },
      { kind: 'roleMention', id: '400000000000000001' },
      { kind: 'userMention', id: '200000000000000001' },
      { kind: 'specialMention', text: 'everyone' },
      { kind: 'specialMention', text: 'here' },
      { kind: 'timestamp', epoch: '1700000000', format: 'R' },
      { kind: 'lineBreak' },
    ]);
  });

  it('keeps the inline content of unknown node types', () => {
    expect(toRichNodes([{ type: 'heading', level: 1, content: [{ type: 'text', content: 'Title' }] }]))
      .toEqual([{ kind: 'text', content: 'Title' }]);
  });

  it('ignores values that are not nodes', () => {
    expect(toRichNodes([42, null, { content: 'no type' }])).toEqual([]);
  });

  it('does not treat prototype keys as containers', () => {
    expect(toRichNodes([{ type: 'constructor', content: 'x' }])).toEqual([{ kind: 'text', content: 'x' }]);
  });
});

describe('parseDiscordMarkdown', () => {
  it('parses bold text', () => {
    const nodes = parseDiscordMarkdown('**hi**');
    expect(nodes).toHaveLength(1);
    expect(nodes[0]?.kind).toBe('bold');
    expect(plainText(nodes)).toBe('hi');
  });

  it('parses user, role and channel mentions', () => {
    expect(parseDiscordMarkdown('<@200000000000000001>')).toEqual([{ kind: 'userMention', id: '200000000000000001' }]);
    expect(parseDiscordMarkdown('<@&400000000000000001>')).toEqual([{ kind: 'roleMention', id: '400000000000000001' }]);
    expect(parseDiscordMarkdown('<#100000000000000001>')).toEqual([{ kind: 'channelMention', id: '100000000000000001' }]);
  });

  it('parses a custom emoji', () => {
    expect(parseDiscordMarkdown('<:wave:300000000000000001>')).toEqual([{ kind: 'emoji', name: 'wave' }]);
  });

  it('leaves a mention with a short id as text', () => {
    const nodes = parseDiscordMarkdown('<@123>');
    expect(nodes.every((n) => n.kind === 'text')).toBe(true);
    expect(plainText(nodes)).toBe('<@123>');
  });
});
