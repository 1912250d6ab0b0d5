import { parse } from 'discord-markdown-parser';
import type { RichContainerKind, RichNode } from './rich-text.js';

/** Loose shape of a node produced by discord-markdown-parser (simple-markdown underneath). */
type AstNodeLike = { type: string; [key: string]: unknown };

function isAstNode(value: unknown): value is AstNodeLike {
  return typeof value === 'object'
    && value !== null
    && 'type' in value
    && typeof value.type === 'string';
}

function stringProp(node: AstNodeLike, key: string): string | undefined {
  const value = node[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

const CONTAINERS: ReadonlyMap<string, RichContainerKind> = new Map<string, RichContainerKind>([
  ['strong', 'bold'],
  ['em', 'italic'],
  ['underline', 'underline'],
  ['strikethrough', 'strikethrough'],
  ['del', 'strikethrough'],
  ['blockQuote', 'blockQuote'],
  ['spoiler', 'spoiler'],
]);

function childrenOf(node: AstNodeLike): RichNode[] {
  const content = node.content;
  if (typeof content === 'string') return [{ kind: 'text', content }];
  return toRichNodes(content);
}

function toRichNode(node: AstNodeLike): RichNode[] {
  const containerKind = CONTAINERS.get(node.type);
  if (containerKind) {
    return [{ kind: containerKind, children: childrenOf(node) }];
  }

  switch (node.type) {
    case 'text':
      return [{ kind: 'text', content: stringProp(node, 'content') ?? '' }];
    case 'inlineCode':
      return [{ kind: 'code', language: '', content: stringProp(node, 'content') ?? '' }];
    case 'codeBlock':
      return [{ kind: 'code', language: stringProp(node, 'lang') ?? '', content: stringProp(node, 'content') ?? '' }];
    case 'url':
    case 'autolink':
    case 'link': {
      const target = stringProp(node, 'target');
      return target ? [{ kind: 'url', url: target }] : childrenOf(node);
    }
    case 'emoji':
      return [{ kind: 'emoji', name: stringProp(node, 'name') ?? '' }];
    case 'twemoji':
      // Unicode emoji are plain text on IRC.
      return [{ kind: 'text', content: stringProp(node, 'name') ?? '' }];
    case 'channel':
      return [{ kind: 'channelMention', id: stringProp(node, 'id') ?? '' }];
    case 'role':
      return [{ kind: 'roleMention', id: stringProp(node, 'id') ?? '' }];
    case 'user':
      return [{ kind: 'userMention', id: stringProp(node, 'id') ?? '' }];
    case 'everyone':
      return [{ kind: 'specialMention', text: 'everyone' }];
    case 'here':
      return [{ kind: 'specialMention', text: 'here' }];
    case 'timestamp':
      return [{ kind: 'timestamp', epoch: stringProp(node, 'timestamp') ?? '', format: stringProp(node, 'format') }];
    case 'br':
    case 'newline':
      return [{ kind: 'lineBreak' }];
    default:
      // Headings, subtext, lists and anything newer: keep the inline content.
      return childrenOf(node);
  }
}

export function toRichNodes(ast: unknown): RichNode[] {
  if (typeof ast === 'string') return [{ kind: 'text', content: ast }];
  if (isAstNode(ast)) return toRichNode(ast);
  if (!Array.isArray(ast)) return [];
  const out: RichNode[] = [];
  for (const item of ast) {
    out.push(...toRichNodes(item));
  }
  return out;
}

/** Parse Discord message content into the bridge's closed rich-text tree. */
export function parseDiscordMarkdown(content: string): RichNode[] {
  const ast: unknown = parse(content, 'normal');
  return toRichNodes(ast);
}
