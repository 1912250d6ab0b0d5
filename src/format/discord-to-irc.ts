import {
  IRC_BOLD,
  IRC_ITALIC,
  IRC_MONOSPACE,
  IRC_REVERSE,
  IRC_STRIKETHROUGH,
  IRC_UNDERLINE,
} from './control-codes.js';
import { walkRichText } from './rich-text.js';
import type { RichNode } from './rich-text.js';
import { formatDiscordTimestamp } from './timestamp.js';
import type { RosterSource } from '../roster/roster.js';

export const INVALID_CHANNEL = '#invalid-channel';
export const INVALID_ROLE = '@invalid-role';
export const INVALID_USER = '@invalid-user';

export type IrcRenderContext = {
  roster: RosterSource;
  /** Guild the message was posted in; null for DMs, where role/user lookups always miss. */
  guildId: string | null;
  now: Date;
  timeZone?: string;
};

function channelMention(ctx: IrcRenderContext, id: string): string {
  const name = ctx.roster.channelName(id);
  return name !== undefined ? `#${name}` : INVALID_CHANNEL;
}

function roleMention(ctx: IrcRenderContext, id: string): string {
  const role = ctx.guildId ? ctx.roster.role(ctx.guildId, id) : undefined;
  return role ? `@${role.name}` : INVALID_ROLE;
}

function userMention(ctx: IrcRenderContext, id: string): string {
  const member = ctx.guildId ? ctx.roster.member(ctx.guildId, id) : undefined;
  if (!member) return INVALID_USER;
  return `@${member.nickname || member.displayName || member.username}`;
}

/**
 * Render a Discord rich-text tree as IRC control-code text.
 * Lookups that miss degrade to fixed placeholders; this never throws.
 */
export function renderRichTextForIrc(nodes: readonly RichNode[], ctx: IrcRenderContext): string {
  let out = '';
  walkRichText(nodes, (node, entering) => {
    switch (node.kind) {
      case 'text':
        out += node.content;
        break;
      case 'lineBreak':
        out += '\n';
        break;
      case 'blockQuote':
        out += entering ? '“' : '”';
        break;
      case 'code':
        out += IRC_MONOSPACE + '`';
        if (node.language) out += `${node.language} `;
        out += node.content + '`' + IRC_MONOSPACE;
        break;
      case 'spoiler':
        out += entering ? `${IRC_REVERSE}||` : `||${IRC_REVERSE}`;
        break;
      case 'url':
        out += node.url;
        break;
      case 'emoji':
        out += `:${node.name}:`;
        break;
      case 'channelMention':
        out += channelMention(ctx, node.id);
        break;
      case 'roleMention':
        out += roleMention(ctx, node.id);
        break;
      case 'userMention':
        out += userMention(ctx, node.id);
        break;
      case 'specialMention':
        out += `@${node.text}`;
        break;
      case 'timestamp':
        out += formatDiscordTimestamp(node.epoch, node.format, ctx.now, ctx.timeZone);
        break;
      // IRC styles are toggles: the same byte opens and closes a run.
      case 'bold':
        out += IRC_BOLD;
        break;
      case 'italic':
        out += IRC_ITALIC;
        break;
      case 'underline':
        out += IRC_UNDERLINE;
        break;
      case 'strikethrough':
        out += IRC_STRIKETHROUGH;
        break;
      default: {
        const unreachable: never = node;
        throw new Error(`unhandled rich-text node: ${JSON.stringify(unreachable)}`);
      }
    }
  });
  return out;
}
