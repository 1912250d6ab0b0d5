import type { MessageMentionOptions } from 'discord.js';

/**
 * Relayed text may ping users and roles resolved from IRC `@name`s, never
 * @everyone or @here.
 */
export const BRIDGE_ALLOWED_MENTIONS = {
  parse: ['users', 'roles'],
} satisfies MessageMentionOptions;
