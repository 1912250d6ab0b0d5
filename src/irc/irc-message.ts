import IRC from 'irc-framework';

/** An inbound IRC line after parsing. Valueless tags carry ''. */
export type IrcMessage = {
  tags: Record<string, string>;
  nick: string;
  command: string;
  params: string[];
};

export type IrcOutboundMessage = {
  tags?: Record<string, string>;
  command: string;
  params: string[];
};

export function parseIrcLine(line: string): IrcMessage | null {
  const parsed = IRC.ircLineParser(line);
  if (!parsed || !parsed.command) return null;
  const tags: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed.tags ?? {})) {
    tags[key] = value === true ? '' : value;
  }
  return {
    tags,
    nick: parsed.nick ?? '',
    command: parsed.command.toUpperCase(),
    params: [...parsed.params],
  };
}

export function serializeIrcMessage(msg: IrcOutboundMessage): string {
  const out = new IRC.Message(msg.command, ...msg.params);
  if (msg.tags) out.tags = { ...msg.tags };
  return out.to1459();
}

/** Last parameter, the trailing text for PRIVMSG/PART/QUIT and friends. */
export function lastParam(msg: IrcMessage): string {
  return msg.params.length > 0 ? msg.params[msg.params.length - 1] ?? '' : '';
}
