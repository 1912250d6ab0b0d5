// IRC inline formatting bytes. Style bytes toggle; reset clears everything.
export const IRC_BOLD = '\x02';
export const IRC_ITALIC = '\x1D';
export const IRC_UNDERLINE = '\x1F';
export const IRC_STRIKETHROUGH = '\x1E';
export const IRC_MONOSPACE = '\x11';
export const IRC_COLOR = '\x03';
export const IRC_HEX_COLOR = '\x04';
export const IRC_REVERSE = '\x16';
export const IRC_RESET = '\x0F';

/** Delimits CTCP requests such as ACTION. */
export const CTCP_DELIMITER = '\x01';

export const ZERO_WIDTH_SPACE = '\u200B';
