import { IRC_COLOR, IRC_HEX_COLOR, ZERO_WIDTH_SPACE } from '../format/control-codes.js';

/** mIRC colors readable on both light and dark backgrounds. */
export const NICK_PALETTE = [2, 3, 4, 6, 7, 8, 9, 10, 11, 12, 13] as const;

const FNV32_OFFSET = 0x811c9dc5;
const FNV32_PRIME = 0x01000193;

/** FNV-1 (multiply, then xor) over the UTF-8 bytes of `s`. */
export function fnv1Hash32(s: string): number {
  let hash = FNV32_OFFSET;
  for (const byte of Buffer.from(s, 'utf8')) {
    hash = Math.imul(hash, FNV32_PRIME) >>> 0;
    hash = (hash ^ byte) >>> 0;
  }
  return hash;
}

/** `\x04RRGGBB` for a role/accent color, or `\x03NN` picked from the palette by username. */
export function ircNickColor(username: string, rgb: number | null | undefined): string {
  if (rgb) {
    return IRC_HEX_COLOR + rgb.toString(16).toUpperCase().padStart(6, '0');
  }
  const index = fnv1Hash32(username) % NICK_PALETTE.length;
  return IRC_COLOR + String(NICK_PALETTE[index]).padStart(2, '0');
}

/** Inserts a zero-width space after the first character so relayed names do not highlight IRC users. */
export function breakHighlight(nick: string): string {
  const chars = Array.from(nick);
  if (chars.length <= 1) return nick;
  return chars[0] + ZERO_WIDTH_SPACE + chars.slice(1).join('');
}
