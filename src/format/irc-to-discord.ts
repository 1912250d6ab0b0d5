import {
  IRC_BOLD,
  IRC_COLOR,
  IRC_HEX_COLOR,
  IRC_ITALIC,
  IRC_MONOSPACE,
  IRC_RESET,
  IRC_REVERSE,
  IRC_STRIKETHROUGH,
  IRC_UNDERLINE,
  ZERO_WIDTH_SPACE,
} from './control-codes.js';
import {
  PLAIN_STYLE,
  closingMarkers,
  openingMarkers,
  sameStyle,
  withAttribute,
} from './style-state.js';
import type { StyleState } from './style-state.js';

/**
 * Scanner mode. `raw` covers a backtick-delimited span whose bytes are copied
 * verbatim; URL spans are tracked separately through `urlEnd` because they
 * only affect escaping, never styling.
 */
type ScanMode = 'normal' | 'raw';

const URL_AT_CURSOR = /https?:\/\/[^\s<\x00-\x1f]+[^<.,:;"')\]\s\x00-\x1f]/y;
const HEX_COLOR_LENGTH = 6;

function isDigit(s: string, i: number): boolean {
  if (i >= s.length) return false;
  const c = s.charCodeAt(i);
  return c >= 0x30 && c <= 0x39;
}

/**
 * Returns the index of the last byte belonging to a `\x03` color code that
 * starts at `i`: up to two foreground digits, then optionally a comma and up
 * to two background digits. A comma not followed by a digit is left as text.
 */
export function skipColorCode(s: string, i: number): number {
  if (!isDigit(s, i + 1)) return i;
  let end = i + 1;
  if (isDigit(s, end + 1)) end++;
  if (s[end + 1] === ',' && isDigit(s, end + 2)) {
    end += 2;
    if (isDigit(s, end + 1)) end++;
  }
  return end;
}

/** Raw spans need a closing backtick later on, and "``" never opens one. */
function opensRawSpan(s: string, i: number): boolean {
  const close = s.indexOf('`', i + 1);
  return close > i + 1;
}

function matchUrlAt(s: string, i: number): number | null {
  URL_AT_CURSOR.lastIndex = i;
  const m = URL_AT_CURSOR.exec(s);
  return m ? i + m[0].length : null;
}

/**
 * Translate IRC control-code text into Discord markdown.
 *
 * Colors, monospace and reverse are dropped. Bold/italic/underline/strike
 * become markdown runs; whenever the active style changes, the previous run is
 * closed, a zero-width space is inserted so Discord does not merge adjacent
 * markers, and the new run is opened. Markdown meta-characters are escaped
 * except inside code spans and URLs.
 */
export function formatIrcForDiscord(text: string): string {
  // Trailing reset guarantees every run is closed even if the sender left one open.
  const input = text + IRC_RESET;
  const last = input.length - 1;

  let mode: ScanMode = 'normal';
  let prevStyle: StyleState = PLAIN_STYLE;
  let nextStyle: StyleState = PLAIN_STYLE;
  let urlEnd = 0;
  let out = '';

  for (let i = 0; i < input.length; i++) {
    const c = input.charAt(i);
    if (mode === 'raw' && c !== '`') {
      out += c;
      continue;
    }

    if (i >= urlEnd) {
      urlEnd = matchUrlAt(input, i) ?? urlEnd;
    }
    const inUrl = i < urlEnd;

    let write = '';
    switch (c) {
      case IRC_BOLD:
        nextStyle = withAttribute(nextStyle, 'bold');
        break;
      case IRC_ITALIC:
        nextStyle = withAttribute(nextStyle, 'italic');
        break;
      case IRC_UNDERLINE:
        nextStyle = withAttribute(nextStyle, 'underline');
        break;
      case IRC_STRIKETHROUGH:
        nextStyle = withAttribute(nextStyle, 'strikethrough');
        break;
      case IRC_RESET:
        nextStyle = PLAIN_STYLE;
        break;
      case IRC_MONOSPACE:
      case IRC_REVERSE:
        continue;
      case IRC_COLOR:
        i = skipColorCode(input, i);
        continue;
      case IRC_HEX_COLOR:
        // Never swallow the trailing reset.
        i = Math.min(i + HEX_COLOR_LENGTH, last - 1);
        continue;
      case '`':
        if (mode === 'raw') {
          mode = 'normal';
          write = c;
        } else if (opensRawSpan(input, i)) {
          mode = 'raw';
          write = c;
        } else {
          write = inUrl ? c : '\\' + c;
        }
        break;
      case '\\':
      case '*':
      case '_':
      case '~':
        write = inUrl ? c : '\\' + c;
        break;
      default:
        write = c;
    }

    if (write === '' && i < last) continue;
    if (sameStyle(prevStyle, nextStyle)) {
      out += write;
      continue;
    }

    out += closingMarkers(prevStyle);
    prevStyle = PLAIN_STYLE;
    if (write === '') continue;
    out += ZERO_WIDTH_SPACE + openingMarkers(nextStyle) + write;
    prevStyle = nextStyle;
  }

  return out;
}
