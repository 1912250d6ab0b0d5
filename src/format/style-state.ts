export type StyleAttribute = 'bold' | 'italic' | 'underline' | 'strikethrough';

export type StyleState = Readonly<Record<StyleAttribute, boolean>>;

export const PLAIN_STYLE: StyleState = {
  bold: false,
  italic: false,
  underline: false,
  strikethrough: false,
};

const MARKERS: Record<StyleAttribute, string> = {
  italic: '*',
  bold: '**',
  underline: '__',
  strikethrough: '~~',
};

// Closing runs innermost-first; opening is the exact reverse so runs nest.
const CLOSE_ORDER: readonly StyleAttribute[] = ['italic', 'bold', 'underline', 'strikethrough'];
const OPEN_ORDER: readonly StyleAttribute[] = ['strikethrough', 'underline', 'bold', 'italic'];

export function sameStyle(a: StyleState, b: StyleState): boolean {
  return a.bold === b.bold
    && a.italic === b.italic
    && a.underline === b.underline
    && a.strikethrough === b.strikethrough;
}

export function withAttribute(style: StyleState, attribute: StyleAttribute): StyleState {
  if (style[attribute]) return style;
  return { ...style, [attribute]: true };
}

export function isPlain(style: StyleState): boolean {
  return sameStyle(style, PLAIN_STYLE);
}

export function closingMarkers(style: StyleState): string {
  return CLOSE_ORDER.filter((attr) => style[attr]).map((attr) => MARKERS[attr]).join('');
}

export function openingMarkers(style: StyleState): string {
  return OPEN_ORDER.filter((attr) => style[attr]).map((attr) => MARKERS[attr]).join('');
}
