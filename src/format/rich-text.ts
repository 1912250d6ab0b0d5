/**
 * Closed representation of a parsed Discord message. Containers hold children
 * and are visited on enter and on exit; every other node is a leaf visited once.
 */
export type RichContainerKind =
  | 'bold'
  | 'italic'
  | 'underline'
  | 'strikethrough'
  | 'blockQuote'
  | 'spoiler';

export type RichContainer = {
  kind: RichContainerKind;
  children: RichNode[];
};

export type RichLeaf =
  | { kind: 'text'; content: string }
  | { kind: 'code'; language: string; content: string }
  | { kind: 'url'; url: string }
  | { kind: 'emoji'; name: string }
  | { kind: 'channelMention'; id: string }
  | { kind: 'roleMention'; id: string }
  | { kind: 'userMention'; id: string }
  | { kind: 'specialMention'; text: string }
  /** `epoch` is kept as received; it may not be a valid integer. */
  | { kind: 'timestamp'; epoch: string; format?: string }
  | { kind: 'lineBreak' };

export type RichNode = RichContainer | RichLeaf;

export type RichVisitor = (node: RichNode, entering: boolean) => void;

const CONTAINER_KINDS: ReadonlySet<string> = new Set<RichContainerKind>([
  'bold',
  'italic',
  'underline',
  'strikethrough',
  'blockQuote',
  'spoiler',
]);

export function isContainer(node: RichNode): node is RichContainer {
  return CONTAINER_KINDS.has(node.kind);
}

/** Pre-order walk: `visit(node, true)`, children, then `visit(node, false)` for containers. */
export function walkRichText(nodes: readonly RichNode[], visit: RichVisitor): void {
  for (const node of nodes) {
    visit(node, true);
    if (isContainer(node)) {
      walkRichText(node.children, visit);
      visit(node, false);
    }
  }
}

// Small constructors, mostly for tests and the markdown adapter.
export const text = (content: string): RichNode => ({ kind: 'text', content });
export const container = (kind: RichContainerKind, children: RichNode[]): RichNode => ({ kind, children });
