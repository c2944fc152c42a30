/**
 * Vector document: an ordered tree of drawing primitives, independent of any
 * output format. `toSvg` turns it into markup.
 */

export type AttributeValue = string | number;
export type Attributes = Readonly<Record<string, AttributeValue>>;

export interface Point {
  x: number;
  y: number;
}

export interface Transform {
  translate?: Point;
  /** Degrees, around `(cx, cy)` */
  rotate?: { angle: number; cx: number; cy: number };
}

export type TextAnchor = 'start' | 'middle' | 'end';

export interface GroupNode {
  kind: 'group';
  attrs: Attributes;
  transform?: Transform;
  children: DocumentNode[];
}

export interface RectNode {
  kind: 'rect';
  x: number;
  y: number;
  width: number;
  height: number;
  attrs: Attributes;
}

export interface CircleNode {
  kind: 'circle';
  cx: number;
  cy: number;
  r: number;
  attrs: Attributes;
}

export interface LineNode {
  kind: 'line';
  x1: number;
  y1: number;
  x2: number;
  y2: number;
  attrs: Attributes;
}

export interface PathNode {
  kind: 'path';
  d: string;
  attrs: Attributes;
}

export interface TextNode {
  kind: 'text';
  x: number;
  y: number;
  content: string;
  anchor?: TextAnchor;
  baseline?: string;
  transform?: Transform;
  attrs: Attributes;
}

export interface StyleNode {
  kind: 'style';
  css: string;
}

export type DocumentNode = GroupNode | RectNode | CircleNode | LineNode | PathNode | TextNode | StyleNode;

export interface VectorDocument {
  width: number;
  height: number;
  /** Rendered as `max-width` on the root element */
  maxWidth: number;
  children: DocumentNode[];
}

export interface TextOptions {
  anchor?: TextAnchor;
  baseline?: string;
  transform?: Transform;
  attrs?: Attributes;
}

/**
 * Accumulates primitives in drawing order. Groups nest through
 * `openGroup` / `closeGroup`; everything drawn in between lands in the
 * innermost open group.
 */
export class DocumentBuilder {
  private readonly root: DocumentNode[] = [];
  private readonly stack: GroupNode[] = [];

  constructor(
    private readonly width: number,
    private readonly height: number,
    private readonly maxWidth: number = width,
  ) {}

  style(css: string): this {
    return this.add({ kind: 'style', css });
  }

  openGroup(attrs: Attributes = {}, transform?: Transform): this {
    const group: GroupNode = { kind: 'group', attrs, transform, children: [] };
    this.add(group);
    this.stack.push(group);
    return this;
  }

  closeGroup(): this {
    if (!this.stack.pop()) {
      throw new Error('closeGroup called without an open group');
    }
    return this;
  }

  rect(x: number, y: number, width: number, height: number, attrs: Attributes = {}): this {
    return this.add({ kind: 'rect', x, y, width, height, attrs });
  }

  circle(cx: number, cy: number, r: number, attrs: Attributes = {}): this {
    return this.add({ kind: 'circle', cx, cy, r, attrs });
  }

  line(x1: number, y1: number, x2: number, y2: number, attrs: Attributes = {}): this {
    return this.add({ kind: 'line', x1, y1, x2, y2, attrs });
  }

  path(d: string, attrs: Attributes = {}): this {
    return this.add({ kind: 'path', d, attrs });
  }

  text(x: number, y: number, content: string, options: TextOptions = {}): this {
    return this.add({
      kind: 'text',
      x,
      y,
      content,
      anchor: options.anchor,
      baseline: options.baseline,
      transform: options.transform,
      attrs: options.attrs ?? {},
    });
  }

  build(): VectorDocument {
    if (this.stack.length > 0) {
      throw new Error(`${this.stack.length} group(s) left open`);
    }
    return { width: this.width, height: this.height, maxWidth: this.maxWidth, children: this.root };
  }

  private add(node: DocumentNode): this {
    const parent = this.stack[this.stack.length - 1];
    (parent ? parent.children : this.root).push(node);
    return this;
  }
}

/**
 * `translate(x,y)` / `rotate(a, cx, cy)` attribute text.
 */
export function formatTransform(transform: Transform): string {
  const parts: string[] = [];
  if (transform.translate) {
    parts.push(`translate(${transform.translate.x},${transform.translate.y})`);
  }
  if (transform.rotate) {
    const { angle, cx, cy } = transform.rotate;
    parts.push(`rotate(${angle}, ${cx}, ${cy})`);
  }
  return parts.join(' ');
}
