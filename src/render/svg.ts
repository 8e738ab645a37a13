/**
 * Minimal SVG document builder
 */

export type SvgAttributes = Record<string, string | number>;

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

// Coordinates are rounded to two decimals to keep output stable and small
function formatAttribute(value: string | number): string {
  if (typeof value === 'number') {
    return String(Math.round(value * 100) / 100);
  }
  return escapeXml(value);
}

function attributes(attrs: SvgAttributes): string {
  return Object.entries(attrs)
    .map(([name, value]) => ` ${name}="${formatAttribute(value)}"`)
    .join('');
}

export class SvgDocument {
  private readonly elements: string[] = [];

  constructor(
    readonly width: number,
    readonly height: number
  ) {}

  rect(attrs: SvgAttributes): this {
    this.elements.push(`<rect${attributes(attrs)}/>`);
    return this;
  }

  line(x1: number, y1: number, x2: number, y2: number, attrs: SvgAttributes = {}): this {
    this.elements.push(`<line${attributes({ x1, y1, x2, y2, ...attrs })}/>`);
    return this;
  }

  polyline(points: ReadonlyArray<[number, number]>, attrs: SvgAttributes = {}): this {
    const encoded = points.map(([x, y]) => `${formatAttribute(x)},${formatAttribute(y)}`).join(' ');
    this.elements.push(`<polyline${attributes({ points: encoded, fill: 'none', ...attrs })}/>`);
    return this;
  }

  polygon(points: ReadonlyArray<[number, number]>, attrs: SvgAttributes = {}): this {
    const encoded = points.map(([x, y]) => `${formatAttribute(x)},${formatAttribute(y)}`).join(' ');
    this.elements.push(`<polygon${attributes({ points: encoded, ...attrs })}/>`);
    return this;
  }

  circle(cx: number, cy: number, r: number, attrs: SvgAttributes = {}): this {
    this.elements.push(`<circle${attributes({ cx, cy, r, ...attrs })}/>`);
    return this;
  }

  text(x: number, y: number, content: string, attrs: SvgAttributes = {}): this {
    this.elements.push(`<text${attributes({ x, y, ...attrs })}>${escapeXml(content)}</text>`);
    return this;
  }

  toString(): string {
    return [
      `<svg xmlns="http://www.w3.org/2000/svg" width="${this.width}" height="${this.height}" viewBox="0 0 ${this.width} ${this.height}">`,
      ...this.elements.map(element => `  ${element}`),
      '</svg>',
      '',
    ].join('\n');
  }
}
