import type { Figure, Shape } from './figure.js';

// ── SVG backend ──────────────────────────────────────────────

export function toSvg(figure: Figure): string {
  const lines: string[] = [];
  lines.push(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${num(figure.width)}" height="${num(figure.height)}" viewBox="0 0 ${num(figure.width)} ${num(figure.height)}" font-family="Helvetica, Arial, sans-serif">`,
  );
  lines.push(`<title>${escapeXml(figure.title)}</title>`);
  lines.push(`<rect x="0" y="0" width="${num(figure.width)}" height="${num(figure.height)}" fill="#ffffff"/>`);
  for (const shape of figure.shapes) {
    lines.push(shapeToSvg(shape));
  }
  lines.push('</svg>');
  return lines.join('\n') + '\n';
}

export function shapeToSvg(shape: Shape): string {
  switch (shape.kind) {
    case 'rect':
      return `<rect x="${num(shape.x)}" y="${num(shape.y)}" width="${num(shape.width)}" height="${num(shape.height)}" fill="${shape.fill}"/>`;
    case 'line': {
      const dash = shape.dash !== undefined ? ` stroke-dasharray="${num(shape.dash)}"` : '';
      return `<line x1="${num(shape.x1)}" y1="${num(shape.y1)}" x2="${num(shape.x2)}" y2="${num(shape.y2)}" stroke="${shape.stroke}" stroke-width="${num(shape.width)}"${dash}/>`;
    }
    case 'text': {
      const weight = shape.bold ? ' font-weight="bold"' : '';
      const transform =
        shape.rotate !== undefined
          ? ` transform="rotate(${num(shape.rotate)} ${num(shape.x)} ${num(shape.y)})"`
          : '';
      return `<text x="${num(shape.x)}" y="${num(shape.y)}" font-size="${num(shape.size)}" fill="${shape.fill}" text-anchor="${shape.anchor}"${weight}${transform}>${escapeXml(shape.text)}</text>`;
    }
  }
}

// ── Helpers ──────────────────────────────────────────────────

function num(value: number): string {
  return String(Math.round(value * 100) / 100);
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}
