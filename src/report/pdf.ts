import { createWriteStream } from 'node:fs';
import { finished } from 'node:stream/promises';

import PDFDocument from 'pdfkit';

import type { Figure, Shape } from './figure.js';

// Standard PDF fonts, no embedding needed.
const FONT = 'Helvetica';
const FONT_BOLD = 'Helvetica-Bold';
// Distance from the top of a line box to the baseline, as a share of size.
const ASCENT = 0.78;

// ── PDF backend ──────────────────────────────────────────────

export async function writePdf(figure: Figure, outputPath: string): Promise<void> {
  const doc = new PDFDocument({
    size: [figure.width, figure.height],
    margin: 0,
    info: { Title: figure.title, Creator: 'htnbench' },
  });
  const out = createWriteStream(outputPath);
  const done = finished(out);
  doc.pipe(out);

  for (const shape of figure.shapes) {
    paint(doc, shape);
  }

  doc.end();
  await done;
}

function paint(doc: PDFKit.PDFDocument, shape: Shape): void {
  switch (shape.kind) {
    case 'rect':
      doc.rect(shape.x, shape.y, shape.width, shape.height).fill(shape.fill);
      return;

    case 'line':
      doc.save();
      doc.lineWidth(shape.width).strokeColor(shape.stroke);
      if (shape.dash !== undefined) doc.dash(shape.dash, { space: shape.dash });
      doc.moveTo(shape.x1, shape.y1).lineTo(shape.x2, shape.y2).stroke();
      doc.restore();
      return;

    case 'text': {
      doc.save();
      doc.font(shape.bold ? FONT_BOLD : FONT).fontSize(shape.size).fillColor(shape.fill);
      if (shape.rotate !== undefined) {
        doc.rotate(shape.rotate, { origin: [shape.x, shape.y] });
      }
      const width = doc.widthOfString(shape.text);
      const x =
        shape.anchor === 'middle'
          ? shape.x - width / 2
          : shape.anchor === 'end'
            ? shape.x - width
            : shape.x;
      doc.text(shape.text, x, shape.y - shape.size * ASCENT, { lineBreak: false });
      doc.restore();
      return;
    }
  }
}
