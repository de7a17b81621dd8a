import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { PlotRenderError } from '../core/errors.js';
import { layoutFigure } from './figure.js';
import type { FigureInput } from './figure.js';
import { writePdf } from './pdf.js';
import { toSvg } from './svg.js';

export type FigureFormat = 'pdf' | 'svg';

export function figureFormat(outputPath: string): FigureFormat | null {
  switch (path.extname(outputPath).toLowerCase()) {
    case '.pdf':
      return 'pdf';
    case '.svg':
      return 'svg';
    default:
      return null;
  }
}

/**
 * Render the suite figure to `outputPath`; the format follows the file
 * extension. Every failure surfaces as a PlotRenderError.
 */
export async function renderFigure(input: FigureInput, outputPath: string): Promise<void> {
  const format = figureFormat(outputPath);
  if (format === null) {
    throw new PlotRenderError(
      outputPath,
      new Error(`unsupported figure format "${path.extname(outputPath)}" (use .pdf or .svg)`),
    );
  }

  const figure = layoutFigure(input);

  try {
    await mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });
    if (format === 'pdf') {
      await writePdf(figure, outputPath);
    } else {
      await writeFile(outputPath, toSvg(figure), 'utf-8');
    }
  } catch (err) {
    throw new PlotRenderError(outputPath, err);
  }
}
