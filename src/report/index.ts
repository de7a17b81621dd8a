/**
 * Report generation module.
 * Deterministic: transforms aggregated suite statistics into the figure
 * (PDF/SVG) and markdown + JSON artifacts.
 */

export { buildSuiteReport, generateMarkdown, generateJSON, serializeJSON } from './reporter.js';
export type { JsonOutput, JsonOutputRun } from './reporter.js';
export { layoutFigure, formatSeconds, COLORS, NO_DATA_LABEL, NO_SUCCESS_PLACEHOLDER } from './figure.js';
export type { Figure, FigureInput, Shape } from './figure.js';
export { renderFigure, figureFormat } from './render.js';
export type { FigureFormat } from './render.js';
export { toSvg } from './svg.js';
