import type { AggregatedStat } from '../schema/index.js';

// ── Figure model ─────────────────────────────────────────────
// Backend-neutral drawing: origin top-left, y grows downward, text `y` is
// the baseline and `rotate` is clockwise degrees around (x, y).

export type Shape =
  | {
      kind: 'rect';
      x: number;
      y: number;
      width: number;
      height: number;
      fill: string;
    }
  | {
      kind: 'line';
      x1: number;
      y1: number;
      x2: number;
      y2: number;
      stroke: string;
      width: number;
      dash?: number | undefined;
    }
  | {
      kind: 'text';
      x: number;
      y: number;
      text: string;
      size: number;
      fill: string;
      anchor: 'start' | 'middle' | 'end';
      bold?: boolean | undefined;
      rotate?: number | undefined;
    };

export interface Figure {
  title: string;
  width: number;
  height: number;
  shapes: Shape[];
}

export interface FigureInput {
  suite: string;
  repetitions: number;
  timeoutSeconds: number;
  /** Per-instance statistics in suite order. */
  instances: readonly AggregatedStat[];
  overall: AggregatedStat;
}

export const COLORS = {
  bar: '#4c72b0',
  success: '#55a868',
  timeout: '#dd8452',
  failure: '#c44e52',
  empty: '#cccccc',
  axis: '#333333',
  grid: '#e5e5e5',
  muted: '#888888',
  text: '#222222',
} as const;

export const NO_DATA_LABEL = 'no data';
export const NO_SUCCESS_PLACEHOLDER = 'no successful runs';

const MARGIN = { top: 70, right: 24, bottom: 120, left: 72 } as const;
const MIN_WIDTH = 640;
const SLOT_WIDTH = 36;
const HEIGHT = 480;
const Y_TICKS = 5;

// ── Layout ───────────────────────────────────────────────────

/**
 * Lay out the suite figure: mean solve time per instance with a min–max
 * whisker, an outcome strip (solved / timeout / failed) under each
 * instance, and the timeout budget as the top of the y axis.
 */
export function layoutFigure(input: FigureInput): Figure {
  const count = input.instances.length;
  const width = Math.max(MIN_WIDTH, MARGIN.left + MARGIN.right + count * SLOT_WIDTH);
  const height = HEIGHT;

  const left = MARGIN.left;
  const right = width - MARGIN.right;
  const top = MARGIN.top;
  const bottom = height - MARGIN.bottom;
  const plotHeight = bottom - top;
  const slot = count > 0 ? (right - left) / count : right - left;
  const barWidth = Math.min(slot * 0.6, 28);

  const limit = input.timeoutSeconds;
  const yOf = (seconds: number): number =>
    bottom - (Math.min(seconds, limit) / limit) * plotHeight;

  const title = `${input.suite} (N=${String(input.repetitions)}, T=${formatSeconds(limit)}s)`;
  const shapes: Shape[] = [];

  // Title + summary line
  shapes.push(text(width / 2, 28, title, 14, 'middle', { bold: true }));
  shapes.push(
    text(width / 2, 46, describeOverall(input.overall), 10, 'middle', { fill: COLORS.muted }),
  );

  // Legend
  const legend: Array<[string, string]> = [
    ['solved', COLORS.success],
    ['timeout', COLORS.timeout],
    ['failed', COLORS.failure],
  ];
  legend.forEach(([label, color], i) => {
    const lx = right - 190 + i * 64;
    shapes.push({ kind: 'rect', x: lx, y: 52, width: 8, height: 8, fill: color });
    shapes.push(text(lx + 12, 60, label, 9, 'start'));
  });

  // Y grid, ticks and labels
  for (let i = 0; i <= Y_TICKS; i++) {
    const value = (limit * i) / Y_TICKS;
    const y = yOf(value);
    if (i > 0 && i < Y_TICKS) {
      shapes.push({ kind: 'line', x1: left, y1: y, x2: right, y2: y, stroke: COLORS.grid, width: 0.5 });
    }
    shapes.push({ kind: 'line', x1: left - 4, y1: y, x2: left, y2: y, stroke: COLORS.axis, width: 1 });
    shapes.push(text(left - 7, y + 3, formatSeconds(value), 9, 'end'));
  }
  shapes.push(text(20, (top + bottom) / 2, 'time (s)', 10, 'middle', { rotate: -90 }));

  // Timeout budget
  shapes.push({
    kind: 'line',
    x1: left,
    y1: top,
    x2: right,
    y2: top,
    stroke: COLORS.timeout,
    width: 1,
    dash: 4,
  });
  shapes.push(text(right, top - 4, 'timeout', 8, 'end', { fill: COLORS.timeout }));

  // Per-instance marks
  input.instances.forEach((stat, i) => {
    const cx = left + slot * (i + 0.5);
    const x = cx - barWidth / 2;

    if (stat.meanSeconds !== null) {
      const y = yOf(stat.meanSeconds);
      shapes.push({ kind: 'rect', x, y, width: barWidth, height: bottom - y, fill: COLORS.bar });
      if (stat.minSeconds !== null && stat.maxSeconds !== null && stat.maxSeconds > stat.minSeconds) {
        const yMin = yOf(stat.minSeconds);
        const yMax = yOf(stat.maxSeconds);
        const cap = barWidth / 4;
        shapes.push({ kind: 'line', x1: cx, y1: yMin, x2: cx, y2: yMax, stroke: COLORS.axis, width: 1 });
        shapes.push({ kind: 'line', x1: cx - cap, y1: yMin, x2: cx + cap, y2: yMin, stroke: COLORS.axis, width: 1 });
        shapes.push({ kind: 'line', x1: cx - cap, y1: yMax, x2: cx + cap, y2: yMax, stroke: COLORS.axis, width: 1 });
      }
    } else {
      shapes.push(text(cx, bottom - 6, NO_DATA_LABEL, 7, 'start', { fill: COLORS.muted, rotate: -90 }));
    }

    shapes.push(...outcomeStrip(stat, x, bottom + 8, barWidth));
    shapes.push(
      text(
        cx,
        bottom + 30,
        `${String(stat.successes)}/${String(stat.timeouts)}/${String(stat.failures)}`,
        7,
        'middle',
        { fill: COLORS.muted },
      ),
    );
    shapes.push(text(cx + 3, bottom + 40, stat.label, 8, 'end', { rotate: -45 }));
  });

  // Axes last so they sit on top of bars
  shapes.push({ kind: 'line', x1: left, y1: bottom, x2: right, y2: bottom, stroke: COLORS.axis, width: 1 });
  shapes.push({ kind: 'line', x1: left, y1: top, x2: left, y2: bottom, stroke: COLORS.axis, width: 1 });

  if (input.overall.successes === 0) {
    shapes.push(
      text((left + right) / 2, (top + bottom) / 2, NO_SUCCESS_PLACEHOLDER, 16, 'middle', {
        fill: COLORS.muted,
        bold: true,
      }),
    );
  }

  return { title, width, height, shapes };
}

// ── Helpers ──────────────────────────────────────────────────

function outcomeStrip(stat: AggregatedStat, x: number, y: number, width: number): Shape[] {
  const height = 8;
  if (stat.total === 0) {
    return [{ kind: 'rect', x, y, width, height, fill: COLORS.empty }];
  }

  const parts: Array<[number, string]> = [
    [stat.successes, COLORS.success],
    [stat.timeouts, COLORS.timeout],
    [stat.failures, COLORS.failure],
  ];
  const shapes: Shape[] = [];
  let offset = x;
  for (const [n, fill] of parts) {
    if (n === 0) continue;
    const w = (n / stat.total) * width;
    shapes.push({ kind: 'rect', x: offset, y, width: w, height, fill });
    offset += w;
  }
  return shapes;
}

function text(
  x: number,
  y: number,
  content: string,
  size: number,
  anchor: 'start' | 'middle' | 'end',
  extra: { fill?: string; bold?: boolean; rotate?: number } = {},
): Shape {
  return {
    kind: 'text',
    x,
    y,
    text: content,
    size,
    anchor,
    fill: extra.fill ?? COLORS.text,
    ...(extra.bold !== undefined ? { bold: extra.bold } : {}),
    ...(extra.rotate !== undefined ? { rotate: extra.rotate } : {}),
  };
}

function describeOverall(overall: AggregatedStat): string {
  const rate = Math.round(overall.successRate * 100);
  const base = `${String(overall.successes)}/${String(overall.total)} runs solved (${String(rate)}%), ${String(overall.timeouts)} timeouts, ${String(overall.failures)} failures`;
  return overall.medianSeconds !== null
    ? `${base}, median ${formatSeconds(overall.medianSeconds)}s`
    : base;
}

export function formatSeconds(seconds: number): string {
  if (Number.isInteger(seconds)) return String(seconds);
  return seconds < 10 ? seconds.toFixed(2) : seconds.toFixed(1);
}
