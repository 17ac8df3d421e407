import { PNG } from 'pngjs';

export type Rgb = readonly [number, number, number];

export const PALETTE: readonly Rgb[] = [
  [37, 99, 235],
  [22, 163, 74],
  [234, 88, 12],
  [147, 51, 234],
  [219, 39, 119],
  [13, 148, 136],
  [202, 138, 4],
  [100, 116, 139],
];

const BACKGROUND: Rgb = [255, 255, 255];
const AXIS: Rgb = [203, 213, 225];

export const colorAt = (index: number): Rgb => PALETTE[index % PALETTE.length];

export const toHex = ([r, g, b]: Rgb): string =>
  `#${[r, g, b].map((channel) => channel.toString(16).padStart(2, '0')).join('')}`;

export interface ChartOptions {
  width?: number;
  height?: number;
  padding?: number;
}

/**
 * Minimal raster surface over a pngjs image
 */
class Canvas {
  private readonly png: PNG;

  constructor(
    readonly width: number,
    readonly height: number,
  ) {
    this.png = new PNG({ width, height });
    this.fillRect(0, 0, width, height, BACKGROUND);
  }

  fillRect(x: number, y: number, w: number, h: number, [r, g, b]: Rgb): void {
    const left = Math.max(0, Math.floor(x));
    const top = Math.max(0, Math.floor(y));
    const right = Math.min(this.width, Math.floor(x + w));
    const bottom = Math.min(this.height, Math.floor(y + h));

    for (let row = top; row < bottom; row++) {
      for (let col = left; col < right; col++) {
        const offset = (row * this.width + col) * 4;
        this.png.data[offset] = r;
        this.png.data[offset + 1] = g;
        this.png.data[offset + 2] = b;
        this.png.data[offset + 3] = 255;
      }
    }
  }

  toBuffer(): Buffer {
    return PNG.sync.write(this.png);
  }
}

const scale = (value: number, max: number, length: number): number =>
  max > 0 ? Math.round((Math.max(0, value) / max) * length) : 0;

/**
 * Vertical bars, one per value, on a baseline
 */
export const renderColumnChart = (values: readonly number[], options: ChartOptions = {}): Buffer => {
  const { width = 600, height = 240, padding = 16 } = options;
  const canvas = new Canvas(width, height);
  const plotWidth = width - padding * 2;
  const plotHeight = height - padding * 2;
  const baseline = height - padding;
  const max = Math.max(0, ...values);
  const slot = values.length > 0 ? plotWidth / values.length : plotWidth;
  const barWidth = Math.max(1, Math.floor(slot * 0.7));

  canvas.fillRect(padding, baseline, plotWidth, 1, AXIS);
  values.forEach((value, index) => {
    const barHeight = scale(value, max, plotHeight);
    const x = padding + index * slot + (slot - barWidth) / 2;
    canvas.fillRect(x, baseline - barHeight, barWidth, barHeight, colorAt(0));
  });

  return canvas.toBuffer();
};

/**
 * Horizontal bars, one row per value, each in its own palette colour
 */
export const renderBarChart = (values: readonly number[], options: ChartOptions = {}): Buffer => {
  const { width = 600, padding = 16 } = options;
  const rowHeight = 28;
  const height = options.height ?? padding * 2 + Math.max(1, values.length) * rowHeight;
  const canvas = new Canvas(width, height);
  const plotWidth = width - padding * 2;
  const max = Math.max(0, ...values);

  canvas.fillRect(padding, padding, 1, height - padding * 2, AXIS);
  values.forEach((value, index) => {
    const y = padding + index * rowHeight + 4;
    canvas.fillRect(padding + 1, y, scale(value, max, plotWidth - 1), rowHeight - 8, colorAt(index));
  });

  return canvas.toBuffer();
};

/**
 * A single strip split into segments proportional to each value's share
 */
export const renderShareBar = (values: readonly number[], options: ChartOptions = {}): Buffer => {
  const { width = 600, height = 48, padding = 8 } = options;
  const canvas = new Canvas(width, height);
  const plotWidth = width - padding * 2;
  const total = values.reduce((sum, value) => sum + Math.max(0, value), 0);

  canvas.fillRect(padding, padding, plotWidth, height - padding * 2, AXIS);
  let cursor = 0;
  let consumed = 0;
  values.forEach((value, index) => {
    consumed += Math.max(0, value);
    // Segment edges come from running totals so the strip ends exactly at its full width
    const edge = scale(consumed, total, plotWidth);
    canvas.fillRect(padding + cursor, padding, edge - cursor, height - padding * 2, colorAt(index));
    cursor = edge;
  });

  return canvas.toBuffer();
};
