/**
 * histogram.ts - Frame colour histograms and their distance
 *
 * Frames arrive as packed RGB24. Each is binned into an 8x8x8 HSV histogram
 * using 8-bit HSV ranges (hue 0-180, saturation and value 0-256) and
 * L2-normalized, so two frames are compared independent of their size.
 */

export const HUE_BINS = 8;
export const SATURATION_BINS = 8;
export const VALUE_BINS = 8;
export const HISTOGRAM_LENGTH = HUE_BINS * SATURATION_BINS * VALUE_BINS;

const HUE_RANGE = 180;
const CHANNEL_RANGE = 256;

/**
 * Convert one 8-bit RGB pixel to 8-bit HSV (h in [0, 180), s and v in [0, 255]).
 */
export function rgbToHsv(r: number, g: number, b: number): [number, number, number] {
  const v = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const delta = v - min;
  const s = v === 0 ? 0 : (255 * delta) / v;

  let h = 0;
  if (delta !== 0) {
    if (v === r) {
      h = (60 * (g - b)) / delta;
    } else if (v === g) {
      h = 120 + (60 * (b - r)) / delta;
    } else {
      h = 240 + (60 * (r - g)) / delta;
    }
    if (h < 0) h += 360;
  }

  return [h / 2, s, v];
}

function binOf(value: number, range: number, bins: number): number {
  const bin = Math.floor((value * bins) / range);
  return bin >= bins ? bins - 1 : bin;
}

/**
 * Build the normalized histogram for a packed RGB24 frame.
 */
export function computeHistogram(rgb: Uint8Array): Float64Array {
  if (rgb.length === 0 || rgb.length % 3 !== 0) {
    throw new RangeError(`RGB24 frame length must be a positive multiple of 3, got ${rgb.length}`);
  }

  const histogram = new Float64Array(HISTOGRAM_LENGTH);
  for (let i = 0; i < rgb.length; i += 3) {
    const [h, s, v] = rgbToHsv(rgb[i], rgb[i + 1], rgb[i + 2]);
    const index =
      binOf(h, HUE_RANGE, HUE_BINS) * SATURATION_BINS * VALUE_BINS +
      binOf(s, CHANNEL_RANGE, SATURATION_BINS) * VALUE_BINS +
      binOf(v, CHANNEL_RANGE, VALUE_BINS);
    histogram[index] += 1;
  }

  let norm = 0;
  for (const count of histogram) norm += count * count;
  norm = Math.sqrt(norm);
  for (let i = 0; i < histogram.length; i++) {
    histogram[i] /= norm;
  }
  return histogram;
}

/**
 * Pearson correlation of two histograms, in [-1, 1].
 * Degenerate (zero-variance) inputs correlate as 1 when equal, else 0.
 */
export function histogramCorrelation(a: Float64Array, b: Float64Array): number {
  if (a.length !== b.length) {
    throw new RangeError(`Histogram lengths differ: ${a.length} vs ${b.length}`);
  }

  const n = a.length;
  let meanA = 0;
  let meanB = 0;
  for (let i = 0; i < n; i++) {
    meanA += a[i];
    meanB += b[i];
  }
  meanA /= n;
  meanB /= n;

  let cross = 0;
  let varA = 0;
  let varB = 0;
  for (let i = 0; i < n; i++) {
    const da = a[i] - meanA;
    const db = b[i] - meanB;
    cross += da * db;
    varA += da * da;
    varB += db * db;
  }

  const denominator = Math.sqrt(varA * varB);
  if (denominator <= Number.EPSILON) {
    return a.every((value, i) => value === b[i]) ? 1 : 0;
  }
  return Math.max(-1, Math.min(1, cross / denominator));
}

/**
 * Symmetric distance between two frames: 0 for identical histograms,
 * growing with visual change, bounded by 2.
 */
export function dissimilarity(a: Float64Array, b: Float64Array): number {
  return 1 - histogramCorrelation(a, b);
}
