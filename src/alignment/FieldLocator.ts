/**
 * Field Locator
 *
 * Finds the ink band of a text field inside its search window by row and
 * column projection. A window with no text-bearing row is a valid outcome and
 * is reported as `{ found: false }`, never as a centre at the window midpoint.
 */

import { DetectedPosition, FieldSpec, FractionalWindow, NOT_DETECTED, RasterImage } from './types';

interface RowBand {
  top: number;
  bottom: number;
  ink: number;
}

// ITU-R 601-2 luma, alpha ignored
export function luminanceAt(image: RasterImage, x: number, y: number): number {
  const offset = (y * image.width + x) * image.channels;
  if (image.channels < 3) {
    return image.data[offset];
  }
  return image.data[offset] * 0.299 + image.data[offset + 1] * 0.587 + image.data[offset + 2] * 0.114;
}

// Convert a fractional window into a clamped [start, end) pixel range
export function toPixelRange(window: FractionalWindow, size: number): { start: number; end: number } {
  const start = Math.min(size, Math.max(0, Math.floor(window[0] * size)));
  const end = Math.min(size, Math.max(start, Math.floor(window[1] * size)));
  return { start, end };
}

export class FieldLocator {
  locate(image: RasterImage, spec: FieldSpec): DetectedPosition {
    if (image.width <= 0 || image.height <= 0) {
      return NOT_DETECTED;
    }

    const rows = toPixelRange(spec.searchWindow, image.height);
    const columns = toPixelRange(spec.horizontalWindow, image.width);
    if (rows.end <= rows.start || columns.end <= columns.start) {
      return NOT_DETECTED;
    }

    const band = this.findBand(image, spec, rows, columns);
    if (!band) {
      return NOT_DETECTED;
    }

    const span = this.findColumnSpan(image, spec, band, columns);
    if (!span) {
      return NOT_DETECTED;
    }

    return {
      found: true,
      centerX: (span.left + span.right) / 2,
      centerY: (band.top + band.bottom) / 2,
      bounds: { top: band.top, bottom: band.bottom, left: span.left, right: span.right },
    };
  }

  locateAll(image: RasterImage, specs: readonly FieldSpec[]): Record<string, DetectedPosition> {
    const positions: Record<string, DetectedPosition> = {};
    for (const spec of specs) {
      positions[spec.name] = this.locate(image, spec);
    }
    return positions;
  }

  private countRowInk(
    image: RasterImage,
    y: number,
    columns: { start: number; end: number },
    threshold: number
  ): number {
    let ink = 0;
    for (let x = columns.start; x < columns.end; x++) {
      if (luminanceAt(image, x, y) < threshold) {
        ink++;
      }
    }
    return ink;
  }

  /**
   * Group qualifying rows into bands, bridging gaps of up to `maxRowGap`
   * blank rows, and keep the band carrying the most ink (earliest on ties).
   */
  private findBand(
    image: RasterImage,
    spec: FieldSpec,
    rows: { start: number; end: number },
    columns: { start: number; end: number }
  ): RowBand | null {
    const bands: RowBand[] = [];

    for (let y = rows.start; y < rows.end; y++) {
      const ink = this.countRowInk(image, y, columns, spec.darknessThreshold);
      if (ink < spec.minInkPixels) {
        continue;
      }

      const current = bands[bands.length - 1];
      if (current && y - current.bottom - 1 <= spec.maxRowGap) {
        current.bottom = y;
        current.ink += ink;
      } else {
        bands.push({ top: y, bottom: y, ink });
      }
    }

    let best: RowBand | null = null;
    for (const band of bands) {
      if (!best || band.ink > best.ink) {
        best = band;
      }
    }
    return best;
  }

  private findColumnSpan(
    image: RasterImage,
    spec: FieldSpec,
    band: RowBand,
    columns: { start: number; end: number }
  ): { left: number; right: number } | null {
    let left = -1;
    let right = -1;

    for (let x = columns.start; x < columns.end; x++) {
      let ink = 0;
      for (let y = band.top; y <= band.bottom; y++) {
        if (luminanceAt(image, x, y) < spec.darknessThreshold) {
          ink++;
        }
      }
      if (ink >= spec.minInkColumnPixels) {
        if (left < 0) {
          left = x;
        }
        right = x;
      }
    }

    return left < 0 ? null : { left, right };
  }
}
