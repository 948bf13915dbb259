/**
 * Synthetic certificate rasters for alignment tests.
 *
 * The "certificate" is a 200x400 white RGB page carrying three solid black
 * text blocks inside the name, event and organiser search windows.
 */

import { parseFieldSpecs } from '../reference';
import { FieldSpecInput } from '../schemas';
import {
  FieldBounds,
  FieldSpec,
  FieldValues,
  RasterImage,
  RenderContext,
  RenderParameters,
} from '../types';

export const PAGE_WIDTH = 200;
export const PAGE_HEIGHT = 400;

export const FIELD_VALUES: FieldValues = {
  name: 'Test Participant',
  event: 'Sample Workshop',
  organiser: 'Example Society',
};

// Inclusive pixel bounds of each block on the reference page
export const REFERENCE_LAYOUT: Record<string, FieldBounds> = {
  name: { top: 100, bottom: 109, left: 60, right: 139 },
  event: { top: 190, bottom: 199, left: 50, right: 149 },
  organiser: { top: 240, bottom: 249, left: 70, right: 129 },
};

export function makeSpec(input: FieldSpecInput): FieldSpec {
  return parseFieldSpecs([input])[0];
}

export const FIELD_SPECS: FieldSpec[] = parseFieldSpecs([
  { name: 'name', searchWindow: [0.2, 0.35], minInkPixels: 10 },
  { name: 'event', searchWindow: [0.43, 0.55], minInkPixels: 10 },
  { name: 'organiser', searchWindow: [0.55, 0.67], minInkPixels: 10 },
]);

export function blankImage(width: number = PAGE_WIDTH, height: number = PAGE_HEIGHT, channels = 3): RasterImage {
  return { data: new Uint8Array(width * height * channels).fill(255), width, height, channels };
}

export function fillBlock(image: RasterImage, bounds: FieldBounds, value = 0): void {
  for (let y = Math.max(0, bounds.top); y <= Math.min(image.height - 1, bounds.bottom); y++) {
    for (let x = Math.max(0, bounds.left); x <= Math.min(image.width - 1, bounds.right); x++) {
      const offset = (y * image.width + x) * image.channels;
      for (let channel = 0; channel < image.channels; channel++) {
        image.data[offset + channel] = value;
      }
    }
  }
}

export function shiftBounds(bounds: FieldBounds, dx: number, dy: number): FieldBounds {
  return {
    top: bounds.top + dy,
    bottom: bounds.bottom + dy,
    left: bounds.left + dx,
    right: bounds.right + dx,
  };
}

/**
 * Draw the page with every block shifted by its per-field shift. Fields
 * listed in `omit` are left blank.
 */
export function drawPage(
  shifts: Record<string, { dx: number; dy: number }> = {},
  omit: readonly string[] = []
): RasterImage {
  const image = blankImage();
  for (const [field, bounds] of Object.entries(REFERENCE_LAYOUT)) {
    if (omit.includes(field)) {
      continue;
    }
    const shift = shifts[field] ?? { dx: 0, dy: 0 };
    fillBlock(image, shiftBounds(bounds, shift.dx, shift.dy));
  }
  return image;
}

export const referencePage = (): RasterImage => drawPage();

/**
 * Renderer that places each field at reference + bias + rounded render
 * offset, the way a deterministic template engine with a constant layout
 * error would.
 */
export function biasedRenderer(bias: Record<string, { dx: number; dy: number }> = {}) {
  return (_fields: Readonly<FieldValues>, parameters: RenderParameters, _context: RenderContext): RasterImage => {
    const shifts: Record<string, { dx: number; dy: number }> = {};
    for (const field of Object.keys(REFERENCE_LAYOUT)) {
      const fieldBias = bias[field] ?? { dx: 0, dy: 0 };
      const offset = parameters.offsets[field] ?? { dx: 0, dy: 0 };
      shifts[field] = {
        dx: Math.round(fieldBias.dx + offset.dx),
        dy: Math.round(fieldBias.dy + offset.dy),
      };
    }
    return drawPage(shifts);
  };
}
