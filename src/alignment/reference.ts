/**
 * Setup loaders for the two static inputs of a verification: the field spec
 * list and the reference image. Any problem here is fatal and surfaces as a
 * ConfigurationError before a single render happens.
 */

import { promises as fs } from 'fs';
import { ImageIO } from '../platform/imageio/sharp';
import { createLogger } from '../utils/logger';
import { ConfigurationError, describeError } from './errors';
import { FieldSpecListSchema, formatZodError } from './schemas';
import { FieldSpec, RasterImage } from './types';

const logger = createLogger('reference-loader');

export function parseFieldSpecs(raw: unknown, source = 'field specs'): FieldSpec[] {
  const parsed = FieldSpecListSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${source}: ${formatZodError(parsed.error)}`, { source });
  }
  return parsed.data.map((spec) => Object.freeze({ ...spec }));
}

export async function loadFieldSpecs(filePath: string): Promise<FieldSpec[]> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read field specs from ${filePath}: ${describeError(error)}`, { filePath });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Field specs file ${filePath} is not valid JSON: ${describeError(error)}`, { filePath });
  }

  const specs = parseFieldSpecs(raw, `field specs in ${filePath}`);
  logger.info({ filePath, fields: specs.map((spec) => spec.name) }, 'Loaded field specs');
  return specs;
}

export async function loadReferenceImage(filePath: string, imageIO: ImageIO): Promise<RasterImage> {
  try {
    const image = await imageIO.read(filePath);
    logger.info({ filePath, width: image.width, height: image.height }, 'Loaded reference image');
    return image;
  } catch (error) {
    throw new ConfigurationError(`Cannot load reference image ${filePath}: ${describeError(error)}`, { filePath });
  }
}
