/**
 * Sharp-based ImageIO adapter
 *
 * Decodes certificate images (reference files and renderer output) into
 * raw 8-bit rasters that the field locator scans directly.
 */

import sharp from 'sharp';
import { promises as fs } from 'fs';

// Interleaved 8-bit pixels, row-major
export interface RasterImage {
  data: Uint8Array;
  width: number;
  height: number;
  channels: number;
}

export interface ImageIO {
  read(imagePath: string): Promise<RasterImage>;
  decode(buffer: Buffer): Promise<RasterImage>;
}

export function isRasterImage(value: unknown): value is RasterImage {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'data' in value &&
    value.data instanceof Uint8Array &&
    'width' in value &&
    typeof value.width === 'number' &&
    'height' in value &&
    typeof value.height === 'number' &&
    'channels' in value &&
    typeof value.channels === 'number'
  );
}

export class SharpImageIO implements ImageIO {
  private readonly maxDimension = 8192; // Safety limit for memory usage

  async read(imagePath: string): Promise<RasterImage> {
    try {
      const buffer = await fs.readFile(imagePath);
      return await this.decode(buffer);
    } catch (error) {
      throw new Error(`Failed to read image ${imagePath}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  async decode(buffer: Buffer): Promise<RasterImage> {
    const sharpInstance = sharp(buffer);
    const metadata = await sharpInstance.metadata();

    if (!metadata.width || !metadata.height) {
      throw new Error('Invalid image dimensions');
    }

    if (metadata.width > this.maxDimension || metadata.height > this.maxDimension) {
      throw new Error(`Image too large: ${metadata.width}x${metadata.height} exceeds ${this.maxDimension}px limit`);
    }

    // Transparent areas become paper-white so they never read as ink
    const { data, info } = await sharpInstance
      .flatten({ background: '#ffffff' })
      .toColorspace('srgb')
      .raw()
      .toBuffer({ resolveWithObject: true });

    return {
      data,
      width: info.width,
      height: info.height,
      channels: info.channels,
    };
  }
}
