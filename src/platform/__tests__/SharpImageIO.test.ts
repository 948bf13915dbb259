import sharp from 'sharp';
import { isRasterImage, SharpImageIO } from '../imageio/sharp';

describe('SharpImageIO', () => {
  const imageIO = new SharpImageIO();

  test('decodes a PNG buffer into raw RGB pixels', async () => {
    const pixels = Buffer.from([0, 0, 0, 255, 255, 255, 10, 20, 30, 40, 50, 60]);
    const png = await sharp(pixels, { raw: { width: 2, height: 2, channels: 3 } }).png().toBuffer();

    const image = await imageIO.decode(png);

    expect(image.width).toBe(2);
    expect(image.height).toBe(2);
    expect(image.channels).toBe(3);
    expect(Array.from(image.data)).toEqual([0, 0, 0, 255, 255, 255, 10, 20, 30, 40, 50, 60]);
  });

  test('rejects data that is not an image', async () => {
    await expect(imageIO.decode(Buffer.from('not an image'))).rejects.toThrow();
  });

  test('wraps read failures with the file path', async () => {
    await expect(imageIO.read('/nonexistent/reference.png')).rejects.toThrow(
      'Failed to read image /nonexistent/reference.png'
    );
  });

  test('recognizes raster images', () => {
    expect(isRasterImage({ data: new Uint8Array(3), width: 1, height: 1, channels: 3 })).toBe(true);
    expect(isRasterImage(Buffer.from([1, 2, 3]))).toBe(false);
    expect(isRasterImage({ width: 1, height: 1 })).toBe(false);
    expect(isRasterImage(null)).toBe(false);
  });
});
