import { describe, it, expect } from 'vitest';
import sharp from 'sharp';
import { resizeForExtraction } from '../../../src/services/media/resize-image';
import { UnsupportedImageError } from '../../../src/errors';

function blankImage(width: number, height: number) {
  return sharp({
    create: { width, height, channels: 3, background: { r: 255, g: 255, b: 255 } },
  });
}

describe('Image Resize', () => {
  it('caps the longest side at 2048px and keeps the aspect ratio', async () => {
    const input = await blankImage(4096, 1024).png().toBuffer();

    const result = await resizeForExtraction(input);

    expect(result.width).toBe(2048);
    expect(result.height).toBe(512);
    expect(result.mimeType).toBe('image/png');
    const meta = await sharp(result.data).metadata();
    expect(meta.width).toBe(2048);
    expect(meta.format).toBe('png');
  });

  it('leaves smaller images at their size', async () => {
    const input = await blankImage(800, 600).jpeg().toBuffer();

    const result = await resizeForExtraction(input);

    expect(result.width).toBe(800);
    expect(result.height).toBe(600);
    expect(result.mimeType).toBe('image/jpeg');
  });

  it('uses a custom maximum dimension', async () => {
    const input = await blankImage(300, 600).jpeg().toBuffer();

    const result = await resizeForExtraction(input, 100);

    expect(result.width).toBe(50);
    expect(result.height).toBe(100);
  });

  it('rejects formats other than jpeg and png', async () => {
    const input = await blankImage(20, 20).webp().toBuffer();

    await expect(resizeForExtraction(input)).rejects.toThrow('Unsupported image format: webp');
  });

  it('rejects bytes that are not an image', async () => {
    await expect(resizeForExtraction(Buffer.from('not an image'))).rejects.toThrow(UnsupportedImageError);
  });
});
