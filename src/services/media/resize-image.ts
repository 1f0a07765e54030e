import sharp from 'sharp';
import { UnsupportedImageError } from '../../errors';
import type { ExtractionImage } from '../../ocr/gemini-extraction';

export const DEFAULT_MAX_DIMENSION = 2048;

const SUPPORTED_FORMATS = new Set(['jpeg', 'png']);

export interface ResizedImage extends ExtractionImage {
  width: number;
  height: number;
}

/**
 * Shrinks the image so its longest side is at most `maxDimension`, keeping the aspect
 * ratio. Smaller images are left at their size. PNG stays PNG; everything else is JPEG.
 */
export async function resizeForExtraction(
  buffer: Buffer,
  maxDimension: number = DEFAULT_MAX_DIMENSION
): Promise<ResizedImage> {
  let format: string | undefined;
  try {
    const meta = await sharp(buffer).metadata();
    format = meta.format;
  } catch (error) {
    throw new UnsupportedImageError(
      `Could not read image: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  if (!format || !SUPPORTED_FORMATS.has(format)) {
    throw new UnsupportedImageError(`Unsupported image format: ${format ?? 'unknown'} (expected jpeg or png)`);
  }

  const pipeline = sharp(buffer).resize({
    width: maxDimension,
    height: maxDimension,
    fit: 'inside',
    withoutEnlargement: true,
    kernel: sharp.kernel.lanczos3,
  });
  const isPng = format === 'png';
  const { data, info } = await (isPng ? pipeline.png() : pipeline.jpeg({ quality: 90 })).toBuffer({
    resolveWithObject: true,
  });

  return {
    data,
    mimeType: isPng ? 'image/png' : 'image/jpeg',
    width: info.width,
    height: info.height,
  };
}
