import sharp from 'sharp';
import { Dimensions, FitMode } from '../interfaces';
import { InvalidInputError } from './errors';

export interface ResizedImage {
  data: Buffer;
  contentType: 'image/png' | 'image/jpeg';
  extension: 'png' | 'jpg';
  width: number;
  height: number;
}

export const JPEG_QUALITY = 85;

/**
 * Fill in whichever dimension the caller left out from the configured defaults.
 */
export function resolveTargetDimensions(
  requested: Partial<Dimensions>,
  defaults: Readonly<Dimensions>
): Dimensions {
  return {
    width: requested.width ?? defaults.width,
    height: requested.height ?? defaults.height,
  };
}

/**
 * Resize an encoded image
 *
 * With `fill` the output is exactly `target`; the other fit modes keep the
 * aspect ratio and report the size they actually produced. PNG stays PNG.
 * Everything else becomes JPEG, with transparency flattened onto white.
 *
 * @param source Encoded image bytes in any format sharp can decode
 * @throws InvalidInputError if the bytes are not a decodable image
 */
export async function resizeImage(
  source: Buffer,
  target: Dimensions,
  fit: FitMode = 'fill'
): Promise<ResizedImage> {
  let format: string | undefined;
  try {
    ({ format } = await sharp(source).metadata());
  } catch (error) {
    throw new InvalidInputError('Source content could not be decoded as an image', error);
  }
  if (!format) {
    throw new InvalidInputError('Source content could not be decoded as an image');
  }

  // rotate() with no angle applies the EXIF orientation before the box is fitted
  const pipeline = sharp(source)
    .rotate()
    .resize({
      width: target.width,
      height: target.height,
      fit,
      kernel: sharp.kernel.lanczos3,
    });

  const isPng = format === 'png';
  const encoded = isPng
    ? pipeline.png()
    : pipeline.flatten({ background: '#ffffff' }).jpeg({ quality: JPEG_QUALITY });

  try {
    const { data, info } = await encoded.toBuffer({ resolveWithObject: true });
    return {
      data,
      contentType: isPng ? 'image/png' : 'image/jpeg',
      extension: isPng ? 'png' : 'jpg',
      width: info.width,
      height: info.height,
    };
  } catch (error) {
    throw new InvalidInputError('Source content could not be decoded as an image', error);
  }
}
