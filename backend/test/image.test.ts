import sharp from 'sharp';
import { InvalidInputError, resizeImage, resolveTargetDimensions } from '../lib';
import { createTestImage } from './helpers';

/**
 * Unit Tests for the image resize pipeline
 *
 * Real sharp on small generated images; no mocks.
 */
describe('resolveTargetDimensions', () => {
  const defaults = { width: 800, height: 600 };

  test('should use the configured defaults when nothing is requested', () => {
    expect(resolveTargetDimensions({}, defaults)).toEqual({ width: 800, height: 600 });
  });

  test('should let a requested width override only the width', () => {
    expect(resolveTargetDimensions({ width: 320 }, defaults)).toEqual({ width: 320, height: 600 });
  });

  test('should let requested width and height override both defaults', () => {
    expect(resolveTargetDimensions({ width: 64, height: 48 }, defaults)).toEqual({ width: 64, height: 48 });
  });
});

describe('resizeImage', () => {
  test('should stretch to exactly the requested dimensions in fill mode', async () => {
    // GIVEN
    const source = await createTestImage(200, 100, 'jpeg');

    // WHEN
    const resized = await resizeImage(source, { width: 50, height: 80 });

    // THEN
    expect(resized.width).toBe(50);
    expect(resized.height).toBe(80);
    const metadata = await sharp(resized.data).metadata();
    expect(metadata.width).toBe(50);
    expect(metadata.height).toBe(80);
  });

  test('should keep the aspect ratio in inside mode', async () => {
    // GIVEN - 2:1 source into a 100x100 box
    const source = await createTestImage(200, 100);

    // WHEN
    const resized = await resizeImage(source, { width: 100, height: 100 }, 'inside');

    // THEN
    expect(resized.width).toBe(100);
    expect(resized.height).toBe(50);
  });

  test('should keep PNG sources as PNG', async () => {
    const source = await createTestImage(40, 40, 'png', true);

    const resized = await resizeImage(source, { width: 20, height: 20 });

    expect(resized.contentType).toBe('image/png');
    expect(resized.extension).toBe('png');
    expect((await sharp(resized.data).metadata()).format).toBe('png');
  });

  test('should encode non-PNG sources as JPEG', async () => {
    const source = await sharp({
      create: { width: 30, height: 30, channels: 3, background: { r: 0, g: 0, b: 0 } },
    })
      .webp()
      .toBuffer();

    const resized = await resizeImage(source, { width: 10, height: 10 });

    expect(resized.contentType).toBe('image/jpeg');
    expect(resized.extension).toBe('jpg');
    expect((await sharp(resized.data).metadata()).format).toBe('jpeg');
  });

  test('should reject bytes that are not an image', async () => {
    const source = Buffer.from('definitely not an image');

    await expect(resizeImage(source, { width: 10, height: 10 })).rejects.toBeInstanceOf(InvalidInputError);
    await expect(resizeImage(source, { width: 10, height: 10 })).rejects.toThrow(
      'Source content could not be decoded as an image'
    );
  });
});
