import { APIGatewayProxyEventV2 } from 'aws-lambda';
import { FIT_MODES, FitMode, ImageSource, ResizeRequest, isFitMode, isResizeRequestBody } from '../interfaces';
import { InvalidInputError } from './errors';

export const MAX_DIMENSION = 10000;

const BASE64_PATTERN = /^[A-Za-z0-9+/_-]+={0,2}$/;

/**
 * Turn an HTTP API event into a {@link ResizeRequest}
 *
 * Accepted bodies:
 * - JSON `{ key }` pointing at an object in the upload bucket
 * - JSON `{ image }` with base64 image data
 * - plain base64 text, optionally as a `data:` URL
 * - raw binary, which API Gateway hands over base64 encoded
 *
 * Dimensions and fit come from the query string; JSON fields override them.
 *
 * @throws InvalidInputError if no source is present or a parameter is malformed
 */
export function parseResizeRequest(event: APIGatewayProxyEventV2): ResizeRequest {
  const query = event.queryStringParameters ?? {};
  const contentType = (event.headers?.['content-type'] ?? '').toLowerCase();
  const isJsonContent = contentType.includes('application/json');
  const rawBody = event.body ?? '';

  let width = parseDimension(query.width, 'width');
  let height = parseDimension(query.height, 'height');
  let fit = parseFit(query.fit);
  const filename = query.filename || undefined;

  let source: ImageSource;
  if (event.isBase64Encoded && rawBody && !isJsonContent) {
    source = { kind: 'payload', data: Buffer.from(rawBody, 'base64') };
  } else {
    const text = (event.isBase64Encoded ? Buffer.from(rawBody, 'base64').toString('utf8') : rawBody).trim();
    if (!text) {
      throw new InvalidInputError('No image data or object key provided in request body');
    }

    if (isJsonContent || text.startsWith('{')) {
      const body = parseJsonBody(text);
      width = body.width !== undefined ? parseDimension(body.width, 'width') : width;
      height = body.height !== undefined ? parseDimension(body.height, 'height') : height;
      fit = body.fit !== undefined ? parseFit(body.fit) : fit;

      if (body.image && body.key) {
        throw new InvalidInputError('Provide either image or key, not both');
      }
      if (body.image) {
        source = { kind: 'payload', data: decodeBase64Image(body.image) };
      } else if (body.key) {
        source = { kind: 'object', key: body.key };
      } else {
        throw new InvalidInputError('No image data or object key provided in request body');
      }
    } else {
      source = { kind: 'payload', data: decodeBase64Image(text) };
    }
  }

  return {
    source,
    fit,
    ...(width !== undefined ? { width } : {}),
    ...(height !== undefined ? { height } : {}),
    ...(filename ? { filename } : {}),
  };
}

/**
 * Decode base64 image data, with or without a `data:<mime>;base64,` prefix
 * @throws InvalidInputError if the text is not base64
 */
export function decodeBase64Image(text: string): Buffer {
  const comma = text.indexOf(',');
  const encoded = (text.startsWith('data:') && comma !== -1 ? text.slice(comma + 1) : text).replace(/\s+/g, '');
  if (!encoded || !BASE64_PATTERN.test(encoded)) {
    throw new InvalidInputError('Image data is not valid base64');
  }
  return Buffer.from(encoded, 'base64');
}

/**
 * Object key for a resized image: `<id>.<ext>`, or `<id>-<name>.<ext>` when the
 * caller supplied a filename. The name is reduced to a safe character set.
 */
export function buildOutputKey(id: string, extension: string, filename?: string): string {
  const stem = filename
    ?.replace(/\.[^.]*$/, '')
    .replace(/[^A-Za-z0-9_-]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, 100);
  return stem ? `${id}-${stem}.${extension}` : `${id}.${extension}`;
}

function parseJsonBody(text: string) {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new InvalidInputError('Request body is not valid JSON', error);
  }
  if (!isResizeRequestBody(parsed)) {
    throw new InvalidInputError('Request body has an unexpected shape');
  }
  return parsed;
}

function parseDimension(value: string | number | undefined, name: string): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0 || parsed > MAX_DIMENSION) {
    throw new InvalidInputError(`${name} must be a positive integer no larger than ${MAX_DIMENSION}`);
  }
  return parsed;
}

function parseFit(value: string | undefined): FitMode {
  if (value === undefined || value === '') {
    return 'fill';
  }
  if (!isFitMode(value)) {
    throw new InvalidInputError(`fit must be one of: ${FIT_MODES.join(', ')}`);
  }
  return value;
}
