/**
 * ResizeResponse Interface
 *
 * Body returned by the resize endpoint once the resized artifact has been
 * written. `url` is a presigned GET URL; the resized bucket itself is private.
 */
export interface ResizeResponse {
  success: true;
  message: string;
  bucket: string;
  key: string;
  url: string;
  contentType: string;
  width: number;
  height: number;
  expiresIn: number;
}

/**
 * Type Guard for {@link ResizeResponse}
 * @param obj Object to be checked if it conforms to ResizeResponse
 * @returns True if obj is ResizeResponse, false otherwise
 */
export function isResizeResponse(obj: unknown): obj is ResizeResponse {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    ('success' in obj && obj.success === true) &&
    ('bucket' in obj && typeof obj.bucket === 'string') &&
    ('key' in obj && typeof obj.key === 'string') &&
    ('url' in obj && typeof obj.url === 'string') &&
    ('contentType' in obj && typeof obj.contentType === 'string') &&
    ('width' in obj && typeof obj.width === 'number') &&
    ('height' in obj && typeof obj.height === 'number') &&
    ('expiresIn' in obj && typeof obj.expiresIn === 'number')
  );
}
