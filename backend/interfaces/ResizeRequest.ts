/**
 * Resize modes accepted in the `fit` parameter.
 * `fill` stretches to the exact target box; the others keep the aspect ratio.
 */
export const FIT_MODES = ['fill', 'inside', 'contain', 'cover', 'outside'] as const;

export type FitMode = (typeof FIT_MODES)[number];

export function isFitMode(value: unknown): value is FitMode {
  return typeof value === 'string' && (FIT_MODES as readonly string[]).includes(value);
}

export interface Dimensions {
  width: number;
  height: number;
}

/**
 * Where the source image bytes come from: inline in the request, or an
 * object in the upload bucket.
 */
export type ImageSource =
  | { kind: 'payload'; data: Buffer }
  | { kind: 'object'; key: string };

/**
 * ResizeRequest Interface
 *
 * One parsed resize invocation. Missing dimensions fall back to the configured
 * defaults when the target box is resolved.
 */
export interface ResizeRequest {
  source: ImageSource;
  width?: number;
  height?: number;
  fit: FitMode;
  filename?: string;
}

/**
 * JSON body accepted by POST /resize.
 */
export interface ResizeRequestBody {
  key?: string;
  image?: string;
  width?: number;
  height?: number;
  fit?: string;
}

/**
 * Type Guard for {@link ResizeRequestBody}
 * @param obj Parsed JSON body
 * @returns True if every present field has the expected type
 */
export function isResizeRequestBody(obj: unknown): obj is ResizeRequestBody {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    !Array.isArray(obj) &&
    (!('key' in obj) || typeof obj.key === 'string') &&
    (!('image' in obj) || typeof obj.image === 'string') &&
    (!('width' in obj) || typeof obj.width === 'number') &&
    (!('height' in obj) || typeof obj.height === 'number') &&
    (!('fit' in obj) || typeof obj.fit === 'string')
  );
}
