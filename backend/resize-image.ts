import { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2, Context } from 'aws-lambda';
import { S3Client } from '@aws-sdk/client-s3';
import { randomUUID } from 'crypto';
import { ResizeResponse } from './interfaces';
import {
  buildOutputKey,
  createDownloadUrl,
  createJobErrorResponse,
  createSuccessResponse,
  loadResizeSettings,
  parseResizeRequest,
  readObject,
  resizeImage,
  resolveTargetDimensions,
  writeObject,
} from './lib';

/**
 * S3 Client
 *
 * Created once per execution environment and reused across warm invocations.
 * Reads come from the upload bucket, writes go to the resized bucket.
 */
const s3Client = new S3Client({});

/**
 * ResizeImage Lambda Function Handler
 *
 * Routes:
 * - GET /health returns a fixed liveness body
 * - POST /resize resizes an inline payload or an upload-bucket object and
 *   stores the result in the resized bucket
 *
 * Dimensions default to RESIZED_WIDTH x RESIZED_HEIGHT. The default `fill`
 * mode stretches to exactly that box; `fit=inside|contain|cover|outside`
 * keeps the aspect ratio instead.
 *
 * Error mapping:
 * - 400 for a missing or undecodable image and malformed parameters
 * - 502 when S3 fails on read or write
 * - 500 for configuration and unexpected errors
 *
 * @param event - API Gateway HTTP API event
 * @param context - Lambda execution context with runtime information
 * @returns API Gateway HTTP API response with the resized artifact reference
 */
export const handler = async (
  event: APIGatewayProxyEventV2,
  context: Context
): Promise<APIGatewayProxyStructuredResultV2> => {
  console.log('Request received', JSON.stringify({ routeKey: event.routeKey, query: event.queryStringParameters }));
  console.log('Lambda Context', JSON.stringify({ requestId: context.awsRequestId, functionName: context.functionName }));

  if (event.routeKey === 'GET /health') {
    return createSuccessResponse({ status: 'healthy', service: 'image-resizer' });
  }

  try {
    const settings = loadResizeSettings();
    const request = parseResizeRequest(event);

    const source =
      request.source.kind === 'object'
        ? await readObject(s3Client, settings.uploadBucket, request.source.key)
        : request.source.data;

    const target = resolveTargetDimensions(request, settings.defaults);
    console.log(`Resizing ${source.length} bytes to ${target.width}x${target.height} (fit: ${request.fit})`);

    const resized = await resizeImage(source, target, request.fit);
    const key = buildOutputKey(randomUUID(), resized.extension, request.filename);

    await writeObject(s3Client, settings.resizedBucket, key, resized.data, resized.contentType);
    const url = await createDownloadUrl(s3Client, settings.resizedBucket, key, settings.urlExpiresIn);

    console.log(
      JSON.stringify({
        key,
        contentType: resized.contentType,
        width: resized.width,
        height: resized.height,
        bytes: resized.data.length,
      })
    );

    const response: ResizeResponse = {
      success: true,
      message: 'Image resized successfully',
      bucket: settings.resizedBucket,
      key,
      url,
      contentType: resized.contentType,
      width: resized.width,
      height: resized.height,
      expiresIn: settings.urlExpiresIn,
    };
    return createSuccessResponse(response);
  } catch (error) {
    return createJobErrorResponse(error);
  }
};
