import { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import sharp from 'sharp';

/**
 * Helper function to create a mock API Gateway HTTP API event
 * @param routeKey - Route key such as 'POST /resize'
 * @param overrides - Body, headers, query string and base64 flag
 * @returns Mock APIGatewayProxyEventV2 object
 */
export const createApiEvent = (
  routeKey: string,
  overrides: Partial<Pick<APIGatewayProxyEventV2, 'body' | 'headers' | 'queryStringParameters' | 'isBase64Encoded'>> = {}
): APIGatewayProxyEventV2 => {
  const [method, path] = routeKey.split(' ');
  return {
    version: '2.0',
    routeKey,
    rawPath: path,
    rawQueryString: '',
    headers: overrides.headers ?? {},
    queryStringParameters: overrides.queryStringParameters,
    body: overrides.body,
    requestContext: {
      accountId: '123456789012',
      apiId: 'test-api-id',
      domainName: 'test-api.execute-api.us-east-1.amazonaws.com',
      domainPrefix: 'test-api',
      http: {
        method,
        path,
        protocol: 'HTTP/1.1',
        sourceIp: '127.0.0.1',
        userAgent: 'test-agent',
      },
      requestId: 'test-request-id',
      routeKey,
      stage: '$default',
      time: '01/Jan/2024:00:00:00 +0000',
      timeEpoch: 1704067200000,
    },
    isBase64Encoded: overrides.isBase64Encoded ?? false,
  };
};

/**
 * Helper function to create a mock Lambda Context
 * @returns Mock Context object
 */
export const createMockContext = (): Context => ({
  callbackWaitsForEmptyEventLoop: false,
  functionName: 'test-function',
  functionVersion: '$LATEST',
  invokedFunctionArn: 'arn:aws:lambda:us-east-1:123456789012:function:test-function',
  memoryLimitInMB: '256',
  awsRequestId: 'test-request-id',
  logGroupName: '/aws/lambda/test-function',
  logStreamName: '2024/01/01/[$LATEST]test-stream',
  getRemainingTimeInMillis: () => 30000,
  done: () => {},
  fail: () => {},
  succeed: () => {},
});

/**
 * Render a solid-colour test image
 */
export const createTestImage = (
  width: number,
  height: number,
  format: 'png' | 'jpeg' = 'png',
  alpha = false
): Promise<Buffer> => {
  const image = sharp({
    create: {
      width,
      height,
      channels: alpha ? 4 : 3,
      background: alpha ? { r: 200, g: 30, b: 30, alpha: 0.5 } : { r: 30, g: 120, b: 200 },
    },
  });
  return (format === 'png' ? image.png() : image.jpeg()).toBuffer();
};
