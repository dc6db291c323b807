import { APIGatewayProxyStructuredResultV2 } from "aws-lambda";
import { errorMessage, isJobError } from "./errors";

/**
 * CORS Headers
 *
 * The resize API is called from browsers and scripts alike, so any origin is
 * accepted. Narrow this when the API sits behind a known frontend.
 */
const CORS_HEADERS = {
    'Access-Control-Allow-Origin': '*',
};

export type ErrorStatusCode = 400 | 500 | 502;
const ERROR_STATUS_CODE_MESSAGE_MAP: Record<ErrorStatusCode, string> = {
    400: 'Bad request',
    500: 'Internal server error',
    502: 'Bad gateway',
};

/**
 * Create a standardized error response
 * Logs the error message and optional error object to console
 * @param statusCode HTTP status code for the error
 * @param message Detailed error message; can be string or Error object
 * @param error Optional error object for raw logging
 * @returns Standardized error response object
 */
export function createErrorResponse(
    statusCode: ErrorStatusCode,
    message: string | Error | unknown,
    error?: unknown
): APIGatewayProxyStructuredResultV2 {
    const _message = errorMessage(message);
    if (error)
        console.error(`${_message}:`, error);
    else
        console.error(`${_message}`);
    return {
        statusCode,
        headers: {
            'Content-Type': 'application/json',
            ...CORS_HEADERS,
        },
        body: JSON.stringify({ error: ERROR_STATUS_CODE_MESSAGE_MAP[statusCode], message: _message }),
    };
}

/**
 * Map a thrown job error onto its HTTP status
 * InvalidInput is the caller's fault (400), StorageError is S3 failing
 * underneath us (502), everything else is ours (500).
 */
export function createJobErrorResponse(error: unknown): APIGatewayProxyStructuredResultV2 {
    if (isJobError(error)) {
        switch (error.kind) {
            case 'InvalidInput':
                return createErrorResponse(400, error);
            case 'StorageError':
                return createErrorResponse(502, error, error.cause);
            default:
                return createErrorResponse(500, error, error.cause);
        }
    }
    return createErrorResponse(500, error, error);
}

/**
 * Create a standardized success response
 * If no data is provided, returns 204 No Content else 200 OK with data
 * @param data Optional data to include in the response body as JSON
 * @returns Standardized success response object
 */
export function createSuccessResponse(
    data?: unknown
): APIGatewayProxyStructuredResultV2 {
    const hasBody = data !== undefined;
    return {
        statusCode: hasBody ? 200 : 204,
        headers: {
            ...(hasBody ? { 'Content-Type': 'application/json' } : {}),
            ...CORS_HEADERS,
        },
        body: hasBody ? JSON.stringify(data) : undefined,
    };
}
