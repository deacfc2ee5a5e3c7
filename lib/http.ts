import type { ReadableStream } from 'node:stream/web';
import { fetch, type Dispatcher, type Response } from 'undici';
import { getErrorMessage } from './util.js';

export const APPLICATION_JSON = 'application/json';
export const APPLICATION_TAR = 'application/x-tar';

// Base class for non-2xx engine responses
export class DockerApiError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number,
    ) {
        super(message);
        this.name = 'DockerApiError';
    }
}

// Custom error class for 404 Not Found responses
export class NotFoundError extends DockerApiError {
    constructor(message: string) {
        super(message, 404);
        this.name = 'NotFoundError';
    }
}

// Custom error class for 401 Unauthorized responses
export class UnauthorizedError extends DockerApiError {
    constructor(message: string) {
        super(message, 401);
        this.name = 'UnauthorizedError';
    }
}

// Custom error class for 409 Conflict responses
export class ConflictError extends DockerApiError {
    constructor(message: string) {
        super(message, 409);
        this.name = 'ConflictError';
    }
}

export type QueryValue = string | number | boolean | undefined | null;
export type QueryParams = Record<string, QueryValue>;

// Extract the engine's error message from a failed response body
async function errorMessageFromResponse(response: Response): Promise<string> {
    const fallback = `${response.status} ${response.statusText}`.trim();
    let body: string;
    try {
        body = await response.text();
    } catch (error) {
        return `${fallback} (${getErrorMessage(error) ?? 'unreadable body'})`;
    }
    const contentType = response.headers.get('content-type')?.toLowerCase();
    if (contentType?.includes(APPLICATION_JSON) && body) {
        try {
            const json: unknown = JSON.parse(body);
            if (
                json !== null &&
                typeof json === 'object' &&
                'message' in json &&
                typeof json.message === 'string'
            ) {
                return json.message;
            }
        } catch {
            return body;
        }
    }
    return body.trim() || fallback;
}

/**
 * Map a non-2xx response to the matching error
 */
export async function checkResponse(response: Response): Promise<Response> {
    if (response.ok) {
        return response;
    }
    const message = await errorMessageFromResponse(response);
    switch (response.status) {
        case 401:
            throw new UnauthorizedError(message);
        case 404:
            throw new NotFoundError(message);
        case 409:
            throw new ConflictError(message);
        default:
            throw new DockerApiError(message, response.status);
    }
}

/**
 * HTTPClient sends requests to the engine API through an undici dispatcher,
 * which decides how the connection is made (unix socket, TCP, TLS, SSH).
 */
export class HTTPClient {
    private readonly headers: Record<string, string>;
    private readonly baseUrl = 'http://localhost:2375';

    constructor(
        private readonly dispatcher: Dispatcher,
        userAgent: string,
        headers?: Record<string, string>,
    ) {
        this.headers = { ...headers, 'User-Agent': userAgent };
    }

    close(): Promise<void> {
        return this.dispatcher.close();
    }

    private url(uri: string, params?: QueryParams): string {
        const searchParams = new URLSearchParams();
        Object.entries(params ?? {}).forEach(([key, value]) => {
            if (value !== undefined && value !== null) {
                searchParams.append(key, String(value));
            }
        });
        const queryString = searchParams.toString();
        return `${this.baseUrl}${uri}${queryString ? `?${queryString}` : ''}`;
    }

    public async head(uri: string, params?: QueryParams): Promise<Response> {
        return fetch(this.url(uri, params), {
            method: 'HEAD',
            headers: this.headers,
            dispatcher: this.dispatcher,
        }).then(checkResponse);
    }

    public async post(
        uri: string,
        params?: QueryParams,
        data?: object | ReadableStream<Uint8Array>,
        options?: {
            headers?: Record<string, string>;
            signal?: AbortSignal;
        },
    ): Promise<Response> {
        const requestHeaders: Record<string, string> = {
            'Content-Type': APPLICATION_JSON,
            ...options?.headers,
            ...this.headers,
        };
        let body: ReadableStream<Uint8Array> | string = '';
        if (data) {
            body = isReadableStream(data) ? data : JSON.stringify(data);
        }

        return fetch(this.url(uri, params), {
            method: 'POST',
            headers: requestHeaders,
            body: body,
            duplex: 'half',
            dispatcher: this.dispatcher,
            signal: options?.signal,
        }).then(checkResponse);
    }
}

function isReadableStream(
    data: object,
): data is ReadableStream<Uint8Array> {
    return 'getReader' in data && typeof data.getReader === 'function';
}
