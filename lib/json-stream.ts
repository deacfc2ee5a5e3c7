import type { Response } from 'undici';
import { createLogger } from './logger.js';
import { getErrorMessage } from './util.js';

const log = createLogger('json-stream');

// jsonMessages reads a newline-delimited JSON response body and yields each parsed message.
// Lines that are not valid JSON are logged and skipped.
export async function* jsonMessages<T>(
    response: Response,
): AsyncGenerator<T, void, undefined> {
    if (!response.body) {
        throw new Error('No response body');
    }

    // Extract charset from Content-Type header, default to utf-8
    const contentType = response.headers.get('content-type') || '';
    const charsetMatch = contentType.match(/charset=([^;]+)/i);
    const charset = charsetMatch?.[1]?.trim() || 'utf-8';

    const reader = response.body.getReader();
    const decoder = new TextDecoder(charset);
    let buffer = '';

    const parse = (line: string): T | undefined => {
        try {
            return JSON.parse(line) as T;
        } catch (error) {
            log.warn('skipping malformed JSON line', {
                line,
                error: getErrorMessage(error),
            });
            return undefined;
        }
    };

    try {
        while (true) {
            const { done, value } = await reader.read();
            if (done) {
                break;
            }

            buffer += decoder.decode(value, { stream: true });
            const lines = buffer.split('\n');
            buffer = lines.pop() || ''; // Keep the last incomplete line in buffer

            for (const line of lines) {
                const trimmed = line.trim();
                if (trimmed === '') continue;
                const message = parse(trimmed);
                if (message !== undefined) {
                    yield message;
                }
            }
        }

        buffer += decoder.decode();
        if (buffer.trim() !== '') {
            const message = parse(buffer.trim());
            if (message !== undefined) {
                yield message;
            }
        }
    } finally {
        reader.releaseLock();
    }
}
