// src/services/fetcher.ts
import axios, { type AxiosResponse } from 'axios';

export class FetchError extends Error {
    constructor(
        message: string,
        public readonly url: string,
        public readonly status?: number,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'FetchError';
    }
}

export interface FetchedDocument {
    data: Buffer;
    contentType?: string;
}

export interface FetchOptions {
    // 0 disables the timeout.
    timeoutMs?: number;
}

export type DocumentFetcher = (url: string, options?: FetchOptions) => Promise<FetchedDocument>;

/**
 * Downloads a document in a single attempt.
 * @throws {FetchError} on a transport failure or any non-2xx response.
 */
export const fetchDocument: DocumentFetcher = async (url, options = {}) => {
    let response: AxiosResponse<ArrayBuffer>;
    try {
        response = await axios.get<ArrayBuffer>(url, {
            responseType: 'arraybuffer',
            timeout: options.timeoutMs ?? 0,
            validateStatus: () => true,
        });
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new FetchError(`Failed to fetch ${url}: ${reason}`, url, undefined, { cause: error });
    }

    if (response.status < 200 || response.status >= 300) {
        throw new FetchError(`Failed to fetch ${url}: HTTP ${response.status}`, url, response.status);
    }

    const contentType = response.headers['content-type'];
    return {
        data: Buffer.from(response.data),
        contentType: typeof contentType === 'string' ? contentType : undefined,
    };
};
