import axios, { type AxiosInstance } from 'axios';
import * as rax from 'retry-axios';
import { Logger } from '../utils/logger';

export interface HttpClientOptions {
    baseURL?: string;
    timeoutMs: number;
    retries: number;
    backoffMs?: number;
    userAgent: string;
    auth?: { username: string; password: string };
}

/**
 * Axios instance with bounded retries on network errors, 429 and 5xx.
 * This is the only place in the project that retries.
 */
export function createHttpClient(options: HttpClientOptions): AxiosInstance {
    const client = axios.create({
        baseURL: options.baseURL,
        timeout: options.timeoutMs,
        auth: options.auth,
        headers: {
            'User-Agent': options.userAgent,
            'Accept': 'application/json, text/html;q=0.9, text/csv;q=0.8, */*;q=0.5',
            'Accept-Language': 'en-GB,en;q=0.9',
        },
    });

    client.defaults.raxConfig = {
        instance: client,
        retry: options.retries,
        noResponseRetries: options.retries,
        retryDelay: options.backoffMs ?? 1000,
        httpMethodsToRetry: ['GET', 'HEAD', 'OPTIONS'],
        statusCodesToRetry: [[429, 429], [500, 599]],
        backoffType: 'exponential',
        onRetryAttempt: (err) => {
            const cfg = rax.getConfig(err);
            Logger.warn(`[HTTP] Retry #${cfg?.currentRetryAttempt ?? '?'} for ${err.config?.url ?? 'request'}`, {
                status: err.response?.status,
            });
        },
    };
    rax.attach(client);
    return client;
}

export function isNotFound(err: unknown): boolean {
    return axios.isAxiosError(err) && err.response?.status === 404;
}
