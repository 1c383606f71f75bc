import { getLogger } from './logger.js';

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity.
 */
class TokenBucket {
    private tokens: number;
    private lastRefill: number;

    constructor(
        private readonly tokensPerSecond: number,
        private readonly maxTokens: number
    ) {
        this.tokens = maxTokens;
        this.lastRefill = Date.now();
    }

    async acquire(): Promise<void> {
        this.refill();

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return;
        }

        // Wait until a token is available
        const waitMs = ((1 - this.tokens) / this.tokensPerSecond) * 1000;
        await sleep(waitMs);
        this.refill();
        this.tokens -= 1;
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

interface RateLimit {
    tokensPerSecond: number;
    maxBurst: number;
}

const DEFAULT_RATE_LIMIT: RateLimit = { tokensPerSecond: 5, maxBurst: 5 };

/**
 * Per-transport rate limit configurations. Catalog hosts are run by
 * libraries and research projects, so stay well below their limits.
 */
const RATE_LIMITS: Record<string, RateLimit> = {
    sru: { tokensPerSecond: 5, maxBurst: 5 },
    sparql: { tokensPerSecond: 5, maxBurst: 5 },
    cerl: { tokensPerSecond: 5, maxBurst: 5 },
    download: { tokensPerSecond: 1, maxBurst: 1 },
};

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    headers?: Record<string, string>;
    timeout?: number;
    source?: string;  // For per-source rate limiting
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse<T = unknown> {
    status: number;
    headers: Record<string, string>;
    data: T;
    ok: boolean;
}

/**
 * HTTP error with classification.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    email?: string;
}

/**
 * Centralized HTTP client with per-source rate limiting and retry logic.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private requestCounts = new Map<string, number>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;

    constructor(options?: HttpClientOptions) {
        this.defaultTimeout = options?.timeout ?? 30000;
        const version = options?.version ?? '0.1.0';
        this.userAgent = options?.email
            ? `CatalogExplorer/${version} (mailto:${options.email})`
            : `CatalogExplorer/${version}`;
    }

    /**
     * Make a GET request with rate limiting and retry. JSON bodies
     * (any `json` content type, including SPARQL results) are parsed,
     * everything else is returned as text.
     */
    async request<T = unknown>(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<T>> {
        const response = await this.send(url, options);

        const contentType = response.headers.get('content-type') ?? '';
        const data = contentType.includes('json')
            ? ((await response.json()) as T)
            : ((await response.text()) as T);

        return { status: response.status, headers: collectHeaders(response), data, ok: true };
    }

    /**
     * Convenience method for GET requests.
     */
    async get<T = unknown>(url: string, options?: HttpRequestOptions): Promise<HttpResponse<T>> {
        return this.request<T>(url, options);
    }

    /**
     * GET a binary resource (database files).
     */
    async download(url: string, options?: HttpRequestOptions): Promise<Buffer> {
        const response = await this.send(url, { source: 'download', ...options });
        return Buffer.from(await response.arrayBuffer());
    }

    /**
     * Get request count for a source.
     */
    getRequestCount(source: string): number {
        return this.requestCounts.get(source) ?? 0;
    }

    /**
     * Get all request counts.
     */
    getAllRequestCounts(): Record<string, number> {
        return Object.fromEntries(this.requestCounts.entries());
    }

    /**
     * Reset request counts.
     */
    resetCounts(): void {
        this.requestCounts.clear();
    }

    private async send(url: string, options: HttpRequestOptions): Promise<Response> {
        const {
            headers = {},
            timeout = this.defaultTimeout,
            source = 'default',
        } = options;

        // Acquire rate limit token
        await this.getBucket(source).acquire();

        // Track request count
        this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...headers,
        };

        // Retry loop
        const maxRetries = 3;
        const initialBackoff = 1000;
        const maxBackoff = 30000;

        for (let attempt = 0; attempt <= maxRetries; attempt++) {
            try {
                const controller = new AbortController();
                const timeoutId = setTimeout(() => controller.abort(), timeout);

                const response = await fetch(url, {
                    headers: requestHeaders,
                    signal: controller.signal,
                });

                clearTimeout(timeoutId);

                if (!response.ok) {
                    const retryable = RETRYABLE_STATUS_CODES.has(response.status);

                    if (retryable && attempt < maxRetries) {
                        const retryAfter = this.parseRetryAfter(response.headers.get('retry-after'));
                        const backoff = retryAfter ?? this.calculateBackoff(attempt, initialBackoff, maxBackoff);

                        getLogger().warn(
                            { status: response.status, attempt: attempt + 1, backoffMs: backoff, url },
                            `Retryable HTTP error, backing off`
                        );
                        await sleep(backoff);
                        continue;
                    }

                    throw new HttpError(
                        `HTTP ${response.status}: ${response.statusText}`,
                        response.status,
                        retryable,
                        await response.text()
                    );
                }

                return response;
            } catch (error) {
                if (error instanceof HttpError) throw error;

                const code = errorCode(error);
                const retryable = code ? RETRYABLE_ERROR_CODES.has(code) : false;

                if (retryable && attempt < maxRetries) {
                    const backoff = this.calculateBackoff(attempt, initialBackoff, maxBackoff);
                    getLogger().warn(
                        { errorCode: code, attempt: attempt + 1, backoffMs: backoff, url },
                        `Retryable network error, backing off`
                    );
                    await sleep(backoff);
                    continue;
                }

                if (error instanceof Error && error.name === 'AbortError') {
                    throw new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
                }

                throw new HttpError(
                    `Network error: ${error instanceof Error ? error.message : String(error)}`,
                    0,
                    retryable
                );
            }
        }

        throw new HttpError(`Max retries exceeded for ${url}`, 0, false);
    }

    private getBucket(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            const config = RATE_LIMITS[source] ?? DEFAULT_RATE_LIMIT;
            bucket = new TokenBucket(config.tokensPerSecond, config.maxBurst);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }

    private parseRetryAfter(header: string | null): number | null {
        if (!header) return null;

        // Try parsing as seconds
        const seconds = parseInt(header, 10);
        if (!isNaN(seconds)) return seconds * 1000;

        // Try parsing as HTTP date
        const date = new Date(header);
        if (!isNaN(date.getTime())) {
            return Math.max(0, date.getTime() - Date.now());
        }

        return null;
    }

    private calculateBackoff(attempt: number, initial: number, max: number): number {
        // Exponential backoff with jitter
        const exponential = initial * Math.pow(2, attempt);
        const jitter = Math.random() * exponential * 0.5;
        return Math.min(max, exponential + jitter);
    }
}

function collectHeaders(response: Response): Record<string, string> {
    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
        headers[key] = value;
    });
    return headers;
}

/**
 * Node's fetch reports socket failures as a TypeError whose `cause`
 * carries the errno code.
 */
function errorCode(error: unknown): string | undefined {
    for (const candidate of [error, error instanceof Error ? error.cause : undefined]) {
        if (typeof candidate === 'object' && candidate !== null && 'code' in candidate) {
            const { code } = candidate;
            if (typeof code === 'string') return code;
        }
    }
    return undefined;
}

/**
 * Sleep for the specified number of milliseconds.
 */
function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Singleton HTTP client instance.
 */
let clientInstance: HttpClient | null = null;

/**
 * Get the shared HTTP client instance.
 */
export function getHttpClient(options?: HttpClientOptions): HttpClient {
    if (!clientInstance) {
        clientInstance = new HttpClient(options);
    }
    return clientInstance;
}

/**
 * Create a new HTTP client (for testing or custom configuration).
 */
export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}
