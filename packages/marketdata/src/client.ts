/**
 * Base REST Client with Rate Limiting and Retry Logic
 *
 * HTTP foundation for the provider adapters:
 * - Rate limiting (token bucket)
 * - Optional retry with exponential backoff
 * - Per-request timeout via AbortController
 * - Error classification into ApiError
 */

import { redactUrl } from "@eodgex/logger";
import type { z } from "zod";
import { log } from "./logger.js";

// ============================================
// Types
// ============================================

export interface RateLimitConfig {
	/** Maximum requests per interval */
	maxRequests: number;
	/** Interval in milliseconds */
	intervalMs: number;
}

export interface RetryConfig {
	/** Retries after the first attempt; 0 fails fast */
	maxRetries: number;
	initialDelayMs: number;
	maxDelayMs: number;
	backoffMultiplier: number;
}

export interface ClientConfig {
	baseUrl: string;
	/** Sent as a bearer token on every request */
	apiKey?: string;
	rateLimit?: RateLimitConfig;
	retry?: RetryConfig;
	timeoutMs?: number;
	headers?: Record<string, string>;
}

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface RequestOptions {
	params?: QueryParams;
	headers?: Record<string, string>;
	/** Override the client timeout */
	timeoutMs?: number;
}

// ============================================
// Errors
// ============================================

/**
 * Classified failure of a provider request. `status` is 0 for transport
 * failures (timeout, network, validation) and the HTTP status otherwise.
 */
export class ApiError extends Error {
	constructor(
		message: string,
		public readonly status: number,
		public readonly statusText: string,
		public readonly retryable: boolean,
		public readonly body?: string
	) {
		super(message);
		this.name = "ApiError";
	}

	get isUnauthorized(): boolean {
		return this.status === 401;
	}

	get isTimeout(): boolean {
		return this.status === 0 && this.statusText === "Timeout";
	}
}

const RETRYABLE_STATUSES = new Set([408, 429, 500, 502, 503, 504]);

// ============================================
// Default Configuration
// ============================================

export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
	maxRequests: 100,
	intervalMs: 60_000,
};

export const DEFAULT_RETRY: RetryConfig = {
	maxRetries: 3,
	initialDelayMs: 1000,
	maxDelayMs: 30_000,
	backoffMultiplier: 2,
};

export const NO_RETRY: RetryConfig = {
	maxRetries: 0,
	initialDelayMs: 0,
	maxDelayMs: 0,
	backoffMultiplier: 1,
};

export const DEFAULT_TIMEOUT_MS = 30_000;

// ============================================
// Rate Limiter
// ============================================

/**
 * Token bucket rate limiter.
 */
export class RateLimiter {
	private tokens: number;
	private lastRefill: number;

	constructor(private config: RateLimitConfig) {
		this.tokens = config.maxRequests;
		this.lastRefill = Date.now();
	}

	/**
	 * Take a token, waiting for the next refill when the bucket is empty.
	 */
	async acquire(): Promise<void> {
		this.refill();

		if (this.tokens > 0) {
			this.tokens--;
			return;
		}

		const waitTime = this.config.intervalMs - (Date.now() - this.lastRefill);
		if (waitTime > 0) {
			await sleep(waitTime);
		}
		this.refill();
		this.tokens--;
	}

	private refill(): void {
		const now = Date.now();
		if (now - this.lastRefill >= this.config.intervalMs) {
			this.tokens = this.config.maxRequests;
			this.lastRefill = now;
		}
	}
}

// ============================================
// Base REST Client
// ============================================

export class RestClient {
	private rateLimiter?: RateLimiter;
	private config: ClientConfig & { timeoutMs: number; retry: RetryConfig };

	constructor(config: ClientConfig) {
		this.config = {
			...config,
			timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
			retry: config.retry ?? DEFAULT_RETRY,
		};

		if (config.rateLimit) {
			this.rateLimiter = new RateLimiter(config.rateLimit);
		}
	}

	/**
	 * GET `path` and validate the JSON body against `schema`.
	 *
	 * @throws {ApiError} on HTTP, transport or validation failure once retries are exhausted
	 */
	async request<S extends z.ZodTypeAny>(path: string, options: RequestOptions, schema: S): Promise<z.output<S>> {
		const url = this.buildUrl(path, options.params);
		const headers = this.buildHeaders(options.headers);
		const timeout = options.timeoutMs ?? this.config.timeoutMs;
		const retryConfig = this.config.retry;
		const loggedUrl = redactUrl(url);

		let lastError: ApiError | undefined;
		const startTime = Date.now();

		log.debug({ url: loggedUrl, timeout }, "Market data API request");

		for (let attempt = 0; attempt <= retryConfig.maxRetries; attempt++) {
			if (this.rateLimiter) {
				await this.rateLimiter.acquire();
			}

			try {
				const response = await this.executeRequest(url, headers, timeout);

				const data: unknown = await response.json();

				log.debug(
					{ url: loggedUrl, status: response.status, latencyMs: Date.now() - startTime },
					"Market data API response"
				);

				return schema.parse(data);
			} catch (error) {
				lastError = classifyError(error);

				if (!lastError.retryable || attempt >= retryConfig.maxRetries) {
					log.debug(
						{
							url: loggedUrl,
							status: lastError.status,
							error: lastError.message,
							latencyMs: Date.now() - startTime,
						},
						"Market data API error"
					);
					throw lastError;
				}

				const delay = Math.min(
					retryConfig.initialDelayMs * retryConfig.backoffMultiplier ** attempt,
					retryConfig.maxDelayMs
				);

				log.warn(
					{ url: loggedUrl, attempt: attempt + 1, delayMs: delay, error: lastError.message },
					"Market data API retry"
				);

				await sleep(delay);
			}
		}

		throw lastError ?? new ApiError("Request failed", 0, "Unknown", false);
	}

	async get<S extends z.ZodTypeAny>(
		path: string,
		params: QueryParams,
		schema: S,
		options?: Omit<RequestOptions, "params">
	): Promise<z.output<S>> {
		return this.request(path, { ...options, params }, schema);
	}

	private async executeRequest(url: string, headers: Record<string, string>, timeout: number): Promise<Response> {
		const controller = new AbortController();
		const timeoutId = setTimeout(() => controller.abort(), timeout);

		try {
			const response = await fetch(url, {
				method: "GET",
				headers,
				signal: controller.signal,
			});

			if (!response.ok) {
				const body = await response.text().catch(() => "");
				throw new ApiError(
					body || response.statusText,
					response.status,
					response.statusText,
					RETRYABLE_STATUSES.has(response.status),
					body
				);
			}

			return response;
		} finally {
			clearTimeout(timeoutId);
		}
	}

	/**
	 * Resolve `path` against the base URL, keeping any path the base URL has.
	 */
	private buildUrl(path: string, params?: QueryParams): string {
		const base = this.config.baseUrl.endsWith("/") ? this.config.baseUrl : `${this.config.baseUrl}/`;
		const url = new URL(path.replace(/^\//, ""), base);

		if (params) {
			for (const [key, value] of Object.entries(params)) {
				if (value !== undefined) {
					url.searchParams.set(key, String(value));
				}
			}
		}

		return url.toString();
	}

	private buildHeaders(additional?: Record<string, string>): Record<string, string> {
		const headers: Record<string, string> = {
			Accept: "application/json",
			...this.config.headers,
			...additional,
		};

		if (this.config.apiKey) {
			headers.Authorization = `Bearer ${this.config.apiKey}`;
		}

		return headers;
	}
}

// ============================================
// Helpers
// ============================================

/**
 * Classify an error as retryable or not.
 */
export function classifyError(error: unknown): ApiError {
	if (error instanceof ApiError) {
		return error;
	}

	if (error instanceof Error) {
		if (error.name === "AbortError") {
			return new ApiError("Request timed out", 0, "Timeout", true);
		}

		if (error.name === "ZodError") {
			return new ApiError(error.message, 0, "Validation Error", false);
		}

		if (error.name === "SyntaxError") {
			return new ApiError(error.message, 0, "Invalid JSON", false);
		}

		return new ApiError(error.message, 0, "Network Error", true);
	}

	return new ApiError(String(error), 0, "Unknown", false);
}

function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

export function createRestClient(config: ClientConfig): RestClient {
	return new RestClient(config);
}
