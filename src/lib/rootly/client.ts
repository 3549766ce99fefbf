// ---------------------------------------------------------------------------
// Rootly API: HTTP Client
// Bearer auth, throttling (p-throttle), opt-in retry (p-retry), per-call timeout
// ---------------------------------------------------------------------------

import type { SyncLogger } from "@/lib/monitoring/sync-logger";
import pRetry, { AbortError } from "p-retry";
import pThrottle from "p-throttle";
import type { z } from "zod";
import {
	ListEnvelopeSchema,
	type RawRecord,
	RawRecordSchema,
	ResourceEnvelopeSchema,
} from "./schemas";
import type { ListPageQuery, QueryParams } from "./types";

export interface RootlyClientOptions {
	baseUrl: string;
	apiToken: string;
	/** Requests per second (default: 5) */
	rateLimit?: number;
	/** Retries on 5xx/429/network errors (default: 0, a failed call is final) */
	maxRetries?: number;
	/** Per-call timeout in milliseconds (default: 30000) */
	timeoutMs?: number;
	/** Receives warnings about records dropped at the boundary */
	logger?: SyncLogger;
	/** Custom fetch implementation (for testing) */
	fetchFn?: typeof fetch;
}

export class RootlyApiError extends Error {
	constructor(
		public readonly status: number,
		public readonly statusText: string,
		public readonly body: string,
		public readonly url: string,
	) {
		super(`Rootly API error ${status} (${statusText}) for ${url}`);
		this.name = "RootlyApiError";
	}
}

/**
 * HTTP client for the Rootly REST API (JSON:API).
 *
 * Features:
 * - Bearer token authentication
 * - Rate limiting via p-throttle
 * - Optional retry on 5xx/429/network errors via p-retry; 4xx aborts immediately
 * - Retry-After header support for 429 responses
 * - Zod validation of every response envelope; records without an id are dropped
 */
export class RootlyClient {
	private readonly baseUrl: string;
	private readonly apiToken: string;
	private readonly maxRetries: number;
	private readonly timeoutMs: number;
	private readonly logger?: SyncLogger;
	private readonly fetchFn: typeof fetch;
	private readonly throttledFetch: (url: string, init: RequestInit) => Promise<Response>;

	constructor(options: RootlyClientOptions) {
		if (!options.apiToken) {
			throw new Error("RootlyClient construction error: `apiToken` is required");
		}
		this.baseUrl = options.baseUrl.replace(/\/+$/, "");
		this.apiToken = options.apiToken;
		this.maxRetries = options.maxRetries ?? 0;
		this.timeoutMs = options.timeoutMs ?? 30_000;
		this.logger = options.logger;
		this.fetchFn = options.fetchFn ?? globalThis.fetch;

		const throttle = pThrottle({
			limit: options.rateLimit ?? 5,
			interval: 1000,
		});

		this.throttledFetch = throttle((url: string, init: RequestInit) => this.fetchFn(url, init));
	}

	/**
	 * Fetch one page of a collection endpoint.
	 *
	 * @param endpoint Collection path relative to the base URL, e.g. "incidents"
	 */
	async listPage(endpoint: string, query: ListPageQuery): Promise<RawRecord[]> {
		const envelope = await this.get(endpoint, ListEnvelopeSchema, {
			"page[size]": query.pageSize,
			"page[number]": query.pageNumber,
			updated_after: query.updatedAfter,
			...query.filters,
		});
		return this.toRecords(envelope.data, endpoint);
	}

	/**
	 * Fetch a sub-resource or lookup collection. A single-object `data`
	 * is returned as a one-element array, `null` as an empty one.
	 */
	async getResource(path: string, params?: QueryParams): Promise<RawRecord[]> {
		const envelope = await this.get(path, ResourceEnvelopeSchema, params);
		if (envelope.data === null) return [];
		const items = Array.isArray(envelope.data) ? envelope.data : [envelope.data];
		return this.toRecords(items, path);
	}

	/**
	 * GET a path and validate the JSON body with Zod.
	 * Absent, null and empty-string parameters are left out of the query string.
	 */
	async get<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, params?: QueryParams): Promise<T> {
		const url = this.buildUrl(path, params);

		const response = await pRetry(
			async () => {
				const res = await this.throttledFetch(url, {
					method: "GET",
					headers: {
						Authorization: `Bearer ${this.apiToken}`,
						"Content-Type": "application/vnd.api+json",
						Accept: "application/vnd.api+json",
					},
					signal: AbortSignal.timeout(this.timeoutMs),
				});

				if (res.status === 429) {
					const retryAfter = res.headers.get("Retry-After");
					const delayMs = retryAfter ? Number.parseInt(retryAfter, 10) * 1000 : 5000;
					if (this.maxRetries > 0) await this.delay(delayMs);
					throw new RootlyApiError(res.status, res.statusText, "", url);
				}

				// Auth failures: abort immediately, the token is invalid or lacks permissions
				if (res.status === 401 || res.status === 403) {
					const responseBody = await res.text();
					throw new AbortError(new RootlyApiError(res.status, res.statusText, responseBody, url));
				}

				if (res.status >= 500) {
					const responseBody = await res.text();
					throw new RootlyApiError(res.status, res.statusText, responseBody, url);
				}

				if (!res.ok) {
					const responseBody = await res.text();
					throw new AbortError(new RootlyApiError(res.status, res.statusText, responseBody, url));
				}

				return res;
			},
			{
				retries: this.maxRetries,
				minTimeout: 1000,
				factor: 2,
				randomize: true,
			},
		);

		const json: unknown = await response.json();
		return schema.parse(json);
	}

	private buildUrl(path: string, params?: QueryParams): string {
		const url = new URL(`${this.baseUrl}/${path.replace(/^\/+/, "")}`);
		for (const [key, value] of Object.entries(params ?? {})) {
			if (value === undefined || value === null || value === "") continue;
			if (Array.isArray(value)) {
				for (const item of value) url.searchParams.append(key, item);
			} else {
				url.searchParams.set(key, String(value));
			}
		}
		return url.toString();
	}

	private toRecords(items: unknown[], source: string): RawRecord[] {
		const records: RawRecord[] = [];
		for (const item of items) {
			const parsed = RawRecordSchema.safeParse(item);
			if (parsed.success) {
				records.push(parsed.data);
			} else {
				this.logger?.warn("Dropping record without a usable id", {
					source,
					issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
				});
			}
		}
		return records;
	}

	private delay(ms: number): Promise<void> {
		return new Promise((resolve) => setTimeout(resolve, ms));
	}
}
