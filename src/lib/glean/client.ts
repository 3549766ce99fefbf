// ---------------------------------------------------------------------------
// Glean Indexing API: HTTP Client
// Datasource declaration + document upsert, opt-in retry (p-retry)
// ---------------------------------------------------------------------------

import pRetry, { AbortError } from "p-retry";
import type { NormalizedDocument } from "../sync/types";
import type { DatasourceDefinition, WireDocument } from "./types";

export interface GleanClientOptions {
	/** Backend origin, e.g. https://acme-be.glean.com */
	baseUrl: string;
	apiToken: string;
	/** Retries on 5xx/429/network errors (default: 0) */
	maxRetries?: number;
	/** Per-call timeout in milliseconds (default: 30000) */
	timeoutMs?: number;
	/** Custom fetch implementation (for testing) */
	fetchFn?: typeof fetch;
}

export class GleanApiError extends Error {
	constructor(
		public readonly status: number,
		public readonly statusText: string,
		public readonly body: string,
		public readonly url: string,
	) {
		super(`Glean API error ${status} (${statusText}) for ${url}`);
		this.name = "GleanApiError";
	}

	/** Parsed JSON error body, or the raw text when it is not JSON. */
	details(): unknown {
		if (!this.body) return undefined;
		try {
			return JSON.parse(this.body);
		} catch {
			return this.body;
		}
	}
}

/** Map a normalized document onto the indexing API's field names. */
export function toWireDocument(doc: NormalizedDocument): WireDocument {
	return {
		datasource: doc.datasource,
		objectType: doc.objectType,
		id: doc.id,
		title: doc.title,
		viewURL: doc.viewUrl,
		body: { mimeType: doc.body.mimeType, textContent: doc.body.textContent },
		...(doc.summary && {
			summary: { mimeType: doc.summary.mimeType, textContent: doc.summary.textContent },
		}),
		...(doc.author && { author: { ...doc.author } }),
		permissions: { allowAnonymousAccess: doc.permissions.allowAnonymousAccess },
		...(doc.createdAt !== undefined && { createdAt: doc.createdAt }),
		...(doc.updatedAt !== undefined && { updatedAt: doc.updatedAt }),
		...(doc.tags.length > 0 && { tags: [...doc.tags] }),
		...(doc.status !== undefined && { status: doc.status }),
	};
}

/**
 * HTTP client for the Glean Indexing API.
 *
 * Both operations are idempotent upserts: re-declaring a datasource updates it,
 * re-submitting a document replaces the one with the same id.
 */
export class GleanClient {
	private readonly baseUrl: string;
	private readonly apiToken: string;
	private readonly maxRetries: number;
	private readonly timeoutMs: number;
	private readonly fetchFn: typeof fetch;

	constructor(options: GleanClientOptions) {
		if (!options.apiToken) {
			throw new Error("GleanClient construction error: `apiToken` is required");
		}
		this.baseUrl = options.baseUrl.replace(/\/+$/, "");
		this.apiToken = options.apiToken;
		this.maxRetries = options.maxRetries ?? 0;
		this.timeoutMs = options.timeoutMs ?? 30_000;
		this.fetchFn = options.fetchFn ?? globalThis.fetch;
	}

	async declareDatasource(definition: DatasourceDefinition): Promise<void> {
		await this.post("/api/index/v1/adddatasource", definition);
	}

	async indexDocuments(datasource: string, documents: NormalizedDocument[]): Promise<void> {
		await this.post("/api/index/v1/indexdocuments", {
			datasource,
			documents: documents.map(toWireDocument),
		});
	}

	private async post(path: string, body: unknown): Promise<void> {
		const url = `${this.baseUrl}${path}`;

		await pRetry(
			async () => {
				const res = await this.fetchFn(url, {
					method: "POST",
					headers: {
						Authorization: `Bearer ${this.apiToken}`,
						"Content-Type": "application/json",
						Accept: "application/json",
					},
					body: JSON.stringify(body),
					signal: AbortSignal.timeout(this.timeoutMs),
				});

				// Auth failures: abort immediately, the token is invalid or lacks the indexing scope
				if (res.status === 401 || res.status === 403) {
					const responseBody = await res.text();
					throw new AbortError(new GleanApiError(res.status, res.statusText, responseBody, url));
				}

				if (res.status === 429 || res.status >= 500) {
					const responseBody = await res.text();
					throw new GleanApiError(res.status, res.statusText, responseBody, url);
				}

				if (!res.ok) {
					const responseBody = await res.text();
					throw new AbortError(new GleanApiError(res.status, res.statusText, responseBody, url));
				}
			},
			{
				retries: this.maxRetries,
				minTimeout: 1000,
				factor: 2,
				randomize: true,
			},
		);
	}
}
