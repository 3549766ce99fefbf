// ---------------------------------------------------------------------------
// Rootly Client Factory
// Creates a configured RootlyClient from validated environment configuration
// ---------------------------------------------------------------------------

import type { AppConfig } from "../config";
import type { SyncLogger } from "../monitoring/sync-logger";
import { RootlyClient } from "./client";

export function createRootlyClient(config: AppConfig, logger?: SyncLogger): RootlyClient {
	return new RootlyClient({
		baseUrl: config.ROOTLY_API_BASE_URL,
		apiToken: config.ROOTLY_API_TOKEN,
		rateLimit: config.SOURCE_RATE_LIMIT,
		maxRetries: config.SOURCE_MAX_RETRIES,
		timeoutMs: config.HTTP_TIMEOUT_MS,
		logger,
	});
}
