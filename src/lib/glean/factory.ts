// ---------------------------------------------------------------------------
// Glean Client Factory
// ---------------------------------------------------------------------------

import type { AppConfig } from "../config";
import { GleanClient } from "./client";

/** Create a GleanClient for the configured backend host. */
export function createGleanClient(config: AppConfig): GleanClient {
	return new GleanClient({
		baseUrl: `https://${config.GLEAN_API_HOST}`,
		apiToken: config.GLEAN_API_TOKEN,
		maxRetries: config.INDEX_MAX_RETRIES,
		timeoutMs: config.HTTP_TIMEOUT_MS,
	});
}
