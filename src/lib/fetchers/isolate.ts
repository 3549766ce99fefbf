// ---------------------------------------------------------------------------
// Enrichment call isolation
// ---------------------------------------------------------------------------

import type { SyncLogger } from "../monitoring/sync-logger";
import type { RawRecord } from "./types";

/**
 * Run one supplementary lookup. A failure is logged at warning level and
 * yields an empty list so sibling lookups and records are unaffected.
 */
export async function lookupOrEmpty(
	logger: SyncLogger,
	description: string,
	lookup: () => Promise<RawRecord[]>,
	data?: Record<string, unknown>,
): Promise<RawRecord[]> {
	try {
		return await lookup();
	} catch (error) {
		logger.warn(`Enrichment lookup failed: ${description}`, {
			...data,
			error: error instanceof Error ? error.message : String(error),
		});
		return [];
	}
}
