// ---------------------------------------------------------------------------
// Fetchers: Shared Types
// ---------------------------------------------------------------------------

import type { RootlyClient } from "../rootly/client";
import type { RawRecord } from "../rootly/schemas";

/** The read-only slice of the source client the fetchers depend on. */
export type SourceReader = Pick<RootlyClient, "listPage" | "getResource">;

/**
 * A fetched record paired with the auxiliary data gathered for it.
 * The record is never modified after fetching.
 */
export interface EnrichedRecord<E> {
	readonly record: RawRecord;
	readonly enrichment: E;
}

export type { RawRecord };
