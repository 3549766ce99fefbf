// ---------------------------------------------------------------------------
// Paginated Fetcher
// Walks a collection endpoint page by page, partial results on failure
// ---------------------------------------------------------------------------

import type { SyncLogger } from "../monitoring/sync-logger";
import type { RawRecord, SourceReader } from "./types";

export const DEFAULT_MAX_PAGES = 10;

export interface PaginationOptions {
	/** ISO-8601 modification-time filter */
	updatedAfter?: string;
	/** Upper bound on returned records; unbounded when absent */
	maxItems?: number;
	pageSize: number;
	/** Safety cap on requested pages (default: 10) */
	maxPages?: number;
}

/**
 * Fetch every page of `endpoint` until an empty page, the item cap or the
 * page cap. A failed page ends pagination; the records gathered so far are
 * returned and the failure is logged, never thrown.
 */
export async function fetchPaginated(
	source: SourceReader,
	endpoint: string,
	options: PaginationOptions,
	logger: SyncLogger,
): Promise<RawRecord[]> {
	const { updatedAfter, maxItems, pageSize } = options;
	const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
	const records: RawRecord[] = [];

	logger.info("Fetch started", { endpoint, updatedAfter, maxItems, pageSize });

	let pageNumber = 1;
	while (pageNumber <= maxPages) {
		const remaining = maxItems === undefined ? pageSize : maxItems - records.length;
		if (remaining <= 0) break;

		let page: RawRecord[];
		try {
			page = await source.listPage(endpoint, {
				pageSize: Math.min(pageSize, remaining),
				pageNumber,
				updatedAfter,
			});
		} catch (error) {
			logger.error("Page fetch failed, keeping partial results", error, {
				endpoint,
				pageNumber,
				fetched: records.length,
			});
			break;
		}

		if (page.length === 0) break;
		records.push(...page);
		logger.debug("Fetched page", { endpoint, pageNumber, count: page.length });
		pageNumber++;
	}

	if (pageNumber > maxPages && (maxItems === undefined || records.length < maxItems)) {
		logger.warn("Page safety cap reached", { endpoint, maxPages });
	}

	const result = maxItems === undefined ? records : records.slice(0, maxItems);
	logger.info("Fetch finished", { endpoint, count: result.length });
	return result;
}
