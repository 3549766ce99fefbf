// ---------------------------------------------------------------------------
// Sync Runner
// Declare datasource → coordinate → batched submission
// ---------------------------------------------------------------------------

import { GleanApiError, type GleanClient } from "@/lib/glean/client";
import type { DatasourceDefinition } from "@/lib/glean/types";
import type { SyncLogger } from "@/lib/monitoring/sync-logger";
import type { SyncCoordinator } from "./coordinator";
import type { SyncOutcome } from "./types";

export const DEFAULT_BATCH_SIZE = 100;

export type IndexWriter = Pick<GleanClient, "declareDatasource" | "indexDocuments">;

export interface RunSyncOptions {
	coordinator: Pick<SyncCoordinator, "run">;
	index: IndexWriter;
	datasource: DatasourceDefinition;
	batchSize?: number;
	logger: SyncLogger;
}

export class IndexSubmissionError extends Error {
	constructor(
		public readonly batchIndex: number,
		cause: unknown,
	) {
		super(
			`Index submission failed at batch ${batchIndex}: ${cause instanceof Error ? cause.message : String(cause)}`,
			{ cause },
		);
		this.name = "IndexSubmissionError";
	}
}

/**
 * One full sync: the datasource is declared before anything is submitted,
 * so a declaration failure propagates without touching the source.
 */
export async function runSync(options: RunSyncOptions, since?: string): Promise<SyncOutcome> {
	const { coordinator, index, datasource, logger } = options;
	const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;

	logger.info("Declaring datasource", { datasource: datasource.name });
	await index.declareDatasource(datasource);

	const outcome = await coordinator.run(since);
	const { documents } = outcome;

	if (documents.length === 0) {
		logger.info("Nothing to sync", { runId: outcome.report.runId });
		return outcome;
	}

	const batches = Math.ceil(documents.length / batchSize);
	logger.info("Submission started", { documents: documents.length, batches });

	for (let batchIndex = 0; batchIndex < batches; batchIndex++) {
		const batch = documents.slice(batchIndex * batchSize, (batchIndex + 1) * batchSize);
		try {
			await index.indexDocuments(datasource.name, batch);
		} catch (error) {
			logger.error("Submission failed", error, {
				batchIndex,
				batchSize: batch.length,
				...(error instanceof GleanApiError && { status: error.status, details: error.details() }),
			});
			throw new IndexSubmissionError(batchIndex, error);
		}
		logger.debug("Submitted batch", { batchIndex, count: batch.length });
	}

	logger.info("Submission finished", { documents: documents.length, batches });
	return outcome;
}
