// ---------------------------------------------------------------------------
// Sync Coordinator
// Per entity kind: fetch → enrich → map, isolated; then cross-type dedup
// ---------------------------------------------------------------------------

import type { SyncLogger } from "@/lib/monitoring/sync-logger";
import type { EntityKind } from "@/lib/rootly/types";
import { v4 as uuidv4 } from "uuid";
import type { EntityPipeline } from "./pipelines";
import type { EntityRunState, EntitySyncResult, NormalizedDocument, SyncOutcome, SyncReport } from "./types";

export interface SyncCoordinatorOptions {
	pipelines: EntityPipeline[];
	logger: SyncLogger;
}

export interface DedupResult {
	documents: NormalizedDocument[];
	duplicatesRemoved: number;
}

/**
 * Drop every document whose id was already seen, keeping first-seen order.
 * Each drop is logged.
 */
export function dedupeDocuments(documents: NormalizedDocument[], logger: SyncLogger): DedupResult {
	const seen = new Set<string>();
	const unique: NormalizedDocument[] = [];
	let duplicatesRemoved = 0;

	for (const doc of documents) {
		if (seen.has(doc.id)) {
			duplicatesRemoved++;
			logger.warn("Dropping duplicate document", { recordId: doc.id, objectType: doc.objectType });
			continue;
		}
		seen.add(doc.id);
		unique.push(doc);
	}

	return { documents: unique, duplicatesRemoved };
}

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Runs every entity pipeline in order. A failure inside one pipeline is
 * recorded as that kind's `error` result; remaining kinds still run.
 */
export class SyncCoordinator {
	private readonly pipelines: EntityPipeline[];
	private readonly logger: SyncLogger;

	constructor(options: SyncCoordinatorOptions) {
		this.pipelines = options.pipelines;
		this.logger = options.logger;
	}

	/** Entity kinds whose configuration enables them, in processing order. */
	getEnabledEntityTypes(): EntityKind[] {
		return this.pipelines.filter((p) => p.config.enabled).map((p) => p.kind);
	}

	/**
	 * Sync every enabled kind modified after `since` (all records when absent).
	 *
	 * @returns the per-kind report and the deduplicated documents
	 */
	async run(since?: string): Promise<SyncOutcome> {
		const runId = uuidv4();
		const log = this.logger.child({ runId });
		const startTime = new Date().toISOString();
		const results: SyncReport["results"] = {};
		const collected: NormalizedDocument[] = [];

		log.info("Sync run started", { since: since ?? null, enabled: this.getEnabledEntityTypes() });

		for (const pipeline of this.pipelines) {
			const typeLog = log.child({ entityType: pipeline.kind });
			const transition = (state: EntityRunState, data?: Record<string, unknown>) =>
				typeLog.info(`Entity type ${state}`, { stage: "state", state, ...data });

			if (!pipeline.config.enabled) {
				results[pipeline.kind] = { status: "skipped", reason: "disabled" };
				transition("skipped", { reason: "disabled" });
				continue;
			}

			transition("running");
			let result: EntitySyncResult;
			try {
				const documents = await this.syncKind(pipeline, since, typeLog);
				collected.push(...documents);
				result = { status: "success", documentsCreated: documents.length };
				transition("success", { documentsCreated: documents.length });
			} catch (error) {
				result = { status: "error", error: describe(error) };
				typeLog.error("Entity type failed", error, { stage: "state", state: "error" });
			}
			results[pipeline.kind] = result;
		}

		const { documents, duplicatesRemoved } = dedupeDocuments(collected, log);
		const report: SyncReport = {
			runId,
			startTime,
			endTime: new Date().toISOString(),
			since: since ?? null,
			results,
			summary: {
				totalDocuments: documents.length,
				duplicatesRemoved,
				syncStatus: "completed",
			},
		};

		log.info("Sync run finished", { summary: report.summary });
		return { report, documents };
	}

	private async syncKind(
		pipeline: EntityPipeline,
		since: string | undefined,
		log: SyncLogger,
	): Promise<NormalizedDocument[]> {
		const pending = await pipeline.load(since, log);
		log.info("Mapping started", { count: pending.length });

		const documents: NormalizedDocument[] = [];
		let excluded = 0;
		for (const item of pending) {
			try {
				const doc = item.map();
				if (doc) {
					documents.push(doc);
				} else {
					excluded++;
				}
			} catch (error) {
				excluded++;
				log.error("Mapping failed, record excluded", error, { recordId: item.id });
			}
		}

		log.info("Mapping finished", { documents: documents.length, excluded });
		return documents;
	}
}
