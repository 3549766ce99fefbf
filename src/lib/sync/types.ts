// ---------------------------------------------------------------------------
// Sync Engine: Types
// ---------------------------------------------------------------------------

import type { EntityKind } from "../rootly/types";

/** Object types declared on the datasource, one per entity kind. */
export type ObjectType = "Incident" | "Alert" | "Schedule" | "EscalationPolicy" | "Retrospective";

export interface DocumentContent {
	mimeType: "text/plain";
	textContent: string;
}

export interface DocumentAuthor {
	name?: string;
	email?: string;
}

/** Uniform document produced by every mapper and submitted to the index. */
export interface NormalizedDocument {
	id: string;
	datasource: string;
	objectType: ObjectType;
	title: string;
	status?: string;
	/** `key:value` tags; order is irrelevant, duplicates are removed */
	tags: string[];
	body: DocumentContent;
	summary?: DocumentContent;
	author?: DocumentAuthor;
	viewUrl: string;
	permissions: { allowAnonymousAccess: true };
	/** Epoch seconds */
	createdAt?: number;
	/** Epoch seconds */
	updatedAt?: number;
}

/** Final outcome of one entity kind's pipeline. */
export type EntitySyncResult =
	| { status: "success"; documentsCreated: number }
	| { status: "skipped"; reason: string }
	| { status: "error"; error: string };

/** Lifecycle of one entity kind within a run. */
export type EntityRunState = "pending" | "skipped" | "running" | "success" | "error";

export interface SyncSummary {
	totalDocuments: number;
	duplicatesRemoved: number;
	syncStatus: "completed";
}

/** Represents one sync execution. Transient, returned to the caller and logged. */
export interface SyncReport {
	runId: string;
	startTime: string;
	endTime: string;
	since: string | null;
	results: Partial<Record<EntityKind, EntitySyncResult>>;
	summary: SyncSummary;
}

export interface SyncOutcome {
	report: SyncReport;
	/** Deduplicated documents in first-seen order */
	documents: NormalizedDocument[];
}
