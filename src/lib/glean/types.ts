// ---------------------------------------------------------------------------
// Glean Indexing API: Wire Types
// ---------------------------------------------------------------------------

import type { ObjectType } from "../sync/types";

export type DocCategory = "TICKETS" | "UNCATEGORIZED" | "KNOWLEDGE_HUB" | "PUBLISHED_CONTENT";

export interface ObjectDefinition {
	name: ObjectType;
	displayLabel: string;
	docCategory: DocCategory;
	summarizable: boolean;
}

/** Custom datasource declaration; upserted once per run before any submission. */
export interface DatasourceDefinition {
	name: string;
	displayName: string;
	datasourceCategory: DocCategory;
	urlRegex: string;
	objectDefinitions: ObjectDefinition[];
	aliases: string[];
}

interface WireContent {
	mimeType: string;
	textContent: string;
}

/** Document as the indexing endpoint expects it. */
export interface WireDocument {
	datasource: string;
	objectType: string;
	id: string;
	title: string;
	viewURL: string;
	body: WireContent;
	summary?: WireContent;
	author?: { name?: string; email?: string };
	permissions: { allowAnonymousAccess: boolean };
	createdAt?: number;
	updatedAt?: number;
	tags?: string[];
	status?: string;
}
