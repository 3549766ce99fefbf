// ---------------------------------------------------------------------------
// Document Mappers: shared base-document template
// ---------------------------------------------------------------------------

import type { EnrichedRecord, RawRecord } from "../fetchers/types";
import type { SyncLogger } from "../monitoring/sync-logger";
import { type JsonObject, isJsonObject, node, text } from "../records/accessor";
import type { DocumentAuthor, DocumentContent, NormalizedDocument, ObjectType } from "../sync/types";

export interface MapperContext {
	datasource: string;
	/** Root of the source UI, e.g. https://rootly.com/account */
	webBaseUrl: string;
	logger: SyncLogger;
}

/** Pure transform from one enriched record to one document, or `undefined` to skip it. */
export type DocumentMapper<E> = (
	enriched: EnrichedRecord<E>,
	context: MapperContext,
) => NormalizedDocument | undefined;

const VIEW_PATHS: Record<ObjectType, string> = {
	Incident: "incidents",
	Alert: "alerts",
	Schedule: "schedules",
	EscalationPolicy: "escalation_policies",
	Retrospective: "retrospectives",
};

/**
 * The record's `attributes` block. A record without one cannot be mapped:
 * the miss is logged at error level and `undefined` returned.
 */
export function requireAttributes(
	record: RawRecord,
	objectType: ObjectType,
	context: MapperContext,
): JsonObject | undefined {
	if (isJsonObject(record.attributes) && Object.keys(record.attributes).length > 0) {
		return record.attributes;
	}
	context.logger.error(`${objectType} record missing attributes`, undefined, {
		recordId: record.id,
	});
	return undefined;
}

export function defaultViewUrl(webBaseUrl: string, objectType: ObjectType, id: string): string {
	return `${webBaseUrl.replace(/\/+$/, "")}/${VIEW_PATHS[objectType]}/${id}`;
}

export function content(textContent: string): DocumentContent {
	return { mimeType: "text/plain", textContent };
}

const ISO_8601 =
	/^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

/** `YYYY-MM-DD` names a day that exists; `Date.parse` would roll 2024-02-30 into March. */
function isCalendarDate(date: string): boolean {
	const [year, month, day] = date.split("-").map(Number);
	if (year === undefined || month === undefined || day === undefined) return false;
	const probe = new Date(Date.UTC(year, month - 1, day));
	return (
		probe.getUTCFullYear() === year &&
		probe.getUTCMonth() === month - 1 &&
		probe.getUTCDate() === day
	);
}

/**
 * ISO-8601 date or date-time to integer epoch seconds. Values without an
 * offset are read as UTC. Returns `undefined` for anything unparsable.
 */
export function parseIsoTimestamp(value: string): number | undefined {
	const match = ISO_8601.exec(value.trim());
	if (!match) return undefined;

	const [, date = "", hours = "00", minutes = "00", seconds = "00", fraction = "", zone] = match;
	if (!isCalendarDate(date)) return undefined;
	const millis = fraction.padEnd(3, "0").slice(0, 3);

	let offset = "Z";
	if (zone && zone.toUpperCase() !== "Z") {
		const digits = zone.slice(1).replace(":", "").padEnd(4, "0");
		offset = `${zone[0]}${digits.slice(0, 2)}:${digits.slice(2, 4)}`;
	}

	const epochMs = Date.parse(`${date}T${hours}:${minutes}:${seconds}.${millis}${offset}`);
	if (Number.isNaN(epochMs)) return undefined;
	return Math.trunc(epochMs / 1000);
}

/** `createdAt`/`updatedAt` from the attributes; unparsable values are logged and omitted. */
export function extractTimestamps(
	attributes: JsonObject,
	recordId: string,
	logger: SyncLogger,
): Pick<NormalizedDocument, "createdAt" | "updatedAt"> {
	const result: Pick<NormalizedDocument, "createdAt" | "updatedAt"> = {};
	for (const [field, key] of [
		["createdAt", "created_at"],
		["updatedAt", "updated_at"],
	] as const) {
		const raw = text(attributes, key);
		if (raw === undefined) continue;
		const parsed = parseIsoTimestamp(raw);
		if (parsed === undefined) {
			logger.warn(`Could not parse ${key}`, { recordId, value: raw });
		} else {
			result[field] = parsed;
		}
	}
	return result;
}

/** Author from the nested user relationship; `undefined` when neither name nor email is known. */
export function extractAuthor(attributes: JsonObject): DocumentAuthor | undefined {
	const user = node(attributes, "user", "data", "attributes");
	const name = text(user, "full_name");
	const email = text(user, "email");
	if (name === undefined && email === undefined) return undefined;
	return { ...(name !== undefined && { name }), ...(email !== undefined && { email }) };
}

/** Display name for a user record: name, full name, first + last, email local part, then id. */
export function userDisplayName(user: RawRecord): string {
	const attributes = user.attributes;
	const fullName = [text(attributes, "first_name"), text(attributes, "last_name")]
		.filter((part): part is string => part !== undefined)
		.join(" ");
	return (
		text(attributes, "name") ??
		text(attributes, "full_name") ??
		(fullName || undefined) ??
		(text(attributes, "email")?.split("@")[0] || undefined) ??
		`User ${user.id}`
	);
}

export interface DocumentFields {
	id: string;
	objectType: ObjectType;
	title: string;
	/** URL the source gave for the record; the default view URL is used when blank */
	sourceUrl?: string;
	status?: string;
	tags: string[];
	/** Body lines, joined with newlines */
	body: string[];
	summary?: string;
	author?: DocumentAuthor;
	attributes: JsonObject;
}

/** Assemble the normalized document common to every entity type. */
export function buildDocument(context: MapperContext, fields: DocumentFields): NormalizedDocument {
	const sourceUrl = fields.sourceUrl?.trim();
	return {
		id: fields.id,
		datasource: context.datasource,
		objectType: fields.objectType,
		title: fields.title,
		...(fields.status !== undefined && { status: fields.status }),
		tags: [...new Set(fields.tags)],
		body: content(fields.body.join("\n")),
		...(fields.summary !== undefined && { summary: content(fields.summary) }),
		...(fields.author !== undefined && { author: fields.author }),
		viewUrl: sourceUrl
			? sourceUrl
			: defaultViewUrl(context.webBaseUrl, fields.objectType, fields.id),
		permissions: { allowAnonymousAccess: true },
		...extractTimestamps(fields.attributes, fields.id, context.logger),
	};
}
