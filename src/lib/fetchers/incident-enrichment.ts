// ---------------------------------------------------------------------------
// Incident enrichment: timeline, action items, shared severity lookup
// ---------------------------------------------------------------------------

import type { IncidentTypeConfig } from "../config";
import type { SyncLogger } from "../monitoring/sync-logger";
import { text } from "../records/accessor";
import { lookupOrEmpty } from "./isolate";
import type { EnrichedRecord, RawRecord, SourceReader } from "./types";

export interface IncidentEnrichment {
	events: RawRecord[];
	actionItems: RawRecord[];
	severityDetails?: RawRecord;
}

export type IncidentEnrichmentOptions = IncidentTypeConfig["enhancedData"];

const EMPTY: IncidentEnrichment = { events: [], actionItems: [] };

/**
 * Attach timeline events and action items per incident, plus severity
 * details resolved from one severity lookup shared by the whole batch.
 * No calls are made when both flags are off.
 */
export async function enrichIncidents(
	source: SourceReader,
	incidents: RawRecord[],
	options: IncidentEnrichmentOptions,
	logger: SyncLogger,
): Promise<EnrichedRecord<IncidentEnrichment>[]> {
	if (!options.includeEvents && !options.includeActionItems) {
		return incidents.map((record) => ({ record, enrichment: EMPTY }));
	}
	if (incidents.length === 0) return [];

	const severities = new Map<string, RawRecord>();
	for (const severity of await lookupOrEmpty(logger, "severities", () =>
		source.getResource("severities", { "page[size]": 100 }),
	)) {
		severities.set(severity.id, severity);
	}

	const enriched: EnrichedRecord<IncidentEnrichment>[] = [];
	for (const record of incidents) {
		const events = options.includeEvents
			? await lookupOrEmpty(
					logger,
					"incident events",
					() => source.getResource(`incidents/${record.id}/events`),
					{ recordId: record.id },
				)
			: [];
		const actionItems = options.includeActionItems
			? await lookupOrEmpty(
					logger,
					"incident action items",
					() => source.getResource(`incidents/${record.id}/action_items`),
					{ recordId: record.id },
				)
			: [];

		const severityId = text(record.attributes, "severity", "data", "id");
		const severityDetails = severityId === undefined ? undefined : severities.get(severityId);

		enriched.push({ record, enrichment: { events, actionItems, severityDetails } });
	}

	logger.info("Incident enrichment finished", {
		count: enriched.length,
		severities: severities.size,
	});
	return enriched;
}
