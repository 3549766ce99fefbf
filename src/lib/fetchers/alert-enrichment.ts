// ---------------------------------------------------------------------------
// Alert enrichment: routing rules, urgencies, groups, recent events
// ---------------------------------------------------------------------------

import type { SyncLogger } from "../monitoring/sync-logger";
import { lookupOrEmpty } from "./isolate";
import type { EnrichedRecord, RawRecord, SourceReader } from "./types";

export interface MonitoringContext {
	routingRules: RawRecord[];
	urgencies: RawRecord[];
	alertGroups: RawRecord[];
	recentEvents: RawRecord[];
}

export interface AlertEnrichment {
	monitoringContext: MonitoringContext;
}

/**
 * Attach monitoring context. The three configuration lookups are shared by
 * every alert in the batch; recent events are fetched per alert.
 */
export async function enrichAlerts(
	source: SourceReader,
	alerts: RawRecord[],
	logger: SyncLogger,
): Promise<EnrichedRecord<AlertEnrichment>[]> {
	if (alerts.length === 0) return [];

	const routingRules = await lookupOrEmpty(logger, "alert routing rules", () =>
		source.getResource("alert_routing_rules"),
	);
	const urgencies = await lookupOrEmpty(logger, "alert urgencies", () =>
		source.getResource("alert_urgencies"),
	);
	const alertGroups = await lookupOrEmpty(logger, "alert groups", () =>
		source.getResource("alert_groups"),
	);

	const enriched: EnrichedRecord<AlertEnrichment>[] = [];
	for (const record of alerts) {
		const recentEvents = await lookupOrEmpty(
			logger,
			"alert events",
			() => source.getResource(`alerts/${record.id}/events`),
			{ recordId: record.id },
		);
		enriched.push({
			record,
			enrichment: { monitoringContext: { routingRules, urgencies, alertGroups, recentEvents } },
		});
	}

	logger.info("Alert enrichment finished", { count: enriched.length });
	return enriched;
}
