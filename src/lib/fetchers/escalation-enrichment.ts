// ---------------------------------------------------------------------------
// Escalation policy enrichment: levels, paths, notification chain
// ---------------------------------------------------------------------------

import type { SyncLogger } from "../monitoring/sync-logger";
import { list, text } from "../records/accessor";
import { lookupOrEmpty } from "./isolate";
import type { EnrichedRecord, RawRecord, SourceReader } from "./types";

/** One notification target of one escalation level. */
export interface NotificationRule {
	level?: string;
	targetType?: string;
	targetId?: string;
}

export interface EscalationEnrichment {
	levels: RawRecord[];
	paths: RawRecord[];
	notificationRules: NotificationRule[];
}

/** Flatten each level's `notification_target_params` into rules, in level order. */
export function notificationRulesOf(levels: RawRecord[]): NotificationRule[] {
	const rules: NotificationRule[] = [];
	for (const level of levels) {
		const position = text(level, "attributes", "position");
		for (const target of list(level, "attributes", "notification_target_params")) {
			rules.push({
				level: position,
				targetType: text(target, "type"),
				targetId: text(target, "id"),
			});
		}
	}
	return rules;
}

export async function enrichEscalationPolicies(
	source: SourceReader,
	policies: RawRecord[],
	logger: SyncLogger,
): Promise<EnrichedRecord<EscalationEnrichment>[]> {
	const enriched: EnrichedRecord<EscalationEnrichment>[] = [];

	for (const record of policies) {
		const context = { recordId: record.id };
		const levels = await lookupOrEmpty(
			logger,
			"escalation levels",
			() => source.getResource(`escalation_policies/${record.id}/escalation_levels`),
			context,
		);
		const paths = await lookupOrEmpty(
			logger,
			"escalation paths",
			() => source.getResource(`escalation_policies/${record.id}/escalation_paths`),
			context,
		);
		enriched.push({
			record,
			enrichment: { levels, paths, notificationRules: notificationRulesOf(levels) },
		});
	}

	logger.info("Escalation policy enrichment finished", { count: enriched.length });
	return enriched;
}
