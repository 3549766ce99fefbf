// ---------------------------------------------------------------------------
// Entity Pipelines
// One { kind, config, fetch, enrich, map } bundle per entity kind
// ---------------------------------------------------------------------------

import type { EntityTypeConfig, SyncSettings } from "@/lib/config";
import { enrichAlerts } from "@/lib/fetchers/alert-enrichment";
import { enrichEscalationPolicies } from "@/lib/fetchers/escalation-enrichment";
import { enrichIncidents } from "@/lib/fetchers/incident-enrichment";
import { fetchPaginated } from "@/lib/fetchers/paginated-fetcher";
import { enrichSchedules } from "@/lib/fetchers/schedule-enrichment";
import type { EnrichedRecord, RawRecord, SourceReader } from "@/lib/fetchers/types";
import { mapAlert } from "@/lib/mappers/alert";
import type { DocumentMapper, MapperContext } from "@/lib/mappers/base";
import { mapEscalationPolicy } from "@/lib/mappers/escalation-policy";
import { mapIncident } from "@/lib/mappers/incident";
import { mapRetrospective } from "@/lib/mappers/retrospective";
import { mapSchedule } from "@/lib/mappers/schedule";
import type { SyncLogger } from "@/lib/monitoring/sync-logger";
import { ENTITY_ENDPOINTS, type EntityKind } from "@/lib/rootly/types";
import type { NormalizedDocument } from "./types";

/** A record ready to be mapped; mapping is deferred so the caller can isolate each one. */
export interface PendingDocument {
	id: string;
	map(): NormalizedDocument | undefined;
}

/** Pipeline with its enrichment type hidden, dispatched uniformly by the coordinator. */
export interface EntityPipeline {
	readonly kind: EntityKind;
	readonly config: EntityTypeConfig;
	load(updatedAfter: string | undefined, logger: SyncLogger): Promise<PendingDocument[]>;
}

export interface PipelineDefinition<E> {
	kind: EntityKind;
	config: EntityTypeConfig;
	fetch(updatedAfter: string | undefined, logger: SyncLogger): Promise<RawRecord[]>;
	enrich(records: RawRecord[], logger: SyncLogger): Promise<EnrichedRecord<E>[]>;
	map: DocumentMapper<E>;
}

export type DocumentTarget = Omit<MapperContext, "logger">;

export function definePipeline<E>(
	definition: PipelineDefinition<E>,
	target: DocumentTarget,
): EntityPipeline {
	return {
		kind: definition.kind,
		config: definition.config,
		async load(updatedAfter, logger) {
			const records = await definition.fetch(updatedAfter, logger);
			logger.info("Enrichment started", { count: records.length });
			const enriched = await definition.enrich(records, logger);
			const context: MapperContext = { ...target, logger };
			return enriched.map((item) => ({
				id: item.record.id,
				map: () => definition.map(item, context),
			}));
		},
	};
}

/** Pipelines for every entity kind, in processing order. */
export function createPipelines(
	source: SourceReader,
	settings: SyncSettings,
	target: DocumentTarget,
): EntityPipeline[] {
	const { dataTypes, processing } = settings;

	const fetcher =
		(kind: EntityKind, config: EntityTypeConfig) =>
		(updatedAfter: string | undefined, logger: SyncLogger) =>
			fetchPaginated(
				source,
				ENTITY_ENDPOINTS[kind],
				{
					updatedAfter,
					maxItems: config.maxItems,
					pageSize: config.itemsPerPage,
					maxPages: processing.maxPages,
				},
				logger,
			);

	return [
		definePipeline(
			{
				kind: "incidents",
				config: dataTypes.incidents,
				fetch: fetcher("incidents", dataTypes.incidents),
				enrich: (records, logger) =>
					enrichIncidents(source, records, dataTypes.incidents.enhancedData, logger),
				map: mapIncident,
			},
			target,
		),
		definePipeline(
			{
				kind: "alerts",
				config: dataTypes.alerts,
				fetch: fetcher("alerts", dataTypes.alerts),
				enrich: (records, logger) => enrichAlerts(source, records, logger),
				map: mapAlert,
			},
			target,
		),
		definePipeline(
			{
				kind: "schedules",
				config: dataTypes.schedules,
				fetch: fetcher("schedules", dataTypes.schedules),
				enrich: (records, logger) => enrichSchedules(source, records, logger),
				map: mapSchedule,
			},
			target,
		),
		definePipeline(
			{
				kind: "escalation_policies",
				config: dataTypes.escalationPolicies,
				fetch: fetcher("escalation_policies", dataTypes.escalationPolicies),
				enrich: (records, logger) => enrichEscalationPolicies(source, records, logger),
				map: mapEscalationPolicy,
			},
			target,
		),
		definePipeline<null>(
			{
				kind: "retrospectives",
				config: dataTypes.retrospectives,
				fetch: fetcher("retrospectives", dataTypes.retrospectives),
				enrich: async (records) => records.map((record) => ({ record, enrichment: null })),
				map: mapRetrospective,
			},
			target,
		),
	];
}
