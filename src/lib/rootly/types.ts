// ---------------------------------------------------------------------------
// Rootly API: Entity kinds and request shapes
// ---------------------------------------------------------------------------

/** The five record collections synced into the index, in processing order. */
export const ENTITY_KINDS = [
	"incidents",
	"alerts",
	"schedules",
	"escalation_policies",
	"retrospectives",
] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];

/** Collection endpoint per entity kind. Retrospectives are served as post-mortems. */
export const ENTITY_ENDPOINTS: Record<EntityKind, string> = {
	incidents: "incidents",
	alerts: "alerts",
	schedules: "schedules",
	escalation_policies: "escalation_policies",
	retrospectives: "post_mortems",
};

export type QueryValue = string | number | readonly string[] | null | undefined;
export type QueryParams = Record<string, QueryValue>;

/** One page request against a collection endpoint. Page numbers are 1-based. */
export interface ListPageQuery {
	pageSize: number;
	pageNumber: number;
	/** ISO-8601 timestamp; omitted from the request when absent or empty */
	updatedAfter?: string;
	/** Extra filter parameters, e.g. `{ "schedule_ids[]": [id] }` */
	filters?: QueryParams;
}
