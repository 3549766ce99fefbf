// ---------------------------------------------------------------------------
// Alert → document
// ---------------------------------------------------------------------------

import type { AlertEnrichment, MonitoringContext } from "../fetchers/alert-enrichment";
import type { RawRecord } from "../fetchers/types";
import { type JsonObject, display, firstText, text } from "../records/accessor";
import { type DocumentMapper, buildDocument, extractAuthor, requireAttributes } from "./base";

export const MAX_MONITORING_ENTRIES = 3;

/** Alerts carry their headline in different places depending on the integration. */
export function alertTitle(record: RawRecord, attributes: JsonObject): string {
	const named = firstText(
		attributes,
		["summary"],
		["title"],
		["name"],
		["data", "title"],
		["data", "summary"],
	);
	if (named) return named;
	const description = text(attributes, "description")?.trim();
	if (description) return `${description.slice(0, 50)}...`;
	return `Alert ${record.id}`;
}

function monitoringSections(monitoring: MonitoringContext): string[] {
	const lines: string[] = [];
	const section = (
		heading: string,
		entries: RawRecord[],
		render: (attributes: unknown) => string[],
	): void => {
		const rendered = entries
			.slice(0, MAX_MONITORING_ENTRIES)
			.flatMap((entry) => (entry.attributes ? render(entry.attributes) : []));
		if (rendered.length > 0) lines.push(`\n## ${heading}`, ...rendered);
	};

	section("Alert Routing Rules", monitoring.routingRules, (rule) => {
		const out = [
			`- **${text(rule, "name") ?? "Unnamed Rule"}** (Match: ${text(rule, "match_mode") ?? "Unknown"})`,
		];
		const conditions = display(rule, "conditions");
		if (conditions) out.push(`  Conditions: ${conditions}`);
		return out;
	});
	section("Alert Urgency Levels", monitoring.urgencies, (urgency) => [
		`- **${text(urgency, "name") ?? "Unknown"}**: Level ${text(urgency, "level") ?? text(urgency, "position") ?? "Unknown"}`,
	]);
	section("Alert Groups", monitoring.alertGroups, (group) => [
		`- **${text(group, "name") ?? "Unnamed Group"}**: ${text(group, "description") ?? "No description"}`,
	]);
	section("Recent Alert Activity", monitoring.recentEvents, (event) => [
		`- ${text(event, "event_type") ?? text(event, "kind") ?? "Unknown"} at ${text(event, "created_at") ?? "Unknown time"}`,
	]);
	return lines;
}

export const mapAlert: DocumentMapper<AlertEnrichment> = ({ record, enrichment }, context) => {
	const attributes = requireAttributes(record, "Alert", context);
	if (!attributes) return undefined;

	const headline = alertTitle(record, attributes);
	const status = text(attributes, "status");
	const priority = firstText(attributes, ["priority"], ["severity"]);
	const source = firstText(attributes, ["source"], ["source_type"]);
	const description = firstText(attributes, ["description"], ["message"]);
	const tags: string[] = [];
	const body = [`Title: ${headline}`];

	if (status) {
		tags.push(`alert_status:${status}`);
		body.push(`Status: ${status}`);
	}
	if (priority) {
		tags.push(`priority:${priority}`);
		body.push(`Priority: ${priority}`);
	}
	if (source) {
		tags.push(`source:${source}`);
		body.push(`Source: ${source}`);
	}
	if (description) body.push(`\nDescription:\n${description}`);

	const details = display(attributes, "details");
	if (details) body.push(`\nDetails:\n${details}`);

	body.push(...monitoringSections(enrichment.monitoringContext));

	return buildDocument(context, {
		id: record.id,
		objectType: "Alert",
		title: `[ALERT] ${headline}`,
		sourceUrl: text(attributes, "url"),
		status,
		tags,
		body,
		summary: description,
		author: extractAuthor(attributes),
		attributes,
	});
};
