// ---------------------------------------------------------------------------
// Incident → document
// ---------------------------------------------------------------------------

import type { IncidentEnrichment } from "../fetchers/incident-enrichment";
import { list, text } from "../records/accessor";
import { type DocumentMapper, buildDocument, extractAuthor, requireAttributes } from "./base";

export const MAX_TIMELINE_EVENTS = 10;

export const mapIncident: DocumentMapper<IncidentEnrichment> = ({ record, enrichment }, context) => {
	const attributes = requireAttributes(record, "Incident", context);
	if (!attributes) return undefined;

	const title = text(attributes, "title") ?? "No Title";
	const status = text(attributes, "status");
	const summary = text(attributes, "summary");
	const tags: string[] = [];
	const body = [`Title: ${title}`];

	if (status) {
		tags.push(`status:${status}`);
		body.push(`Status: ${status}`);
	}

	const severityName = text(attributes, "severity", "data", "attributes", "name");
	if (severityName && severityName !== "Unknown") tags.push(`severity:${severityName}`);

	const kind = text(attributes, "kind");
	if (kind) tags.push(`kind:${kind}`);

	if (summary) body.push(`\nSummary:\n${summary}`);

	const events = enrichment.events.slice(0, MAX_TIMELINE_EVENTS).flatMap((event) => {
		const eventText = text(event, "attributes", "event");
		if (!eventText) return [];
		const timestamp =
			text(event, "attributes", "occurred_at") ?? text(event, "attributes", "created_at") ?? "";
		const internal = text(event, "attributes", "visibility") === "internal" ? " (internal)" : "";
		return [`[${timestamp.slice(0, 16)}] ${eventText}${internal}`];
	});
	if (events.length > 0) body.push("\n--- Incident Events Timeline ---", ...events);

	if (enrichment.actionItems.length > 0) {
		body.push("\n--- Action Items ---");
		for (const item of enrichment.actionItems) {
			const itemTitle = text(item, "attributes", "title") ?? `Action Item ${item.id}`;
			const itemStatus = text(item, "attributes", "status") ?? "Unknown";
			const assignee = text(item, "attributes", "assignee", "name") ?? "Unassigned";
			body.push(`• ${itemTitle}`, `  Status: ${itemStatus} | Assignee: ${assignee}`);
			const due = text(item, "attributes", "due_date");
			if (due) body.push(`  Due: ${due}`);
		}
	} else {
		const related = list(record.relationships, "action_items", "data");
		if (related.length > 0) {
			body.push("\nAction Items:");
			for (const item of related) body.push(`- ${text(item, "id") ?? "Unknown Action Item"}`);
		}
	}

	// Only worth a section when the description says more than the name
	const severity = enrichment.severityDetails;
	if (severity) {
		const name = text(severity, "attributes", "name") ?? "";
		const description = text(severity, "attributes", "description");
		if (description && description !== name) {
			const level = text(severity, "attributes", "level") ?? "";
			body.push("\nSeverity Details:", `Level: ${name} (${level})`, `Description: ${description}`);
		}
	}

	return buildDocument(context, {
		id: record.id,
		objectType: "Incident",
		title: `[INC-${text(attributes, "sequential_id") ?? "N/A"}] ${title}`,
		sourceUrl: text(attributes, "url"),
		status,
		tags,
		body,
		summary,
		author: extractAuthor(attributes),
		attributes,
	});
};
