// ---------------------------------------------------------------------------
// Retrospective (post-mortem) → document
// ---------------------------------------------------------------------------

import { display, text } from "../records/accessor";
import { type DocumentMapper, buildDocument, extractAuthor, requireAttributes } from "./base";

const SECTIONS = [
	["what_went_well", "What Went Well"],
	["what_could_be_improved", "What Could Be Improved"],
	["action_items", "Action Items"],
	["lessons_learned", "Lessons Learned"],
	["notes", "Additional Notes"],
] as const;

export const mapRetrospective: DocumentMapper<null> = ({ record }, context) => {
	const attributes = requireAttributes(record, "Retrospective", context);
	if (!attributes) return undefined;

	const incidentId = text(record.relationships, "incident", "data", "id");
	const title = text(attributes, "title");
	const status = text(attributes, "status");
	const summary = text(attributes, "summary");
	const tags = ["type:retrospective"];
	const body = [`Title: ${title ?? "No Title"}`];

	if (status) {
		tags.push(`status:${status}`);
		body.push(`Status: ${status}`);
	}
	if (incidentId) tags.push(`incident:${incidentId}`);
	if (summary) body.push(`\nSummary:\n${summary}`);

	for (const [key, heading] of SECTIONS) {
		const value = display(attributes, key);
		if (value) body.push(`\n--- ${heading} ---\n${value}`);
	}

	return buildDocument(context, {
		id: record.id,
		objectType: "Retrospective",
		title: `Retrospective: ${title ?? `Incident ${incidentId ?? "Unknown"}`}`,
		sourceUrl: text(attributes, "url"),
		status,
		tags,
		body,
		summary,
		author: extractAuthor(attributes),
		attributes,
	});
};
