// ---------------------------------------------------------------------------
// Escalation policy → document
// ---------------------------------------------------------------------------

import type { EscalationEnrichment } from "../fetchers/escalation-enrichment";
import { display, list, text } from "../records/accessor";
import { type DocumentMapper, buildDocument, requireAttributes } from "./base";

export const MAX_NOTIFICATION_RULES = 5;

export const mapEscalationPolicy: DocumentMapper<EscalationEnrichment> = (
	{ record, enrichment },
	context,
) => {
	const attributes = requireAttributes(record, "EscalationPolicy", context);
	if (!attributes) return undefined;

	const name = text(attributes, "name") ?? "No Name";
	const status = text(attributes, "status");
	const description = text(attributes, "description");
	const tags: string[] = [];
	const body = [`Name: ${name}`];

	if (status) tags.push(`status:${status}`);
	const team = text(attributes, "team");
	if (team) tags.push(`team:${team}`);

	const stepIds = list(record.relationships, "escalation_steps", "data").filter(
		(step) => text(step, "id") !== undefined,
	);
	const stepCount = stepIds.length > 0 ? stepIds.length : enrichment.levels.length;
	if (stepCount > 0) tags.push(`escalation_steps:${stepCount}`);

	if (description) body.push(`Description: ${description}`);
	const repeatCount = text(attributes, "repeat_count");
	if (repeatCount) body.push(`Repeat Count: ${repeatCount}`);
	const timeout = text(attributes, "escalation_timeout");
	if (timeout) body.push(`Escalation Timeout: ${timeout} minutes`);

	const rules = display(attributes, "escalation_rules");
	if (rules) body.push(`\nEscalation Rules:\n${rules}`);

	if (enrichment.levels.length > 0) {
		body.push("\nEscalation Levels:");
		enrichment.levels.forEach((level, index) => {
			const position = text(level, "attributes", "position") ?? String(index + 1);
			const delay = text(level, "attributes", "delay");
			const targets = list(level, "attributes", "notification_target_params").length;
			body.push(
				`- Level ${position}: ${targets} notification target(s)${delay ? `, after ${delay} minutes` : ""}`,
			);
		});
	}

	if (enrichment.paths.length > 0) {
		body.push("\nEscalation Paths:");
		for (const path of enrichment.paths) {
			const pathName = text(path, "attributes", "name") ?? `Path ${path.id}`;
			const isDefault = path.attributes?.default === true ? " (default)" : "";
			body.push(`- ${pathName}${isDefault}`);
		}
	}

	if (enrichment.notificationRules.length > 0) {
		body.push("\nNotification Rules:");
		for (const rule of enrichment.notificationRules.slice(0, MAX_NOTIFICATION_RULES)) {
			body.push(
				`- Level ${rule.level ?? "?"}: ${rule.targetType ?? "target"} ${rule.targetId ?? "unknown"}`,
			);
		}
	}

	return buildDocument(context, {
		id: record.id,
		objectType: "EscalationPolicy",
		title: `[ESCALATION] ${name}`,
		sourceUrl: text(attributes, "url"),
		status,
		tags,
		body,
		summary: description,
		attributes,
	});
};
