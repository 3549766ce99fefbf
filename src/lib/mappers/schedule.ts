// ---------------------------------------------------------------------------
// Schedule → document
// ---------------------------------------------------------------------------

import { type ScheduleEnrichment, shiftUserId } from "../fetchers/schedule-enrichment";
import type { RawRecord } from "../fetchers/types";
import { display, firstText, text } from "../records/accessor";
import {
	type DocumentMapper,
	type MapperContext,
	buildDocument,
	requireAttributes,
	userDisplayName,
} from "./base";

export const MAX_SHIFTS = 10;
export const MAX_OVERRIDES = 3;

function shiftLine(
	shift: RawRecord,
	users: ReadonlyMap<string, RawRecord>,
	context: MapperContext,
): string {
	const userId = shiftUserId(shift);
	let who = "Unassigned";
	if (userId !== undefined) {
		const user = users.get(userId);
		if (user) {
			who = userDisplayName(user);
		} else {
			context.logger.debug("Shift user not resolved", { recordId: shift.id, userId });
			who = `User ${userId}`;
		}
	}
	const startsAt = text(shift, "attributes", "starts_at") ?? "?";
	const endsAt = text(shift, "attributes", "ends_at") ?? "?";
	return `- ${startsAt} to ${endsAt}: ${who}`;
}

export const mapSchedule: DocumentMapper<ScheduleEnrichment> = ({ record, enrichment }, context) => {
	const attributes = requireAttributes(record, "Schedule", context);
	if (!attributes) return undefined;

	const name = text(attributes, "name") ?? "No Name";
	const status = text(attributes, "status");
	const description = text(attributes, "description");
	const scheduleType = firstText(attributes, ["schedule_type"], ["type"]);
	const tags: string[] = [];
	const body = [`Name: ${name}`];

	if (scheduleType) tags.push(`schedule_type:${scheduleType}`);
	if (status) tags.push(`status:${status}`);
	const team = text(attributes, "team");
	if (team) tags.push(`team:${team}`);
	const owner = text(attributes, "owner");
	if (owner) tags.push(`owner:${owner}`);

	if (description) body.push(`Description: ${description}`);
	if (scheduleType) body.push(`Type: ${scheduleType}`);
	const timezone = text(attributes, "timezone");
	if (timezone) body.push(`Timezone: ${timezone}`);

	const rotationInfo = display(attributes, "rotation_info");
	if (rotationInfo) body.push(`\nRotation Info:\n${rotationInfo}`);

	if (enrichment.rotations.length > 0) {
		body.push("\nRotations:");
		for (const rotation of enrichment.rotations) {
			const rotationName = text(rotation, "attributes", "name") ?? `Rotation ${rotation.id}`;
			const rotationType = text(rotation, "attributes", "schedule_rotationable_type");
			body.push(rotationType ? `- ${rotationName} (${rotationType})` : `- ${rotationName}`);
		}
	}

	if (enrichment.shifts.length > 0) {
		body.push("\nShifts:");
		for (const shift of enrichment.shifts.slice(0, MAX_SHIFTS)) {
			body.push(shiftLine(shift, enrichment.users, context));
		}
	}

	if (enrichment.overrides.length > 0) {
		body.push("\nOverrides:");
		for (const override of enrichment.overrides.slice(0, MAX_OVERRIDES)) {
			body.push(shiftLine(override, enrichment.users, context));
		}
	}

	return buildDocument(context, {
		id: record.id,
		objectType: "Schedule",
		title: `[SCHEDULE] ${name}`,
		sourceUrl: text(attributes, "url"),
		status,
		tags,
		body,
		summary: description,
		attributes,
	});
};
