// ---------------------------------------------------------------------------
// Schedule enrichment: rotations, shifts, overrides, batched user lookup
// ---------------------------------------------------------------------------

import type { SyncLogger } from "../monitoring/sync-logger";
import { text } from "../records/accessor";
import { lookupOrEmpty } from "./isolate";
import type { EnrichedRecord, RawRecord, SourceReader } from "./types";

export const USER_LOOKUP_PAGE_SIZE = 100;

export interface ScheduleEnrichment {
	rotations: RawRecord[];
	shifts: RawRecord[];
	overrides: RawRecord[];
	/** Users referenced by shifts or overrides, keyed by id; shared across schedules */
	users: ReadonlyMap<string, RawRecord>;
}

/** User id referenced by a shift or override shift. */
export function shiftUserId(shift: RawRecord): string | undefined {
	return text(shift, "relationships", "user", "data", "id") ?? text(shift, "attributes", "user_id");
}

export async function enrichSchedules(
	source: SourceReader,
	schedules: RawRecord[],
	logger: SyncLogger,
): Promise<EnrichedRecord<ScheduleEnrichment>[]> {
	const parts: Omit<ScheduleEnrichment, "users">[] = [];

	for (const schedule of schedules) {
		const context = { recordId: schedule.id };
		const rotations = await lookupOrEmpty(
			logger,
			"schedule rotations",
			() => source.getResource(`schedules/${schedule.id}/schedule_rotations`),
			context,
		);
		const allShifts = await lookupOrEmpty(
			logger,
			"schedule shifts",
			() => source.getResource("shifts", { "schedule_ids[]": [schedule.id] }),
			context,
		);
		// Keep shifts that name this schedule, or name none
		const shifts = allShifts.filter((shift) => {
			const scheduleId = text(shift, "attributes", "schedule_id");
			return scheduleId === undefined || scheduleId === schedule.id;
		});
		const overrides = await lookupOrEmpty(
			logger,
			"schedule override shifts",
			() => source.getResource(`schedules/${schedule.id}/override_shifts`),
			context,
		);
		parts.push({ rotations, shifts, overrides });
	}

	const referenced = new Set<string>();
	for (const part of parts) {
		for (const shift of [...part.shifts, ...part.overrides]) {
			const userId = shiftUserId(shift);
			if (userId !== undefined) referenced.add(userId);
		}
	}

	const users = new Map<string, RawRecord>();
	if (referenced.size > 0) {
		const found = await lookupOrEmpty(logger, "users", () =>
			source.getResource("users", { "page[size]": USER_LOOKUP_PAGE_SIZE }),
		);
		for (const user of found) {
			if (referenced.has(user.id)) users.set(user.id, user);
		}
		const missing = [...referenced].filter((id) => !users.has(id));
		if (missing.length > 0) {
			logger.warn("Users referenced by shifts not found in lookup", { userIds: missing });
		}
	}

	logger.info("Schedule enrichment finished", {
		count: schedules.length,
		users: users.size,
	});

	return schedules.map((record, index) => {
		const part = parts[index] ?? { rotations: [], shifts: [], overrides: [] };
		return { record, enrichment: { ...part, users } };
	});
}
