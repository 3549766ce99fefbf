// ---------------------------------------------------------------------------
// Unit Tests: Schedule Mapper
// ---------------------------------------------------------------------------

import type { ScheduleEnrichment } from "@/lib/fetchers/schedule-enrichment";
import type { RawRecord } from "@/lib/fetchers/types";
import { mapSchedule } from "@/lib/mappers/schedule";
import { describe, expect, it } from "vitest";
import { createCapturingLogger, record } from "../helpers/fakes";

const { logger } = createCapturingLogger();
const ctx = { datasource: "rootly", webBaseUrl: "https://rootly.com/account", logger };

function shift(id: string, userId: string | undefined, day: number) {
	const dd = String(day).padStart(2, "0");
	return record(
		id,
		{ starts_at: `2024-01-${dd}T09:00:00Z`, ends_at: `2024-01-${dd}T17:00:00Z` },
		userId === undefined ? {} : { user: { data: { id: userId } } },
	);
}

function enrichment(overrides: Partial<ScheduleEnrichment> = {}): ScheduleEnrichment {
	return {
		rotations: [],
		shifts: [],
		overrides: [],
		users: new Map<string, RawRecord>(),
		...overrides,
	};
}

describe("mapSchedule", () => {
	it("resolves shift users through the lookup", () => {
		const schedule = record("s1", { name: "Primary On-call" });
		const users = new Map([["u1", record("u1", { full_name: "Jane Doe" })]]);

		const shifts = [shift("sh1", "u1", 15), shift("sh2", "u1", 16)];

		const doc = mapSchedule({ record: schedule, enrichment: enrichment({ shifts, users }) }, ctx);

		const body = doc?.body.textContent ?? "";
		expect(body).toContain("- 2024-01-15T09:00:00Z to 2024-01-15T17:00:00Z: Jane Doe");
		expect(body).toContain("- 2024-01-16T09:00:00Z to 2024-01-16T17:00:00Z: Jane Doe");
		expect(body.split("Jane Doe")).toHaveLength(3);
	});

	it("renders fields, tags, rotations and capped shift lists", () => {
		const schedule = record("s2", {
			name: "DB",
			description: "Database rota",
			schedule_type: "weekly",
			status: "active",
			team: "data",
			owner: "ops-lead",
			timezone: "Europe/Berlin",
		});
		const shifts = Array.from({ length: 12 }, (_, i) =>
			shift(`sh${i}`, i === 0 ? undefined : "u9", i + 1),
		);
		const rotation = record("rot1", {
			name: "Weekdays",
			schedule_rotationable_type: "ScheduleWeeklyRotation",
		});
		const overrides = Array.from({ length: 5 }, (_, i) => shift(`ov${i}`, "u9", 20 + i));

		const doc = mapSchedule(
			{
				record: schedule,
				enrichment: enrichment({
					rotations: [rotation],
					shifts,
					overrides,
				}),
			},
			ctx,
		);

		expect(doc?.title).toBe("[SCHEDULE] DB");
		expect(doc?.tags).toEqual([
			"schedule_type:weekly",
			"status:active",
			"team:data",
			"owner:ops-lead",
		]);
		expect(doc?.summary?.textContent).toBe("Database rota");

		const lines = doc?.body.textContent.split("\n") ?? [];
		expect(lines.slice(0, 4)).toEqual([
			"Name: DB",
			"Description: Database rota",
			"Type: weekly",
			"Timezone: Europe/Berlin",
		]);
		expect(lines).toContain("- Weekdays (ScheduleWeeklyRotation)");
		expect(lines).toContain("- 2024-01-01T09:00:00Z to 2024-01-01T17:00:00Z: Unassigned");
		expect(lines.filter((l) => l.endsWith(": User u9"))).toHaveLength(9 + 3);
	});

	it("uses No Name when the schedule has none", () => {
		const doc = mapSchedule(
			{ record: record("s3", { timezone: "UTC" }), enrichment: enrichment() },
			ctx,
		);
		expect(doc?.title).toBe("[SCHEDULE] No Name");
		expect(doc?.viewUrl).toBe("https://rootly.com/account/schedules/s3");
	});
});
