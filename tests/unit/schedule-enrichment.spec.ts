// ---------------------------------------------------------------------------
// Unit Tests: Schedule Enrichment
// ---------------------------------------------------------------------------

import { enrichSchedules } from "@/lib/fetchers/schedule-enrichment";
import { describe, expect, it } from "vitest";
import { createCapturingLogger, createFakeSource, record } from "../helpers/fakes";

function shift(id: string, scheduleId: string | undefined, userId: string) {
	return record(
		id,
		{ schedule_id: scheduleId, starts_at: "2024-01-15T09:00:00Z" },
		{ user: { data: { id: userId, type: "users" } } },
	);
}

describe("enrichSchedules", () => {
	it("collects rotations, filtered shifts and overrides per schedule", async () => {
		const { source, getResource } = createFakeSource({
			resources: {
				"schedules/s1/schedule_rotations": [record("rot-1", { name: "Primary" })],
				shifts: [shift("sh1", "s1", "u1"), shift("sh2", "s9", "u2"), shift("sh3", undefined, "u1")],
				"schedules/s1/override_shifts": [shift("ov1", "s1", "u3")],
				users: [record("u1", { full_name: "Jane Doe" }), record("u3", { name: "Sam" })],
			},
		});
		const { logger } = createCapturingLogger();

		const [enriched] = await enrichSchedules(source, [record("s1", { name: "Ops" })], logger);

		expect(enriched?.enrichment.rotations.map((r) => r.id)).toEqual(["rot-1"]);
		expect(enriched?.enrichment.shifts.map((r) => r.id)).toEqual(["sh1", "sh3"]);
		expect(enriched?.enrichment.overrides.map((r) => r.id)).toEqual(["ov1"]);
		expect([...(enriched?.enrichment.users.keys() ?? [])]).toEqual(["u1", "u3"]);
		expect(getResource).toHaveBeenCalledWith("shifts", { "schedule_ids[]": ["s1"] });
		expect(getResource).toHaveBeenCalledWith("users", { "page[size]": 100 });
	});

	it("looks users up once for all schedules", async () => {
		const { source, getResource } = createFakeSource({
			resources: {
				shifts: [shift("sh1", undefined, "u1")],
				users: [record("u1", { full_name: "Jane Doe" })],
			},
		});
		const { logger } = createCapturingLogger();

		const result = await enrichSchedules(
			source,
			[record("s1", { name: "A" }), record("s2", { name: "B" })],
			logger,
		);

		expect(getResource.mock.calls.filter((c) => c[0] === "users")).toHaveLength(1);
		expect(result[0]?.enrichment.users).toBe(result[1]?.enrichment.users);
	});

	it("skips the user lookup when nothing references a user", async () => {
		const { source, getResource } = createFakeSource();
		const { logger } = createCapturingLogger();

		await enrichSchedules(source, [record("s1", { name: "A" })], logger);

		expect(getResource.mock.calls.map((c) => c[0])).not.toContain("users");
	});

	it("logs user ids missing from the lookup", async () => {
		const { source } = createFakeSource({
			resources: { shifts: [shift("sh1", "s1", "u404")] },
		});
		const { logger, lines } = createCapturingLogger();

		const [enriched] = await enrichSchedules(source, [record("s1", { name: "A" })], logger);

		expect(enriched?.enrichment.users.size).toBe(0);
		expect(lines.find((l) => l.level === "warn")?.entry).toMatchObject({
			message: "Users referenced by shifts not found in lookup",
			userIds: ["u404"],
		});
	});

	it("degrades each failing sub-call to empty", async () => {
		const { source } = createFakeSource({
			resources: {
				"schedules/s1/schedule_rotations": new Error("HTTP 404"),
				shifts: new Error("HTTP 500"),
				"schedules/s1/override_shifts": new Error("timeout"),
			},
		});
		const { logger } = createCapturingLogger();

		const [enriched] = await enrichSchedules(source, [record("s1", { name: "A" })], logger);

		expect(enriched?.enrichment).toMatchObject({ rotations: [], shifts: [], overrides: [] });
	});
});
