// ---------------------------------------------------------------------------
// Unit Tests: Alert Mapper
// ---------------------------------------------------------------------------

import type { AlertEnrichment } from "@/lib/fetchers/alert-enrichment";
import { mapAlert } from "@/lib/mappers/alert";
import { describe, expect, it } from "vitest";
import { createCapturingLogger, record } from "../helpers/fakes";

const { logger } = createCapturingLogger();
const ctx = { datasource: "rootly", webBaseUrl: "https://rootly.com/account", logger };

const noContext: AlertEnrichment = {
	monitoringContext: { routingRules: [], urgencies: [], alertGroups: [], recentEvents: [] },
};

describe("mapAlert", () => {
	it("renders fields, tags and capped monitoring sections", () => {
		const alert = record("al1", {
			data: { summary: "Disk full on db-1" },
			status: "triggered",
			severity: "high",
			source_type: "datadog",
			message: "disk 95%",
			details: { host: "db-1" },
		});
		const enrichment: AlertEnrichment = {
			monitoringContext: {
				routingRules: [1, 2, 3, 4].map((n) =>
					record(`r${n}`, {
						name: `Rule ${n}`,
						match_mode: "all",
						...(n === 1 && { conditions: [{ field: "x" }] }),
					}),
				),
				urgencies: [record("ug1", { name: "High", level: 1 })],
				alertGroups: [],
				recentEvents: [record("ev1", null)],
			},
		};

		const doc = mapAlert({ record: alert, enrichment }, ctx);

		expect(doc?.title).toBe("[ALERT] Disk full on db-1");
		expect(doc?.tags).toEqual(["alert_status:triggered", "priority:high", "source:datadog"]);
		expect(doc?.summary?.textContent).toBe("disk 95%");
		expect(doc?.body.textContent).toBe(
			[
				"Title: Disk full on db-1",
				"Status: triggered",
				"Priority: high",
				"Source: datadog",
				"\nDescription:\ndisk 95%",
				'\nDetails:\n{"host":"db-1"}',
				"\n## Alert Routing Rules",
				"- **Rule 1** (Match: all)",
				'  Conditions: [{"field":"x"}]',
				"- **Rule 2** (Match: all)",
				"- **Rule 3** (Match: all)",
				"\n## Alert Urgency Levels",
				"- **High**: Level 1",
			].join("\n"),
		);
		expect(doc?.viewUrl).toBe("https://rootly.com/account/alerts/al1");
	});

	it("truncates a description used as the title", () => {
		const alert = record("al2", {
			description: "  A very long description that exceeds the fifty character limit for titles ",
		});

		expect(mapAlert({ record: alert, enrichment: noContext }, ctx)?.title).toBe(
			"[ALERT] A very long description that exceeds the fifty cha...",
		);
	});

	it("falls back to the alert id", () => {
		const alert = record("al9", { status: "ok" });
		expect(mapAlert({ record: alert, enrichment: noContext }, ctx)?.title).toBe("[ALERT] Alert al9");
	});

	it("prefers summary over title and name", () => {
		const alert = record("al3", { summary: "S", title: "T", name: "N" });
		expect(mapAlert({ record: alert, enrichment: noContext }, ctx)?.title).toBe("[ALERT] S");
	});
});
