// ---------------------------------------------------------------------------
// Unit Tests: Base Document Template
// Timestamps, author, view URL fallback, user display names
// ---------------------------------------------------------------------------

import {
	buildDocument,
	defaultViewUrl,
	extractAuthor,
	extractTimestamps,
	parseIsoTimestamp,
	userDisplayName,
} from "@/lib/mappers/base";
import { describe, expect, it } from "vitest";
import { createCapturingLogger, record } from "../helpers/fakes";

describe("parseIsoTimestamp", () => {
	it("converts UTC date-times to epoch seconds", () => {
		expect(parseIsoTimestamp("2024-01-15T10:30:00Z")).toBe(1705314600);
		expect(parseIsoTimestamp("2024-01-15T10:30:00.987654Z")).toBe(1705314600);
	});

	it("applies offsets", () => {
		expect(parseIsoTimestamp("2024-01-15T12:30:00+02:00")).toBe(1705314600);
		expect(parseIsoTimestamp("2024-01-15T05:30:00-0500")).toBe(1705314600);
	});

	it("reads dates and offset-less values as UTC", () => {
		expect(parseIsoTimestamp("2024-01-15")).toBe(1705276800);
		expect(parseIsoTimestamp("2024-01-15T10:30:00")).toBe(1705314600);
	});

	it("rejects anything else", () => {
		expect(parseIsoTimestamp("yesterday")).toBeUndefined();
		expect(parseIsoTimestamp("2024-13-45T99:00:00Z")).toBeUndefined();
		expect(parseIsoTimestamp("")).toBeUndefined();
	});

	it("rejects days that do not exist in the month", () => {
		expect(parseIsoTimestamp("2024-02-30T00:00:00Z")).toBeUndefined();
		expect(parseIsoTimestamp("2023-02-29")).toBeUndefined();
		expect(parseIsoTimestamp("2024-04-31T10:00:00+02:00")).toBeUndefined();
		expect(parseIsoTimestamp("2024-02-29T00:00:00Z")).toBe(1709164800);
	});
});

describe("extractTimestamps", () => {
	it("omits unparsable fields with a warning", () => {
		const { logger, lines } = createCapturingLogger();
		const result = extractTimestamps(
			{ created_at: "2024-01-15T10:30:00Z", updated_at: "not-a-date" },
			"rec-1",
			logger,
		);

		expect(result).toEqual({ createdAt: 1705314600 });
		const warning = lines.find((l) => l.level === "warn");
		expect(warning?.entry).toMatchObject({
			message: "Could not parse updated_at",
			recordId: "rec-1",
			value: "not-a-date",
		});
	});
});

describe("extractTimestamps with impossible dates", () => {
	it("omits a rolled-over calendar date instead of indexing the next month", () => {
		const { logger, messages } = createCapturingLogger();

		expect(extractTimestamps({ created_at: "2024-04-31T10:00:00Z" }, "rec-2", logger)).toEqual({});
		expect(messages("warn")).toEqual(["Could not parse created_at"]);
	});
});

describe("extractAuthor", () => {
	it("reads name and email from the user relationship", () => {
		const attributes = {
			user: { data: { attributes: { full_name: "Ada Admin", email: "ada@example.com" } } },
		};
		expect(extractAuthor(attributes)).toEqual({ name: "Ada Admin", email: "ada@example.com" });
	});

	it("keeps a lone email", () => {
		expect(extractAuthor({ user: { data: { attributes: { email: "a@example.com" } } } })).toEqual({
			email: "a@example.com",
		});
	});

	it("is undefined without a user", () => {
		expect(extractAuthor({ title: "x" })).toBeUndefined();
	});
});

describe("userDisplayName", () => {
	it("falls back through name fields", () => {
		expect(userDisplayName(record("u1", { name: "Jay", full_name: "Jay Full" }))).toBe("Jay");
		expect(userDisplayName(record("u1", { full_name: "Jane Doe" }))).toBe("Jane Doe");
		expect(userDisplayName(record("u1", { first_name: "Jane", last_name: "Roe" }))).toBe("Jane Roe");
		expect(userDisplayName(record("u1", { email: "oncall@example.com" }))).toBe("oncall");
		expect(userDisplayName(record("u7", {}))).toBe("User u7");
	});
});

describe("buildDocument", () => {
	const { logger } = createCapturingLogger();
	const context = { datasource: "rootly", webBaseUrl: "https://rootly.com/account/", logger };

	it("uses the default view URL when the source gives a blank one", () => {
		const doc = buildDocument(context, {
			id: "abc",
			objectType: "EscalationPolicy",
			title: "t",
			sourceUrl: "  ",
			tags: ["status:active", "status:active", "team:sre"],
			body: ["a", "b"],
			attributes: {},
		});

		expect(doc.viewUrl).toBe("https://rootly.com/account/escalation_policies/abc");
		expect(doc.tags).toEqual(["status:active", "team:sre"]);
		expect(doc.body).toEqual({ mimeType: "text/plain", textContent: "a\nb" });
		expect(doc.permissions).toEqual({ allowAnonymousAccess: true });
		expect(doc).not.toHaveProperty("status");
		expect(doc).not.toHaveProperty("createdAt");
	});

	it("keeps a URL the source provides", () => {
		const doc = buildDocument(context, {
			id: "abc",
			objectType: "Incident",
			title: "t",
			sourceUrl: "https://rootly.com/account/incidents/abc-slug",
			tags: [],
			body: [],
			attributes: {},
		});
		expect(doc.viewUrl).toBe("https://rootly.com/account/incidents/abc-slug");
	});

	it("builds default view URLs per object type", () => {
		expect(defaultViewUrl("https://rootly.com/account", "Retrospective", "r1")).toBe(
			"https://rootly.com/account/retrospectives/r1",
		);
	});
});
