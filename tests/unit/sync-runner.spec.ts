// ---------------------------------------------------------------------------
// Unit Tests: Sync Runner
// Declaration order, batching, nothing-to-sync, submission failure
// ---------------------------------------------------------------------------

import { GleanApiError } from "@/lib/glean/client";
import { buildDatasourceDefinition } from "@/lib/glean/object-definitions";
import { IndexSubmissionError, runSync } from "@/lib/sync/runner";
import type { NormalizedDocument, SyncOutcome } from "@/lib/sync/types";
import { describe, expect, it, vi } from "vitest";
import { createCapturingLogger } from "../helpers/fakes";

const datasource = buildDatasourceDefinition({
	GLEAN_DATASOURCE_NAME: "rootly",
	GLEAN_DISPLAY_NAME: "Rootly",
	ROOTLY_WEB_BASE_URL: "https://rootly.com/account",
});

function doc(id: string): NormalizedDocument {
	return {
		id,
		datasource: "rootly",
		objectType: "Incident",
		title: id,
		tags: [],
		body: { mimeType: "text/plain", textContent: id },
		viewUrl: `https://rootly.com/account/incidents/${id}`,
		permissions: { allowAnonymousAccess: true },
	};
}

function outcome(documents: NormalizedDocument[]): SyncOutcome {
	return {
		report: {
			runId: "run-1",
			startTime: "2024-01-15T10:00:00.000Z",
			endTime: "2024-01-15T10:01:00.000Z",
			since: null,
			results: { incidents: { status: "success", documentsCreated: documents.length } },
			summary: { totalDocuments: documents.length, duplicatesRemoved: 0, syncStatus: "completed" },
		},
		documents,
	};
}

function setup(documents: NormalizedDocument[]) {
	const coordinator = { run: vi.fn(async (_since?: string) => outcome(documents)) };
	const index = {
		declareDatasource: vi.fn(async () => {}),
		indexDocuments: vi.fn(async (_name: string, _docs: NormalizedDocument[]) => {}),
	};
	const capture = createCapturingLogger();
	return { coordinator, index, ...capture };
}

describe("runSync", () => {
	it("declares the datasource before running and submits in batches", async () => {
		const { coordinator, index, logger } = setup(["a", "b", "c", "d", "e"].map(doc));

		await runSync({ coordinator, index, datasource, batchSize: 2, logger }, "2024-01-01");

		expect(index.declareDatasource).toHaveBeenCalledWith(datasource);
		expect(coordinator.run).toHaveBeenCalledWith("2024-01-01");
		const declaredAt = index.declareDatasource.mock.invocationCallOrder[0] ?? 0;
		const ranAt = coordinator.run.mock.invocationCallOrder[0] ?? 0;
		expect(declaredAt).toBeLessThan(ranAt);
		const submitted = index.indexDocuments.mock.calls.map(([name, docs]) => [
			name,
			docs.map((d) => d.id),
		]);
		expect(submitted).toEqual([
			["rootly", ["a", "b"]],
			["rootly", ["c", "d"]],
			["rootly", ["e"]],
		]);
	});

	it("submits nothing when there is nothing to sync", async () => {
		const { coordinator, index, logger, messages } = setup([]);

		const result = await runSync({ coordinator, index, datasource, logger });

		expect(result.documents).toEqual([]);
		expect(index.indexDocuments).not.toHaveBeenCalled();
		expect(messages("info")).toContain("Nothing to sync");
	});

	it("does not run when the datasource cannot be declared", async () => {
		const { coordinator, index, logger } = setup([doc("a")]);
		index.declareDatasource.mockRejectedValueOnce(new Error("forbidden"));

		await expect(runSync({ coordinator, index, datasource, logger })).rejects.toThrow("forbidden");
		expect(coordinator.run).not.toHaveBeenCalled();
	});

	it("raises IndexSubmissionError with the structured error body logged", async () => {
		const { coordinator, index, logger, lines } = setup(["a", "b", "c"].map(doc));
		index.indexDocuments
			.mockResolvedValueOnce(undefined)
			.mockRejectedValueOnce(
				new GleanApiError(400, "Bad Request", '{"message":"bad doc"}', "https://x.test"),
			);

		const error = await runSync({ coordinator, index, datasource, batchSize: 2, logger }).catch(
			(err: unknown) => err,
		);

		expect(error).toBeInstanceOf(IndexSubmissionError);
		expect(error).toMatchObject({ batchIndex: 1 });
		expect(lines.find((l) => l.level === "error")?.entry).toMatchObject({
			message: "Submission failed",
			batchIndex: 1,
			batchSize: 1,
			status: 400,
			details: { message: "bad doc" },
		});
	});
});
