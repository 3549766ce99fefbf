// ---------------------------------------------------------------------------
// Sync CLI
// Validates input, loads configuration, wires clients and runs one sync
// ---------------------------------------------------------------------------

import { type AppConfig, ConfigError, loadConfig, loadSyncSettings } from "@/lib/config";
import type { SourceReader } from "@/lib/fetchers/types";
import { createGleanClient } from "@/lib/glean/factory";
import { buildDatasourceDefinition } from "@/lib/glean/object-definitions";
import { parseIsoTimestamp } from "@/lib/mappers/base";
import { flushRollbar } from "@/lib/monitoring/rollbar-official";
import { SyncLogger, type SyncLoggerOptions } from "@/lib/monitoring/sync-logger";
import { createRootlyClient } from "@/lib/rootly/factory";
import * as dotenv from "dotenv";
import * as fs from "node:fs/promises";
import { SyncCoordinator } from "./coordinator";
import { createPipelines } from "./pipelines";
import { type IndexWriter, runSync } from "./runner";

const SINCE_FORMAT = /^\d{4}-\d{2}-\d{2}(?:T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

export class InvalidSinceError extends Error {
	constructor(value: string) {
		super(`Invalid since timestamp "${value}": expected ISO-8601, e.g. 2024-01-15T10:30:00Z`);
		this.name = "InvalidSinceError";
	}
}

/** Validate the optional positional `since` argument. */
export function parseSinceArgument(value: string | undefined): string | undefined {
	if (value === undefined || value === "") return undefined;
	if (!SINCE_FORMAT.test(value) || parseIsoTimestamp(value) === undefined) {
		throw new InvalidSinceError(value);
	}
	return value;
}

function isMissingFile(err: unknown): boolean {
	return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Fill unset variables from a dotenv file. Variables already present in the
 * environment are left untouched. A missing file is skipped; any other read
 * failure is a ConfigError.
 */
export async function loadSecretsFile(
	path: string,
	env: NodeJS.ProcessEnv,
	logger: SyncLogger,
): Promise<void> {
	let content: string;
	try {
		content = await fs.readFile(path, "utf-8");
	} catch (err) {
		if (!isMissingFile(err)) {
			const reason = err instanceof Error ? err.message : String(err);
			throw new ConfigError(`Could not read secrets file ${path}: ${reason}`);
		}
		logger.debug("No secrets file loaded", { path });
		return;
	}
	// Existing variables win
	for (const [key, value] of Object.entries(dotenv.parse(content))) {
		if (env[key] === undefined) env[key] = value;
	}
}

export interface CliDependencies {
	env?: NodeJS.ProcessEnv;
	sink?: SyncLoggerOptions["sink"];
	createSource?: (config: AppConfig, logger: SyncLogger) => SourceReader;
	createIndex?: (config: AppConfig) => IndexWriter;
}

/**
 * Run one sync from command-line arguments.
 *
 * @returns the process exit code: 0 on success (including nothing to sync), 1 otherwise
 */
export async function runCli(args: string[], deps: CliDependencies = {}): Promise<number> {
	const env = deps.env ?? process.env;
	let logger = new SyncLogger({}, { sink: deps.sink });

	try {
		const since = parseSinceArgument(args[0]);

		await loadSecretsFile(env.SECRETS_FILE ?? "secrets.env", env, logger);

		const config = loadConfig(env);
		logger = new SyncLogger({}, { level: config.LOG_LEVEL, sink: deps.sink });
		const settings = await loadSyncSettings(config.SYNC_CONFIG_PATH);

		const source = (deps.createSource ?? createRootlyClient)(config, logger);
		const index = (deps.createIndex ?? createGleanClient)(config);

		const coordinator = new SyncCoordinator({
			pipelines: createPipelines(source, settings, {
				datasource: config.GLEAN_DATASOURCE_NAME,
				webBaseUrl: config.ROOTLY_WEB_BASE_URL,
			}),
			logger,
		});
		logger.info("Enabled entity types", { entityTypes: coordinator.getEnabledEntityTypes() });

		const { report } = await runSync(
			{
				coordinator,
				index,
				datasource: buildDatasourceDefinition(config),
				batchSize: config.INDEX_BATCH_SIZE,
				logger,
			},
			since,
		);
		logger.info("Sync completed", { results: report.results, summary: report.summary });
		return 0;
	} catch (error) {
		if (error instanceof InvalidSinceError || error instanceof ConfigError) {
			logger.error(error.message);
		} else {
			logger.critical("Sync failed", error);
		}
		return 1;
	} finally {
		await flushRollbar();
	}
}
