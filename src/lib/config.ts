// ---------------------------------------------------------------------------
// Environment & Sync Settings Loader
// Validates env vars and the sync settings file at startup using Zod
// ---------------------------------------------------------------------------
//
// Recommended flag values per environment:
//
// ┌──────────────────────────────┬──────────┬──────────┬──────────┐
// │ Flag                         │ Local    │ CI/Test  │ Prod     │
// ├──────────────────────────────┼──────────┼──────────┼──────────┤
// │ ROLLBAR_ENABLED              │ 0        │ 0        │ 1        │
// │ TELEMETRY_CONSENT            │ 0        │ 0        │ 0 *      │
// │ LOG_LEVEL                    │ debug    │ warn     │ info     │
// │ SOURCE_MAX_RETRIES           │ 0        │ 0        │ 0        │
// └──────────────────────────────┴──────────┴──────────┴──────────┘
// * Set to 1 only when record ids may be sent to Rollbar.
//
// Secrets may live in secrets.env (see SECRETS_FILE); everything else has a
// default or lives in config/sync.json.
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import { z } from "zod";

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

/**
 * Coerce environment variable strings to booleans for use in Zod schemas.
 *
 * Truthy values: `"1"`, `1`, `true`, `"true"`
 * Falsy values:  `"0"`, `0`, `false`, `"false"`; anything else fails validation.
 *
 * @param defaultValue - The default when the env var is not set.
 */
const envBool = (defaultValue: boolean) =>
	z
		.preprocess((v) => {
			if (v == null || v === "") return undefined;
			if (v === "1" || v === 1 || v === true || v === "true") return true;
			if (v === "0" || v === 0 || v === false || v === "false") return false;
			return v;
		}, z.boolean().optional())
		.transform((v) => v ?? defaultValue);

const EnvSchema = z
	.object({
		// Rootly (source)
		ROOTLY_API_TOKEN: z.string().min(1),
		ROOTLY_API_BASE_URL: z.string().url().default("https://api.rootly.com/v1"),
		// Root of the human-facing UI, used for default view URLs
		ROOTLY_WEB_BASE_URL: z.string().url().default("https://rootly.com/account"),

		// Glean (index)
		GLEAN_API_TOKEN: z.string().min(1),
		// Backend host of the Glean instance, e.g. acme-be.glean.com
		GLEAN_API_HOST: z
			.string()
			.min(1)
			.refine((host) => !host.includes("/"), {
				message: "GLEAN_API_HOST must be a bare host name (e.g. acme-be.glean.com)",
			})
			.refine((host) => deriveGleanInstanceName(host) !== undefined, {
				message: "GLEAN_API_HOST must start with the instance name (e.g. acme-be.glean.com)",
			}),
		GLEAN_DATASOURCE_NAME: z
			.string()
			.regex(/^[a-z0-9]+$/, "GLEAN_DATASOURCE_NAME must be lowercase alphanumeric")
			.default("rootly"),
		GLEAN_DISPLAY_NAME: z.string().min(1).default("Rootly"),

		// Files
		SYNC_CONFIG_PATH: z.string().min(1).default("config/sync.json"),

		// HTTP behaviour
		HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
		SOURCE_RATE_LIMIT: z.coerce.number().int().positive().default(5),
		SOURCE_MAX_RETRIES: z.coerce.number().int().nonnegative().default(0),
		INDEX_MAX_RETRIES: z.coerce.number().int().nonnegative().default(0),
		INDEX_BATCH_SIZE: z.coerce.number().int().positive().max(1000).default(100),

		// Logging
		LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

		// Rollbar
		ROLLBAR_ENABLED: envBool(false),
		ROLLBAR_SERVER_TOKEN: z.string().default(""),

		// Privacy
		TELEMETRY_CONSENT: envBool(false),
	})
	// Rollbar token validation: require token if enabled
	.refine((env) => !env.ROLLBAR_ENABLED || env.ROLLBAR_SERVER_TOKEN.length > 0, {
		message: "ROLLBAR_SERVER_TOKEN required when ROLLBAR_ENABLED=true",
		path: ["ROLLBAR_SERVER_TOKEN"],
	});

export type AppConfig = z.infer<typeof EnvSchema>;

let _config: AppConfig | null = null;

function formatIssues(error: z.ZodError): string {
	return error.issues.map((i) => `  ${i.path.join(".") || "(root)"}: ${i.message}`).join("\n");
}

/**
 * Load and validate environment configuration.
 * Throws a ConfigError listing every missing or invalid variable.
 * Result is cached after first successful load.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
	if (_config) return _config;

	const result = EnvSchema.safeParse(env);
	if (!result.success) {
		throw new ConfigError(`Environment configuration invalid:\n${formatIssues(result.error)}`);
	}

	_config = result.data;
	return _config;
}

/** Reset cached config (for testing). */
export function resetConfig(): void {
	_config = null;
}

/**
 * Derive the Glean instance name from the backend host:
 * `acme-be.glean.com` → `acme`. `undefined` when the host has none.
 */
export function deriveGleanInstanceName(host: string): string | undefined {
	let instance = host.split(".")[0] ?? "";
	if (instance.includes("-be")) {
		instance = instance.split("-be")[0] ?? "";
	}
	return instance || undefined;
}

// ---------------------------------------------------------------------------
// Sync settings (config/sync.json)
// ---------------------------------------------------------------------------

const EntityTypeConfigSchema = z
	.object({
		enabled: z.boolean(),
		maxItems: z.number().int().positive().optional(),
		itemsPerPage: z.number().int().positive().max(100).default(10),
	})
	.strict();

const IncidentTypeConfigSchema = EntityTypeConfigSchema.extend({
	enhancedData: z
		.object({
			includeEvents: z.boolean().default(true),
			includeActionItems: z.boolean().default(true),
		})
		.strict()
		.default({}),
}).strict();

const disabledType = { enabled: false, itemsPerPage: 10 } as const;

const SyncSettingsSchema = z
	.object({
		dataTypes: z
			.object({
				incidents: IncidentTypeConfigSchema,
				alerts: EntityTypeConfigSchema.default(disabledType),
				schedules: EntityTypeConfigSchema.default(disabledType),
				escalationPolicies: EntityTypeConfigSchema.default(disabledType),
				retrospectives: EntityTypeConfigSchema.default(disabledType),
			})
			.strict(),
		processing: z
			.object({
				// Hard stop for pagination against a misbehaving endpoint
				maxPages: z.number().int().positive().default(10),
			})
			.strict()
			.default({}),
	})
	.strict();

export type EntityTypeConfig = Readonly<z.infer<typeof EntityTypeConfigSchema>>;
export type IncidentTypeConfig = Readonly<z.infer<typeof IncidentTypeConfigSchema>>;
export type SyncSettings = Readonly<z.infer<typeof SyncSettingsSchema>>;

/** Validate an already-parsed settings object. */
export function parseSyncSettings(raw: unknown): SyncSettings {
	const result = SyncSettingsSchema.safeParse(raw);
	if (!result.success) {
		throw new ConfigError(`Sync settings invalid:\n${formatIssues(result.error)}`);
	}
	return result.data;
}

/**
 * Read and validate the sync settings file.
 * Missing files and malformed JSON are reported as ConfigError.
 */
export async function loadSyncSettings(settingsPath: string): Promise<SyncSettings> {
	let content: string;
	try {
		content = await fs.readFile(settingsPath, "utf-8");
	} catch (err) {
		throw new ConfigError(
			`Sync settings file not readable: ${settingsPath} (${err instanceof Error ? err.message : String(err)})`,
		);
	}

	let raw: unknown;
	try {
		raw = JSON.parse(content);
	} catch (err) {
		throw new ConfigError(
			`Invalid JSON in sync settings file ${settingsPath}: ${err instanceof Error ? err.message : String(err)}`,
		);
	}

	return parseSyncSettings(raw);
}
