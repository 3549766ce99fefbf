// ---------------------------------------------------------------------------
// Sync Logging: structured console lines + Rollbar forwarding
// ---------------------------------------------------------------------------

import { isTelemetryConsentGranted } from "./privacy";
import { serverInstance } from "./rollbar-official";

export type LogLevel = "debug" | "info" | "warn" | "error" | "critical";

const LEVEL_RANK: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	critical: 50,
};

/** Context carried by every line a logger (or its children) writes. */
export interface SyncLogContext {
	runId?: string;
	entityType?: string;
	stage?: string;
	[key: string]: unknown;
}

export interface SyncLoggerOptions {
	/** Minimum level written to the sink (default: info) */
	level?: Exclude<LogLevel, "critical">;
	/** Where formatted lines go (default: stdout/stderr) */
	sink?: (level: LogLevel, line: string) => void;
}

function consoleSink(level: LogLevel, line: string): void {
	if (LEVEL_RANK[level] >= LEVEL_RANK.warn) {
		process.stderr.write(`${line}\n`);
	} else {
		process.stdout.write(`${line}\n`);
	}
}

function describeError(error: unknown): Record<string, unknown> {
	if (error instanceof Error) {
		return { error: error.message, errorName: error.name, stack: error.stack };
	}
	return { error: String(error) };
}

/**
 * Build a safe context payload for Rollbar.
 * When consent is not granted, `recordId` is redacted because it may point at
 * a customer-facing incident.
 */
function safeRollbarContext(fields: Record<string, unknown>): Record<string, unknown> {
	if (isTelemetryConsentGranted() || !("recordId" in fields)) return fields;
	return { ...fields, recordId: "[redacted]" };
}

/**
 * Levelled logger for the sync job.
 *
 * Every line is a single JSON object (`timestamp`, `level`, `message`, the
 * logger context and per-call data). Warnings and above are also sent to
 * Rollbar through the shared server instance.
 */
export class SyncLogger {
	private readonly threshold: number;
	private readonly sink: (level: LogLevel, line: string) => void;

	constructor(
		private readonly context: SyncLogContext = {},
		private readonly options: SyncLoggerOptions = {},
	) {
		this.threshold = LEVEL_RANK[options.level ?? "info"];
		this.sink = options.sink ?? consoleSink;
	}

	/** Logger sharing this one's options with extra context merged in. */
	child(context: SyncLogContext): SyncLogger {
		return new SyncLogger({ ...this.context, ...context }, this.options);
	}

	debug(message: string, data?: Record<string, unknown>): void {
		this.write("debug", message, data);
	}

	info(message: string, data?: Record<string, unknown>): void {
		this.write("info", message, data);
	}

	warn(message: string, data?: Record<string, unknown>): void {
		const fields = this.write("warn", message, data);
		serverInstance.warning(`Sync warning: ${message}`, safeRollbarContext(fields));
	}

	error(message: string, error?: unknown, data?: Record<string, unknown>): void {
		const merged = error === undefined ? data : { ...data, ...describeError(error) };
		const fields = this.write("error", message, merged);
		serverInstance.error(`Sync error: ${message}`, safeRollbarContext(fields));
	}

	critical(message: string, error?: unknown, data?: Record<string, unknown>): void {
		const merged = error === undefined ? data : { ...data, ...describeError(error) };
		const fields = this.write("critical", message, merged);
		serverInstance.critical(`Sync critical: ${message}`, safeRollbarContext(fields));
	}

	private write(
		level: LogLevel,
		message: string,
		data?: Record<string, unknown>,
	): Record<string, unknown> {
		const fields: Record<string, unknown> = { ...this.context, ...data };
		if (LEVEL_RANK[level] >= this.threshold) {
			this.sink(
				level,
				JSON.stringify({ timestamp: new Date().toISOString(), level, message, ...fields }),
			);
		}
		return fields;
	}
}
