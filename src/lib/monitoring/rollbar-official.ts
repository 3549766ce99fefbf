// ---------------------------------------------------------------------------
// Rollbar Configuration
// Singleton instance with environment detection, test no-op, PII filtering
// and structured error reporting for the sync job.
// ---------------------------------------------------------------------------

import Rollbar from "rollbar";
import { isTelemetryConsentGranted } from "./privacy";

type ReportFn = (message: string | Error, custom?: Record<string, unknown>) => void;

export interface RollbarReporter {
	critical: ReportFn;
	error: ReportFn;
	warning: ReportFn;
	info: ReportFn;
	debug: ReportFn;
	wait: (cb: () => void) => void;
}

// ── Enablement rules ──────────────────────────────────────────────────────

const isTestMode = () =>
	process.env.NODE_ENV === "test" ||
	// Vitest uses VITEST, VITEST_POOL_ID; Jest uses JEST_WORKER_ID
	typeof process.env.VITEST !== "undefined" ||
	typeof process.env.JEST_WORKER_ID !== "undefined";

/**
 * Read at first use rather than at import, so a token loaded from the
 * secrets file by the CLI still enables reporting.
 */
export function isRollbarEnabled(): boolean {
	const explicitlyEnabled =
		process.env.ROLLBAR_ENABLED === "1" || process.env.ROLLBAR_ENABLED === "true";
	return !isTestMode() && explicitlyEnabled && Boolean(process.env.ROLLBAR_SERVER_TOKEN);
}

const noop: ReportFn = () => {};

const noopReporter: RollbarReporter = {
	critical: noop,
	error: noop,
	warning: noop,
	info: noop,
	debug: noop,
	wait: (cb) => cb(),
};

function createRollbarReporter(): RollbarReporter {
	const rollbar = new Rollbar({
		accessToken: process.env.ROLLBAR_SERVER_TOKEN,
		// The CLI reports explicitly and flushes before exit
		captureUncaught: false,
		captureUnhandledRejections: false,
		environment: process.env.NODE_ENV || "development",
		enabled: true,
		payload: {
			server: { root: process.cwd() },
		},
		// Always scrub secrets; scrub person fields when consent is not granted
		scrubFields: [
			"password",
			"apiKey",
			"api_key",
			"secret",
			"token",
			"authorization",
			...(isTelemetryConsentGranted() ? [] : ["email", "user_email", "userEmail", "person"]),
		],
	});

	return {
		critical: (message, custom) => rollbar.critical(message, custom),
		error: (message, custom) => rollbar.error(message, custom),
		warning: (message, custom) => rollbar.warning(message, custom),
		info: (message, custom) => rollbar.info(message, custom),
		debug: (message, custom) => rollbar.debug(message, custom),
		wait: (cb) => rollbar.wait(cb),
	};
}

let instance: RollbarReporter | null = null;

function resolveInstance(): RollbarReporter {
	if (!instance) {
		instance = isRollbarEnabled() ? createRollbarReporter() : noopReporter;
	}
	return instance;
}

// Server-side singleton. In test mode or when disabled, calls go to a no-op reporter.
export const serverInstance: RollbarReporter = {
	critical: (message, custom) => resolveInstance().critical(message, custom),
	error: (message, custom) => resolveInstance().error(message, custom),
	warning: (message, custom) => resolveInstance().warning(message, custom),
	info: (message, custom) => resolveInstance().info(message, custom),
	debug: (message, custom) => resolveInstance().debug(message, custom),
	wait: (cb) => resolveInstance().wait(cb),
};

// ── Flush helper ──────────────────────────────────────────────────────────

/** Wait for queued reports to be sent; resolves at once when nothing was reported. */
export function flushRollbar(): Promise<void> {
	return new Promise((resolve) => {
		if (!instance) return resolve();
		instance.wait(() => resolve());
	});
}
