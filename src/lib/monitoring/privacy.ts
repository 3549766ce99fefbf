// ---------------------------------------------------------------------------
// Privacy & Consent helpers for telemetry/monitoring.
// Default: no record identifiers attached unless explicit consent.
// ---------------------------------------------------------------------------

/**
 * Returns whether telemetry consent is granted.
 * Environment-driven so it can be read before config validation runs.
 */
export function isTelemetryConsentGranted(): boolean {
	return process.env.TELEMETRY_CONSENT === "1" || process.env.TELEMETRY_CONSENT === "true";
}
