// ---------------------------------------------------------------------------
// Glean object definitions for the Rootly datasource
// ---------------------------------------------------------------------------

import type { AppConfig } from "../config";
import type { DatasourceDefinition, ObjectDefinition } from "./types";

export const OBJECT_DEFINITIONS: readonly ObjectDefinition[] = [
	{ name: "Incident", displayLabel: "Incident", docCategory: "TICKETS", summarizable: true },
	{ name: "Alert", displayLabel: "Alert", docCategory: "TICKETS", summarizable: true },
	{ name: "Schedule", displayLabel: "Schedule", docCategory: "UNCATEGORIZED", summarizable: true },
	{
		name: "EscalationPolicy",
		displayLabel: "Escalation Policy",
		docCategory: "UNCATEGORIZED",
		summarizable: true,
	},
	{
		name: "Retrospective",
		displayLabel: "Retrospective",
		docCategory: "UNCATEGORIZED",
		summarizable: true,
	},
];

function escapeRegex(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Datasource declaration covering every object type the mappers emit. */
export function buildDatasourceDefinition(
	config: Pick<AppConfig, "GLEAN_DATASOURCE_NAME" | "GLEAN_DISPLAY_NAME" | "ROOTLY_WEB_BASE_URL">,
): DatasourceDefinition {
	const webBase = config.ROOTLY_WEB_BASE_URL.replace(/\/+$/, "");
	return {
		name: config.GLEAN_DATASOURCE_NAME,
		displayName: config.GLEAN_DISPLAY_NAME,
		datasourceCategory: "TICKETS",
		urlRegex: `${escapeRegex(webBase)}/.*`,
		objectDefinitions: [...OBJECT_DEFINITIONS],
		aliases: [],
	};
}
