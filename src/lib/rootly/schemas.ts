// ---------------------------------------------------------------------------
// Rootly API: Zod Validation Schemas
// JSON:API envelopes; record bodies stay loosely typed on purpose.
// ---------------------------------------------------------------------------

import { z } from "zod";

// --- Record ---

// A malformed block becomes null so the record still reaches its mapper
const objectBlock = z.preprocess(
	(value) =>
		value === undefined || (typeof value === "object" && value !== null && !Array.isArray(value))
			? value
			: null,
	z.record(z.unknown()).nullish(),
);

export const RawRecordSchema = z.object({
	id: z.union([z.string().min(1), z.number().int()]).transform(String),
	type: z.string().optional(),
	attributes: objectBlock,
	relationships: objectBlock,
});

/** A record exactly as the source returned it, minus unknown top-level keys. */
export type RawRecord = z.infer<typeof RawRecordSchema>;

// --- Envelopes ---

export const ListEnvelopeSchema = z.object({
	data: z.array(z.unknown()),
	meta: z
		.object({
			current_page: z.number().nullish(),
			total_pages: z.number().nullish(),
			total_count: z.number().nullish(),
		})
		.partial()
		.nullish(),
});

export const ResourceEnvelopeSchema = z.object({
	data: z.union([z.array(z.unknown()), z.record(z.unknown()), z.null()]),
});
