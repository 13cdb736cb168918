/**
 * Knowledge ingestion - turns a place catalog into embedded context chunks
 * and publishes them as one index snapshot
 */

import { z } from "zod";
import featureKeywords from "../data/feature-keywords.json";
import type { ContextChunk, Embedder } from "../types/retrieval";
import { ValidationError } from "../utils/errors";
import { generateChunkId } from "../utils/id";
import { logger } from "../utils/logger";
import { throwIfAborted } from "../utils/retry";
import type { InMemoryKnowledgeIndex } from "./KnowledgeIndex";

export const EMBEDDING_BATCH_SIZE = 32;
export const DEFAULT_BOOKING_EMAIL = "bookings@example.com";

const PlaceSchema = z.object({
  name: z.string().default("Unknown"),
  description: z.string().default(""),
  direction: z.string().default(""),
  booking: z
    .union([
      z.boolean(),
      z.object({
        has_booking: z.boolean().default(false),
        email: z.string().optional(),
      }),
    ])
    .optional(),
  features: z
    .object({
      has_terrace: z.boolean().optional(),
      sea_view: z.boolean().optional(),
      booking: z.boolean().optional(),
    })
    .default({}),
});

const SectionSchema = z.object({
  section: z.string().default("Unknown"),
  places: z.array(PlaceSchema).default([]),
});

/**
 * `{ sections: [...] }`, a single section, or a bare array of sections
 */
const CatalogSchema = z.union([
  z.object({ sections: z.array(SectionSchema) }),
  z.array(SectionSchema),
  SectionSchema.extend({ places: z.array(PlaceSchema) }),
]);

export type Place = z.infer<typeof PlaceSchema>;
export type CatalogSection = z.infer<typeof SectionSchema>;

export type PlaceFeature = "hasTerrace" | "seaView" | "booking";

export interface IngestOptions {
  sourceId?: string;
  batchSize?: number;
  signal?: AbortSignal;
}

export interface IngestResult {
  chunkCount: number;
  batches: number;
}

/**
 * Validate a catalog document and normalize it to a list of sections
 */
export function parseCatalog(document: unknown): CatalogSection[] {
  const result = CatalogSchema.safeParse(document);
  if (!result.success) {
    throw new ValidationError("Unrecognized catalog structure", {
      issues: result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`
      ),
    });
  }
  const catalog = result.data;
  if (Array.isArray(catalog)) {
    return catalog;
  }
  return "sections" in catalog ? catalog.sections : [catalog];
}

/**
 * Searchable text and metadata of one place. The embedding is filled later.
 */
export function placeToChunk(
  place: Place,
  category: string,
  sourceId: string
): Omit<ContextChunk, "embedding"> {
  const booking = place.booking;
  const hasBooking =
    typeof booking === "boolean" ? booking : booking?.has_booking ?? false;
  const email =
    (typeof booking === "object" ? booking.email : undefined) ??
    DEFAULT_BOOKING_EMAIL;
  const hasTerrace = place.features.has_terrace ?? false;
  const seaView = place.features.sea_view ?? false;
  const bookable = place.features.booking ?? hasBooking;

  const lines = [place.name, place.description, `Location: ${place.direction}`];
  if (hasTerrace) {
    lines.push("Has a terrace.");
  }
  if (seaView) {
    lines.push("Has a sea view.");
  }
  if (bookable) {
    lines.push("Can be booked.");
  }
  const text = lines.join("\n");

  return {
    id: generateChunkId(`${sourceId}:${category}:${place.name}`, text),
    sourceId,
    text,
    metadata: {
      category,
      name: place.name,
      direction: place.direction,
      hasBooking,
      email,
      hasTerrace,
      seaView,
      booking: bookable,
    },
  };
}

/**
 * Embed every place of a catalog in batches and publish the chunks as the
 * index's new snapshot. Nothing is published when any batch fails.
 */
export async function ingestCatalog(
  document: unknown,
  embedder: Embedder,
  index: InMemoryKnowledgeIndex,
  options: IngestOptions = {}
): Promise<IngestResult> {
  const sourceId = options.sourceId ?? "catalog";
  const batchSize = options.batchSize ?? EMBEDDING_BATCH_SIZE;
  const drafts = parseCatalog(document).flatMap((section) =>
    section.places.map((place) => placeToChunk(place, section.section, sourceId))
  );

  const chunks: ContextChunk[] = [];
  let batches = 0;
  for (let start = 0; start < drafts.length; start += batchSize) {
    throwIfAborted(options.signal);
    const batch = drafts.slice(start, start + batchSize);
    batches++;
    logger.debug(
      `[KnowledgeIngestor] Embedding batch ${batches} with ${batch.length} place(s)`
    );

    const embeddings = await embedder.embedBatch(
      batch.map((draft) => draft.text),
      options.signal
    );
    if (embeddings.length !== batch.length) {
      throw new ValidationError(
        `Embedder ${embedder.name} returned ${embeddings.length} vectors for ${batch.length} texts`
      );
    }
    batch.forEach((draft, i) => chunks.push({ ...draft, embedding: embeddings[i] }));
  }

  index.replace(chunks);
  logger.info(
    `[KnowledgeIngestor] Ingested ${chunks.length} place(s) in ${batches} batch(es)`
  );
  return { chunkCount: chunks.length, batches };
}

const PLACE_FEATURES: PlaceFeature[] = ["hasTerrace", "seaView", "booking"];

const FEATURE_KEYWORDS: Record<PlaceFeature, Record<string, string[]>> =
  featureKeywords;

/**
 * Features the user asks for, as a retrieval metadata filter.
 * Unknown languages use the English keywords.
 */
export function extractRequiredFeatures(
  text: string,
  language: string
): Partial<Record<PlaceFeature, true>> {
  const lowered = text.toLowerCase();
  const required: Partial<Record<PlaceFeature, true>> = {};

  for (const feature of PLACE_FEATURES) {
    const byLanguage = FEATURE_KEYWORDS[feature];
    const keywords = byLanguage[language] ?? byLanguage.en ?? [];
    if (keywords.some((keyword) => lowered.includes(keyword))) {
      required[feature] = true;
    }
  }
  return required;
}
