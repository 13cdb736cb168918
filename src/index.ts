/**
 * conversa - conversation session orchestration engine
 *
 * Scripted dialog flows blended with retrieval-augmented LLM responses,
 * with per-conversation state, language handling and graceful degradation.
 */

// Core
export { ResponseCoordinator } from "./core/ResponseCoordinator";
export type {
  ResponseCoordinatorOptions,
  HandleTurnOptions,
} from "./core/ResponseCoordinator";
export { SessionStore } from "./core/SessionStore";
export type { SessionStoreOptions, WithLockOptions } from "./core/SessionStore";
export { SessionLock } from "./core/SessionLock";
export type { ReleaseLock } from "./core/SessionLock";
export {
  DialogScript,
  loadDialogScript,
  parseDialogScript,
  validateDialogScript,
} from "./core/DialogScript";
export { DialogEngine } from "./core/DialogEngine";
export type {
  AdvanceOptions,
  DecideContext,
  DialogEngineOptions,
} from "./core/DialogEngine";
export { InMemoryKnowledgeIndex } from "./core/KnowledgeIndex";
export { ContextRetriever } from "./core/ContextRetriever";
export {
  ingestCatalog,
  parseCatalog,
  placeToChunk,
  extractRequiredFeatures,
  EMBEDDING_BATCH_SIZE,
} from "./core/KnowledgeIngestor";
export type {
  CatalogSection,
  Place,
  PlaceFeature,
  IngestOptions,
  IngestResult,
} from "./core/KnowledgeIngestor";
export { PromptAssembler, PromptSection } from "./core/PromptAssembler";
export type {
  AssembleInput,
  AssembledPrompt,
  PromptAssemblerOptions,
} from "./core/PromptAssembler";
export { LanguagePipeline } from "./core/LanguagePipeline";
export type { LanguagePipelineOptions } from "./core/LanguagePipeline";
export { PersonaSet, loadPersonas } from "./core/PersonaLoader";
export {
  ProverbBook,
  DEFAULT_PROVERB,
  loadCatalanProverbs,
  parseProverbs,
  sentimentCategory,
} from "./core/ProverbBook";
export type { ProverbBookOptions } from "./core/ProverbBook";
export type { LoadPersonasOptions } from "./core/PersonaLoader";

// Scripts
export { loadRestaurantBookingScript } from "./scripts/restaurantBooking";

// Configuration
export {
  EngineConfigSchema,
  LanguageCodeSchema,
  resolveConfig,
  loadConfig,
} from "./config";
export type { EngineConfig, EngineConfigInput } from "./config";

// Providers
export * from "./providers";

// Constants
export {
  APOLOGY_RESPONSE,
  DEFAULT_PERSONA,
  PROVERB_LABEL,
  TRANSLATION_LABELS,
} from "./constants";

// Utils
export * from "./utils";

// Types
export * from "./types";
