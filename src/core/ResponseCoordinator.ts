/**
 * ResponseCoordinator - runs one conversational turn end to end
 *
 * received → language_detected → dialog_advanced → context_retrieved →
 * prompt_assembled → generated → translated → committed
 *
 * Every side effect on the session is applied to the lock-held draft and
 * committed by SessionStore.withLock only when the turn completes. The
 * coordinator never throws: failures become a TurnResponse status.
 */

import { z } from "zod";
import {
  APOLOGY_RESPONSE,
  DEFAULT_PERSONA,
  PROVERB_LABEL,
  TRANSLATION_LABELS,
} from "../constants";
import { LanguageCodeSchema, type EngineConfig } from "../config";
import type { CompletionProvider } from "../types/ai";
import {
  TurnStage,
  type TurnMetadata,
  type TurnRequest,
  type TurnResponse,
  type TurnStatus,
} from "../types/coordinator";
import type { DialogAction, SlotExtractor, SlotValue } from "../types/dialog";
import type {
  LanguageDetector,
  SentimentAnalyzer,
  TranslationStatus,
  Translator,
} from "../types/language";
import type {
  ChunkMetadata,
  Embedder,
  KnowledgeIndex,
  ScoredChunk,
} from "../types/retrieval";
import type { Proverb, ProverbSource } from "../types/proverb";
import type { DialogMode, SessionState, Turn } from "../types/session";
import {
  ConversaError,
  ExternalServiceError,
  InternalError,
  SessionBusyError,
  SessionNotFoundError,
  TurnAbortedError,
  ValidationError,
  getErrorMessage,
} from "../utils/errors";
import { logger } from "../utils/logger";
import {
  exponentialBackoff,
  retry,
  throwIfAborted,
  withTimeout,
} from "../utils/retry";
import { renderTemplate } from "../utils/template";
import { sanitizeMessage } from "../utils/text";
import { ContextRetriever } from "./ContextRetriever";
import { DialogEngine } from "./DialogEngine";
import type { DialogScript } from "./DialogScript";
import { extractRequiredFeatures } from "./KnowledgeIngestor";
import { LanguagePipeline } from "./LanguagePipeline";
import type { PersonaSet } from "./PersonaLoader";
import { sentimentCategory } from "./ProverbBook";
import { PromptAssembler } from "./PromptAssembler";
import { SessionStore } from "./SessionStore";

const TurnRequestSchema = z.object({
  conversationId: z.string().min(1).max(128).optional(),
  message: z.string(),
  language: LanguageCodeSchema.optional(),
});

export interface ResponseCoordinatorOptions {
  config: EngineConfig;
  script: DialogScript;
  extractor: SlotExtractor;
  completion: CompletionProvider;
  /** Retrieval is skipped without an index and an embedder */
  index?: KnowledgeIndex;
  embedder?: Embedder;
  detector?: LanguageDetector;
  translator?: Translator;
  sentiment?: SentimentAnalyzer;
  personas?: PersonaSet;
  /** Appends a proverb matching the turn's sentiment to free-form replies */
  proverbs?: ProverbSource;
  /** Metadata filter for retrieval; defaults to the requested place features */
  contextFilter?: (text: string, language: string) => ChunkMetadata | undefined;
  /** Clock, epoch milliseconds */
  now?: () => number;
}

export interface HandleTurnOptions {
  signal?: AbortSignal;
}

interface TurnTrace {
  stages: TurnStage[];
  actions: DialogAction[];
  stepId?: string;
  mode?: DialogMode;
  translation?: TranslationStatus;
  untranslated: boolean;
  attempts: number;
  contextChunkIds: string[];
  proverbId?: string;
}

interface GenerationResult {
  text: string;
  degraded: boolean;
}

export class ResponseCoordinator {
  readonly store: SessionStore;
  readonly dialog: DialogEngine;
  readonly language: LanguagePipeline;
  readonly assembler: PromptAssembler;
  private readonly retriever?: ContextRetriever;
  private readonly config: EngineConfig;
  private readonly completion: CompletionProvider;
  private readonly personas?: PersonaSet;
  private readonly proverbs?: ProverbSource;
  private readonly contextFilter: (
    text: string,
    language: string
  ) => ChunkMetadata | undefined;
  private readonly now: () => number;

  constructor(options: ResponseCoordinatorOptions) {
    const { config } = options;
    this.config = config;
    this.completion = options.completion;
    this.personas = options.personas;
    this.proverbs = options.proverbs;
    this.now = options.now ?? Date.now;
    this.contextFilter = options.contextFilter ?? defaultContextFilter;

    this.dialog = new DialogEngine(options.script, options.extractor, {
      extractionTimeoutMs: config.dialog.extractionTimeoutMs,
    });
    this.store = new SessionStore({
      entryStep: options.script.entry,
      initialMode: initialMode(options.script),
      defaultLanguage: config.language.default,
      ttlMs: config.session.ttlMs,
      lockTimeoutMs: config.session.lockTimeoutMs,
      implicitCreate: config.session.implicitCreate,
      now: this.now,
    });
    this.language = new LanguagePipeline({
      detector: options.detector,
      translator: options.translator,
      sentiment: options.sentiment,
      supportedLanguages: config.language.supported,
      defaultLanguage: config.language.default,
      translationTimeoutMs: config.language.translationTimeoutMs,
      analysisTimeoutMs: config.language.analysisTimeoutMs,
    });
    this.assembler = new PromptAssembler({
      maxPromptTokens: config.prompt.maxPromptTokens,
      historyWindow: config.prompt.historyWindow,
    });
    if (options.index && options.embedder) {
      this.retriever = new ContextRetriever(options.index, options.embedder);
    }
  }

  /**
   * Periodic removal of idle sessions
   */
  start(): void {
    this.store.startSweeper(this.config.session.sweepIntervalMs);
  }

  stop(): void {
    this.store.stopSweeper();
  }

  async handleTurn(
    request: TurnRequest,
    options: HandleTurnOptions = {}
  ): Promise<TurnResponse> {
    const trace: TurnTrace = {
      stages: [TurnStage.RECEIVED],
      actions: [],
      untranslated: false,
      attempts: 0,
      contextChunkIds: [],
    };

    const parsed = TurnRequestSchema.safeParse(request);
    if (!parsed.success) {
      const error = new ValidationError("Invalid turn request", {
        issues: parsed.error.issues.map(
          (issue) => `${issue.path.join(".")}: ${issue.message}`
        ),
      });
      return this.errorResponse(
        error,
        typeof request.conversationId === "string" ? request.conversationId : "",
        undefined,
        trace
      );
    }

    const message = sanitizeMessage(
      parsed.data.message,
      this.config.input.maxMessageLength
    );
    if (message.length === 0) {
      return this.errorResponse(
        new ValidationError("Message is empty"),
        parsed.data.conversationId ?? "",
        parsed.data.language,
        trace
      );
    }

    let session: SessionState;
    try {
      session = this.store.getOrCreate(parsed.data.conversationId);
    } catch (error) {
      return this.errorResponse(
        error,
        parsed.data.conversationId ?? "",
        parsed.data.language,
        trace
      );
    }

    try {
      return await this.store.withLock(
        session.conversationId,
        (draft) =>
          this.runTurn(draft, message, parsed.data.language, trace, options.signal),
        { signal: options.signal }
      );
    } catch (error) {
      return this.errorResponse(
        error,
        session.conversationId,
        parsed.data.language ?? session.language,
        trace
      );
    }
  }

  /**
   * Conversation history, oldest first; empty for unknown conversations
   */
  getDialogueLog(conversationId: string): Turn[] {
    return this.store.get(conversationId)?.history ?? [];
  }

  /**
   * Restart the script for a conversation. History is kept.
   * Resolves false for unknown conversations.
   */
  async resetSession(
    conversationId: string,
    options: HandleTurnOptions = {}
  ): Promise<boolean> {
    if (!this.store.has(conversationId)) {
      return false;
    }
    await this.store.withLock(
      conversationId,
      (draft) => {
        draft.currentStep = this.dialog.script.entry;
        draft.slots = {};
        draft.mode = initialMode(this.dialog.script);
        draft.lastActive = this.now();
      },
      { signal: options.signal }
    );
    logger.info(`[Coordinator] Reset session ${conversationId}`);
    return true;
  }

  private async runTurn(
    draft: SessionState,
    message: string,
    pinnedLanguage: string | undefined,
    trace: TurnTrace,
    signal?: AbortSignal
  ): Promise<TurnResponse> {
    const { pivot } = this.config.language;
    const previousStep = draft.currentStep;

    // Language
    const language = await this.resolveLanguage(
      draft,
      message,
      pinnedLanguage,
      signal
    );
    trace.stages.push(TurnStage.LANGUAGE_DETECTED);

    const inbound = await this.language.translate(message, pivot, language, signal);
    const workingText = inbound.text;
    const workingLanguage = inbound.status === "unavailable" ? language : pivot;
    trace.untranslated = inbound.status === "unavailable";
    const sentiment = await this.language.sentiment(workingText, signal);

    // Dialog
    let mode = draft.mode;
    if (mode === "awaiting_trigger" && this.engages(draft, message, workingText)) {
      mode = "scripted";
      logger.debug(`[Coordinator] ${draft.conversationId} engaged the script`);
    }

    let nextStep = draft.currentStep;
    let slotUpdates: Record<string, SlotValue> = {};
    if (mode === "scripted") {
      const outcome = await this.dialog.advance(draft, workingText, {
        language: workingLanguage,
        signal,
      });
      nextStep = outcome.nextStepId;
      slotUpdates = outcome.slotUpdates;
      trace.actions = outcome.actions;
      if (outcome.actions.some((action) => action.type === "handoff")) {
        mode = "freeform";
      }
    }
    const slots = { ...draft.slots, ...slotUpdates };
    const scriptedReply = mode === "scripted" || nextStep !== previousStep;
    trace.stepId = nextStep;
    trace.mode = mode;
    trace.stages.push(TurnStage.DIALOG_ADVANCED);

    // Retrieval
    const chunks = await this.retrieve(workingText, workingLanguage, signal);
    trace.contextChunkIds = chunks.map((scored) => scored.chunk.id);
    trace.stages.push(TurnStage.CONTEXT_RETRIEVED);

    // Prompt
    const generationLanguage =
      this.config.language.generateIn === "session" ? language : pivot;
    const timestamp = this.now();
    const pendingTurn: Turn = {
      speaker: "user",
      text: generationLanguage === language ? message : workingText,
      timestamp,
      stepId: previousStep,
    };
    const prompt = this.assembler.assemble({
      persona: this.persona(generationLanguage),
      step: scriptedReply
        ? this.dialog.renderStep(nextStep, slots, generationLanguage)
        : this.dialog.freeformInstruction(generationLanguage),
      chunks,
      history: [...draft.history, pendingTurn],
    });
    trace.stages.push(TurnStage.PROMPT_ASSEMBLED);

    // Generation
    const generation = await this.generate(prompt.text, trace, signal);
    let reply: string;
    if (generation.degraded) {
      reply = scriptedReply
        ? this.dialog.cannedResponse(nextStep, slots, language)
        : localizedApology(language);
    } else {
      trace.stages.push(TurnStage.GENERATED);
      const outbound = await this.language.translate(
        generation.text,
        language,
        generationLanguage,
        signal
      );
      reply = outbound.text;
      if (!scriptedReply) {
        reply += await this.proverbLines(sentiment, language, trace, signal);
      }
      trace.translation = outbound.status;
      trace.untranslated = trace.untranslated || outbound.status === "unavailable";
      trace.stages.push(TurnStage.TRANSLATED);
    }

    // Commit
    throwIfAborted(signal);
    const committedAt = this.now();
    draft.currentStep = nextStep;
    draft.slots = slots;
    draft.history.push(
      { speaker: "user", text: message, timestamp, stepId: previousStep },
      { speaker: "assistant", text: reply, timestamp: committedAt, stepId: nextStep }
    );
    draft.language = language;
    draft.mode = mode;
    draft.sentimentTrail.push(sentiment);
    draft.turnCount++;
    draft.lastActive = committedAt;
    trace.stages.push(TurnStage.COMMITTED);

    logger.info(
      `[Coordinator] ${draft.conversationId} turn ${draft.turnCount}: ${previousStep} -> ${nextStep} (${generation.degraded ? "degraded" : "ok"})`
    );

    return {
      conversationId: draft.conversationId,
      response: reply,
      language,
      sentiment,
      status: generation.degraded ? "degraded" : "ok",
      metadata: toMetadata(trace),
    };
  }

  /**
   * Caller-supplied language wins; otherwise detection, keeping the previous
   * language when the message carries no signal
   */
  private async resolveLanguage(
    session: SessionState,
    message: string,
    pinnedLanguage: string | undefined,
    signal?: AbortSignal
  ): Promise<string> {
    if (pinnedLanguage !== undefined) {
      return this.language.isSupported(pinnedLanguage)
        ? pinnedLanguage
        : this.language.defaultLanguage;
    }
    const detection = await this.language.detect(message, signal);
    return detection.confidence > 0 ? detection.code : session.language;
  }

  private engages(
    session: SessionState,
    message: string,
    workingText: string
  ): boolean {
    return (
      this.dialog.shouldEngage(session, message) ||
      (workingText !== message && this.dialog.shouldEngage(session, workingText))
    );
  }

  /**
   * Best effort: a failed retrieval leaves the prompt without context
   */
  private async retrieve(
    text: string,
    language: string,
    signal?: AbortSignal
  ): Promise<ScoredChunk[]> {
    const retriever = this.retriever;
    const { topK, minScore, timeoutMs } = this.config.retrieval;
    if (!retriever || topK <= 0) {
      return [];
    }

    try {
      return await withTimeout(
        (timeoutSignal) =>
          retriever.query(text, topK, {
            minScore: minScore ?? undefined,
            filter: this.contextFilter(text, language),
            signal: timeoutSignal,
          }),
        timeoutMs,
        "retrieval",
        signal
      );
    } catch (error) {
      if (error instanceof TurnAbortedError) {
        throw error;
      }
      logger.warn(`[Coordinator] Retrieval failed: ${getErrorMessage(error)}`);
      return [];
    }
  }

  /**
   * Completion with bounded retries of transient failures. Any external
   * failure that remains degrades the turn.
   */
  private async generate(
    prompt: string,
    trace: TurnTrace,
    signal?: AbortSignal
  ): Promise<GenerationResult> {
    const { maxAttempts, backoffBaseMs, backoffMaxMs, timeoutMs } =
      this.config.generation;

    try {
      const output = await retry({
        operation: () => {
          trace.attempts++;
          return withTimeout(
            (attemptSignal) =>
              this.completion.complete({
                prompt,
                parameters: {
                  maxOutputTokens: this.config.generation.maxOutputTokens,
                  temperature: this.config.generation.temperature,
                },
                signal: attemptSignal,
              }),
            timeoutMs,
            `completion:${this.completion.name}`,
            signal
          );
        },
        maxRetries: maxAttempts - 1,
        delay: exponentialBackoff(backoffBaseMs, backoffMaxMs),
        shouldRetry: (error) =>
          ExternalServiceError.isExternalServiceError(error) && error.transient,
        onRetry: (attempt, error, delayMs) =>
          logger.warn(
            `[Coordinator] Completion attempt ${attempt + 1} failed (${getErrorMessage(error)}), retrying in ${delayMs}ms`
          ),
        signal,
      });

      const text = output.text.trim();
      if (text.length === 0) {
        logger.warn("[Coordinator] Completion returned no text");
        return { text: "", degraded: true };
      }
      return { text, degraded: false };
    } catch (error) {
      if (error instanceof ExternalServiceError) {
        logger.error(
          `[Coordinator] Generation failed after ${trace.attempts} attempt(s): ${error.message}`
        );
        return { text: "", degraded: true };
      }
      throw error;
    }
  }

  /**
   * "Refrany" line and its rendering in the reply language; empty without a
   * proverb source or when it fails
   */
  private async proverbLines(
    sentiment: number,
    language: string,
    trace: TurnTrace,
    signal?: AbortSignal
  ): Promise<string> {
    if (!this.proverbs) {
      return "";
    }

    let proverb: Proverb;
    try {
      proverb = this.proverbs.pick(sentimentCategory(sentiment));
    } catch (error) {
      logger.warn(
        `[Coordinator] Proverb source ${this.proverbs.name} failed: ${getErrorMessage(error)}`
      );
      return "";
    }

    const rendering =
      language === "ca"
        ? { text: proverb.translation, status: "skipped" }
        : await this.language.translate(proverb.translation, language, "en", signal);
    const label =
      rendering.status === "unavailable"
        ? TRANSLATION_LABELS.en
        : (TRANSLATION_LABELS[language] ?? TRANSLATION_LABELS.en);
    trace.proverbId = proverb.id;
    return `\n\n${PROVERB_LABEL}: ${proverb.text}\n${label}: ${rendering.text}`;
  }

  private persona(language: string): string {
    return (
      this.personas?.get(language) ??
      renderTemplate(DEFAULT_PERSONA, { lang: language })
    );
  }

  private errorResponse(
    error: unknown,
    conversationId: string,
    language: string | undefined,
    trace: TurnTrace
  ): TurnResponse {
    const replyLanguage = language ?? this.config.language.default;
    const failure =
      error instanceof ConversaError
        ? error
        : new InternalError(getErrorMessage(error), error);
    const status = statusFor(failure);

    if (status === "failed") {
      logger.error(
        `[Coordinator] Turn failed for ${conversationId || "<new>"}: ${failure.message}`
      );
    } else {
      logger.info(
        `[Coordinator] Turn ${status} for ${conversationId || "<new>"}: ${failure.message}`
      );
    }

    return {
      conversationId,
      response: status === "cancelled" ? "" : localizedApology(replyLanguage),
      language: replyLanguage,
      sentiment: 0,
      status,
      error: failure.toJSON(),
      metadata: toMetadata(trace),
    };
  }
}

function statusFor(error: ConversaError): TurnStatus {
  if (error instanceof TurnAbortedError) {
    return "cancelled";
  }
  if (
    error instanceof ValidationError ||
    error instanceof SessionBusyError ||
    error instanceof SessionNotFoundError
  ) {
    return "declined";
  }
  // Script and prompt-budget errors included
  return "failed";
}

function initialMode(script: DialogScript): DialogMode {
  return script.hasTriggers ? "awaiting_trigger" : "scripted";
}

function localizedApology(language: string): string {
  return APOLOGY_RESPONSE[language] ?? APOLOGY_RESPONSE.en;
}

function defaultContextFilter(
  text: string,
  language: string
): ChunkMetadata | undefined {
  const filter: ChunkMetadata = {};
  for (const [feature, required] of Object.entries(
    extractRequiredFeatures(text, language)
  )) {
    if (required) {
      filter[feature] = true;
    }
  }
  return Object.keys(filter).length > 0 ? filter : undefined;
}

function toMetadata(trace: TurnTrace): TurnMetadata {
  return {
    stepId: trace.stepId,
    mode: trace.mode,
    stages: [...trace.stages],
    actions: trace.actions,
    translation: trace.translation,
    untranslated: trace.untranslated,
    attempts: trace.attempts,
    contextChunkIds: trace.contextChunkIds,
    proverbId: trace.proverbId,
  };
}
