/**
 * Example: Restaurant guide with table booking
 *
 * Ingests a small place catalog, loads the personas and the bundled booking
 * script, then plays a short Spanish conversation through the coordinator.
 *
 * Run with CONVERSA_API_KEY set (and CONVERSA_PROVIDER for anthropic/gemini).
 */

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import {
  AfinnSentimentAnalyzer,
  CompletionTranslator,
  FrancLanguageDetector,
  InMemoryKnowledgeIndex,
  PatternSlotExtractor,
  ResponseCoordinator,
  configureLogger,
  type DialogAction,
  createCompletionProvider,
  createEmbedder,
  ingestCatalog,
  loadCatalanProverbs,
  loadConfig,
  loadPersonas,
  loadRestaurantBookingScript,
} from "../src/index";

const CATALOG_PATH = fileURLToPath(new URL("./data/guide.json", import.meta.url));
const PROMPTS_DIR = fileURLToPath(new URL("../prompts", import.meta.url));

async function main() {
  const config = loadConfig();
  configureLogger(config.logLevel);

  const completion = createCompletionProvider(config.provider);
  const embedder = createEmbedder(config.provider);

  // Knowledge base
  const index = new InMemoryKnowledgeIndex();
  if (embedder) {
    const catalog: unknown = JSON.parse(await readFile(CATALOG_PATH, "utf8"));
    const { chunkCount } = await ingestCatalog(catalog, embedder, index, {
      sourceId: "guide",
    });
    console.log(`📚 Indexed ${chunkCount} places`);
  } else {
    console.log("📚 No embeddings for this provider, answering without context");
  }

  const coordinator = new ResponseCoordinator({
    config,
    script: loadRestaurantBookingScript(),
    extractor: new PatternSlotExtractor(),
    completion,
    index,
    embedder,
    detector: new FrancLanguageDetector({ languages: config.language.supported }),
    translator: new CompletionTranslator(completion),
    sentiment: new AfinnSentimentAnalyzer(),
    personas: await loadPersonas(PROMPTS_DIR, config.language.supported),
    proverbs: loadCatalanProverbs(),
  });
  coordinator.start();

  const messages = [
    "Hola, quiero reservar una mesa para dos personas",
    "A las 21:00, por favor",
    "Sí, perfecto",
    "¿Hay algún sitio con terraza y vistas al mar para tomar algo después?",
  ];

  let conversationId: string | undefined;
  try {
    for (const message of messages) {
      const turn = await coordinator.handleTurn({ conversationId, message });
      conversationId = turn.conversationId;

      console.log(`\n👤 ${message}`);
      console.log(`🤖 ${turn.response}`);
      console.log(
        `   status=${turn.status} step=${turn.metadata.stepId ?? "-"} language=${turn.language}`
      );
      for (const action of turn.metadata.actions) {
        console.log(`   ⚡ ${describeAction(action)}`);
      }
    }
  } finally {
    coordinator.stop();
  }

  if (conversationId) {
    console.log("\n📜 Dialogue log:");
    for (const turn of coordinator.getDialogueLog(conversationId)) {
      console.log(`   ${turn.speaker}: ${turn.text}`);
    }
  }
}

function describeAction(action: DialogAction): string {
  switch (action.type) {
    case "transition":
      return `${action.from} → ${action.to} (${action.via})`;
    case "clarify":
      return `clarify ${action.stepId}: missing ${action.missingSlots.join(", ")}`;
    case "handoff":
      return `handoff at ${action.stepId}`;
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch(console.error);
}
