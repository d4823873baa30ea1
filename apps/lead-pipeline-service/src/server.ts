import "dotenv/config";
import express from "express";
import cors from "cors";
import { config, missingRequiredConfig, AppConfig } from "./config";
import { ConfigurationMissingError, errorMessage } from "./errors";
import { ExtractionService } from "./services/extraction";
import { PipelineDeps } from "./services/pipeline";
import { createPipelineRouter } from "./routes/pipeline";
import { PubMedCitationSource } from "./providers/pubmed";
import { DuckDuckGoSnippetSource } from "./providers/duckduckgo";
import { GeminiTextGenerator } from "./providers/gemini";

export function createApp(deps: PipelineDeps, cfg: AppConfig = config): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Health check endpoint
  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      extraction: deps.extraction.status(),
    });
  });

  // Mount routes
  app.use("/pipeline", createPipelineRouter(deps, cfg));

  return app;
}

async function main(): Promise<void> {
  const missing = missingRequiredConfig(config);
  if (missing.length > 0) {
    throw new ConfigurationMissingError(missing);
  }

  const extraction = await ExtractionService.create(
    new GeminiTextGenerator(config.geminiApiKey, config.httpTimeoutMs),
    { preferredModels: config.geminiPreferredModels }
  );

  const app = createApp({
    citations: new PubMedCitationSource({
      email: config.ncbiEmail,
      apiKey: config.ncbiApiKey || undefined,
      timeoutMs: config.httpTimeoutMs,
    }),
    snippets: new DuckDuckGoSnippetSource(config.httpTimeoutMs),
    extraction,
  });

  app.listen(config.port, () => {
    console.log(`[server] Lead Pipeline Service started`);
    console.log(`[server] Port: ${config.port}`);
    console.log(`[server] Environment: ${config.nodeEnv}`);
    console.log(`[server] Extraction model: ${extraction.status().model ?? "none (heuristics only)"}`);
  });
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(`[server] Startup failed: ${errorMessage(error)}`);
    process.exit(1);
  });
}
