import { TextGenerator } from "../types/sources";
import { ExtractionStatus } from "../types/leads";
import { errorMessage } from "../errors";

// ============================================================================
// OUTCOME TYPES
// ============================================================================

export type ExtractionOutcome<T> =
  | { status: "ok"; value: T }
  | { status: "unavailable"; reason: string }
  | { status: "malformed"; reason: string };

export function extracted<T>(value: T): ExtractionOutcome<T> {
  return { status: "ok", value };
}

export function malformed<T>(reason: string): ExtractionOutcome<T> {
  return { status: "malformed", reason };
}

// ============================================================================
// QUOTA STATE
// ============================================================================

/**
 * Run-scoped "quota exhausted" gate. Only ever moves false → true.
 * Stages process leads one at a time, so a plain boolean is enough; a parallel
 * fan-out would need this to become a check-then-act under a lock.
 */
export class QuotaState {
  private exhausted = false;

  isExhausted(): boolean {
    return this.exhausted;
  }

  markExhausted(): void {
    this.exhausted = true;
  }
}

// ============================================================================
// EXTRACTION SERVICE
// ============================================================================

export interface ExtractionServiceOptions {
  preferredModels: string[];
  quota?: QuotaState;
}

/**
 * Wraps a generative model behind a prompt → text interface.
 * Never throws: every failure comes back as an "unavailable" outcome.
 */
export class ExtractionService {
  private readonly generator: TextGenerator | null;
  private readonly model: string | null;
  private readonly quota: QuotaState;

  private constructor(generator: TextGenerator | null, model: string | null, quota: QuotaState) {
    this.generator = generator;
    this.model = model;
    this.quota = quota;
  }

  /**
   * Probe available models and pick one.
   * Preference order first, then any available model; none reachable leaves the service disabled.
   */
  static async create(
    generator: TextGenerator,
    options: ExtractionServiceOptions
  ): Promise<ExtractionService> {
    const quota = options.quota ?? new QuotaState();

    let available: string[];
    try {
      available = await generator.listModels();
    } catch (error) {
      console.error(`[extraction] Model listing failed: ${errorMessage(error)}`);
      return new ExtractionService(null, null, quota);
    }

    const model = selectModel(available, options.preferredModels);
    if (!model) {
      console.warn(`[extraction] No generation model available, using heuristics only`);
      return new ExtractionService(null, null, quota);
    }

    console.log(`[extraction] Using model: ${model}`);
    return new ExtractionService(generator, model, quota);
  }

  /**
   * Service with no model: every call is unavailable
   */
  static disabled(quota: QuotaState = new QuotaState()): ExtractionService {
    return new ExtractionService(null, null, quota);
  }

  /**
   * Same generator and model with a fresh quota state, for one pipeline run
   */
  forRun(): ExtractionService {
    return new ExtractionService(this.generator, this.model, new QuotaState());
  }

  async extract(prompt: string): Promise<ExtractionOutcome<string>> {
    if (!this.generator || !this.model) {
      return { status: "unavailable", reason: "no model" };
    }
    if (this.quota.isExhausted()) {
      return { status: "unavailable", reason: "quota exhausted" };
    }

    try {
      const text = await this.generator.generate(this.model, prompt);
      return extracted(stripCodeFence(text));
    } catch (error) {
      const message = errorMessage(error);
      if (isQuotaError(error)) {
        this.quota.markExhausted();
        console.warn(`[extraction] Quota exhausted, skipping model calls for the rest of the run`);
      }
      console.error(`[extraction] LLM error: ${message}`);
      return { status: "unavailable", reason: message };
    }
  }

  status(): ExtractionStatus {
    return {
      model: this.model,
      quota_exhausted: this.quota.isExhausted(),
    };
  }
}

// ============================================================================
// HELPERS
// ============================================================================

export function selectModel(available: string[], preferred: string[]): string | null {
  for (const name of preferred) {
    if (available.includes(name)) return name;
  }
  return available[0] ?? null;
}

/**
 * Remove a leading ```lang fence and a trailing ``` fence
 */
export function stripCodeFence(text: string): string {
  return text
    .trim()
    .replace(/^```[\w-]*[ \t]*\r?\n?/, "")
    .replace(/\r?\n?```$/, "")
    .trim();
}

/**
 * Rate-limit / quota failures: HTTP 429 or a message mentioning quota
 */
export function isQuotaError(error: unknown): boolean {
  if (typeof error === "object" && error !== null && "status" in error && error.status === 429) {
    return true;
  }
  const message = errorMessage(error).toLowerCase();
  return message.includes("429") || message.includes("quota") || message.includes("resource_exhausted");
}
