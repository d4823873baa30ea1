import axios, { AxiosInstance } from "axios";
import { GoogleGenerativeAI } from "@google/generative-ai";
import { z } from "zod";
import { TextGenerator } from "../types/sources";

const MODELS_URL = "https://generativelanguage.googleapis.com/v1beta/models";

const ModelListSchema = z.object({
  models: z
    .array(
      z.object({
        name: z.string(),
        supportedGenerationMethods: z.array(z.string()).optional(),
      })
    )
    .default([]),
});

/**
 * Gemini text generation
 * Model listing goes over REST; generation goes through the SDK
 */
export class GeminiTextGenerator implements TextGenerator {
  private readonly client: GoogleGenerativeAI;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly http: AxiosInstance;

  constructor(apiKey: string, timeoutMs: number, http?: AxiosInstance) {
    this.client = new GoogleGenerativeAI(apiKey);
    this.apiKey = apiKey;
    this.timeoutMs = timeoutMs;
    this.http = http ?? axios.create({ timeout: timeoutMs });
  }

  async listModels(): Promise<string[]> {
    const response = await this.http.get(MODELS_URL, {
      params: { key: this.apiKey, pageSize: 100 },
    });
    return parseModelList(response.data);
  }

  async generate(model: string, prompt: string): Promise<string> {
    const result = await this.client
      .getGenerativeModel({ model }, { timeout: this.timeoutMs })
      .generateContent(prompt);
    return result.response.text();
  }
}

/**
 * Names (without the "models/" prefix) of models that support generateContent
 */
export function parseModelList(data: unknown): string[] {
  const parsed = ModelListSchema.parse(data);
  return parsed.models
    .filter(m => m.supportedGenerationMethods?.includes("generateContent") ?? false)
    .map(m => m.name.replace(/^models\//, ""));
}
