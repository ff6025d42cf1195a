import { GoogleGenerativeAI, type SingleRequestOptions } from "@google/generative-ai";
import type { Config } from "./config";
import { GenerationError } from "./errors";

/**
 * Narrow request/response contract to a hosted language model: one prompt in,
 * one non-empty answer string out. Implementations validate the provider's
 * payload and throw {@link GenerationError} for anything malformed.
 */
export interface LlmClient {
  readonly modelName: string;
  generate(prompt: string, signal: AbortSignal): Promise<string>;
}

/** The slice of the Gemini `GenerativeModel` the client relies on. */
export interface GenerateContentModel {
  generateContent(request: string, options?: SingleRequestOptions): Promise<unknown>;
}

/**
 * Extract the answer text from a `generateContent` result
 * (`{ response: { text(): string } }`). `text()` itself throws when the
 * candidate was blocked; that becomes a GenerationError too.
 */
export function parseGenerateContentResult(payload: unknown): string {
  const response: unknown = typeof payload === "object" && payload !== null ? Reflect.get(payload, "response") : null;
  if (typeof response !== "object" || response === null) {
    throw new GenerationError("LLM result has no 'response' object");
  }
  const text: unknown = Reflect.get(response, "text");
  if (typeof text !== "function") throw new GenerationError("LLM response has no text() accessor");
  let value: unknown;
  try {
    value = Reflect.apply(text, response, []);
  } catch (e) {
    throw new GenerationError(`LLM response could not be read: ${e instanceof Error ? e.message : String(e)}`, {
      cause: e,
    });
  }
  if (typeof value !== "string" || !value.trim()) throw new GenerationError("LLM returned an empty answer");
  return value.trim();
}

export class GeminiLlm implements LlmClient {
  public readonly modelName: string;
  private readonly model: GenerateContentModel;

  public constructor(model: GenerateContentModel, modelName: string) {
    this.model = model;
    this.modelName = modelName;
  }

  public async generate(prompt: string, signal: AbortSignal): Promise<string> {
    const result = await this.model.generateContent(prompt, { signal });
    return parseGenerateContentResult(result);
  }
}

/** Build the LLM client selected by configuration; null means context-only answers. */
export function createLlm(config: Config): LlmClient | null {
  if (config.LLM_PROVIDER === "none") return null;
  const genAI = new GoogleGenerativeAI(config.GOOGLE_API_KEY ?? "");
  const model = genAI.getGenerativeModel({
    model: config.LLM_MODEL,
    generationConfig: { temperature: config.LLM_TEMPERATURE },
  });
  return new GeminiLlm(model, config.LLM_MODEL);
}
