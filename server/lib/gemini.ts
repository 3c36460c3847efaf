import { FinishReason, GoogleGenAI, HarmBlockThreshold, HarmCategory, type GenerateContentResponse } from "@google/genai";
import { ModelProviderError, isRetriableProviderError, type ModelClient, type ModelRequest } from "./analyzer";
import { asMessage } from "./errors";
import { silentLogger, type Logger } from "./logger";
import { withTimeout } from "./retry";

export type GeminiClientOptions = {
  apiKey: string;
  model: string;
  timeoutMs: number;
  logger?: Logger;
};

// Error events routinely contain words like "kill" or "attack"; only block high-confidence hits.
const SAFETY_SETTINGS = [
  { category: HarmCategory.HARM_CATEGORY_HARASSMENT, threshold: HarmBlockThreshold.BLOCK_ONLY_HIGH },
  { category: HarmCategory.HARM_CATEGORY_HATE_SPEECH, threshold: HarmBlockThreshold.BLOCK_ONLY_HIGH },
  { category: HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT, threshold: HarmBlockThreshold.BLOCK_ONLY_HIGH },
  { category: HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT, threshold: HarmBlockThreshold.BLOCK_ONLY_HIGH },
];

function readStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("status" in error)) return undefined;
  const status = Number(error.status);
  return Number.isFinite(status) && status > 0 ? status : undefined;
}

export function toProviderError(error: unknown): ModelProviderError {
  if (error instanceof ModelProviderError) return error;
  const status = readStatus(error);
  const retriable =
    status !== undefined ? status === 408 || status === 429 || status >= 500 : isRetriableProviderError(error);
  return new ModelProviderError(`Gemini request failed${status ? ` (${status})` : ""}: ${asMessage(error)}`, {
    retriable,
    status,
    cause: error,
  });
}

export function createGeminiClient(options: GeminiClientOptions): ModelClient {
  const ai = new GoogleGenAI({ apiKey: options.apiKey });
  const logger = options.logger ?? silentLogger;

  async function generate(request: ModelRequest): Promise<string> {
    let response: GenerateContentResponse;
    try {
      response = await withTimeout(
        ai.models.generateContent({
          model: options.model,
          contents: request.prompt,
          config: {
            systemInstruction: request.systemInstruction,
            temperature: 0.4,
            maxOutputTokens: 8_000,
            responseMimeType: "application/json",
            safetySettings: SAFETY_SETTINGS,
          },
        }),
        options.timeoutMs,
        "Gemini analyze request"
      );
    } catch (error) {
      throw toProviderError(error);
    }

    const finishReason = response.candidates?.[0]?.finishReason;
    if (finishReason && finishReason !== FinishReason.STOP) {
      logger.warn("model response may be incomplete", { finishReason });
    }

    const text = (response.text ?? "").trim();
    if (!text) throw new ModelProviderError("Empty response from model.", { retriable: true });
    return text;
  }

  return { name: `gemini:${options.model}`, generate };
}
