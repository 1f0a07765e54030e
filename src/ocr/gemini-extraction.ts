import { GoogleGenAI } from '@google/genai';
import type { GenerateContentParameters, Schema } from '@google/genai';
import { MalformedResponseError } from '../errors';

export interface ExtractionImage {
  data: Buffer;
  mimeType: string;
}

export interface ExtractionRequest {
  prompt: string;
  image: ExtractionImage;
  /** Expected output shape, declared per call. */
  responseSchema: Schema;
}

/**
 * One model variant the orchestrator can consult. `extract` resolves with the parsed
 * JSON object and rejects on transport errors or malformed output alike.
 */
export interface ExtractionBackend {
  id: string;
  extract(request: ExtractionRequest): Promise<Record<string, unknown>>;
}

interface GenerateContentResult {
  text?: string;
  candidates?: { content?: { parts?: { text?: string }[] } }[];
}

/** The slice of `GoogleGenAI['models']` the backend calls. */
export interface ContentGenerator {
  generateContent(params: GenerateContentParameters): Promise<GenerateContentResult>;
}

function stripCodeFences(text: string): string {
  return text
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/g, '')
    .trim();
}

export function parseJsonObject(text: string): Record<string, unknown> {
  const stripped = stripCodeFences(text);
  if (!stripped) {
    throw new MalformedResponseError('Empty response from model');
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripped);
  } catch (error) {
    throw new MalformedResponseError(
      `Response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new MalformedResponseError('Response JSON is not an object');
  }
  return Object.fromEntries(Object.entries(parsed));
}

export function createGeminiBackend(generator: ContentGenerator, model: string): ExtractionBackend {
  return {
    id: model,
    async extract({ prompt, image, responseSchema }) {
      const response = await generator.generateContent({
        model,
        contents: [
          {
            role: 'user',
            parts: [
              { text: prompt },
              { inlineData: { mimeType: image.mimeType, data: image.data.toString('base64') } },
            ],
          },
        ],
        config: {
          responseMimeType: 'application/json',
          responseSchema,
        },
      });
      const text = response.text ?? response.candidates?.[0]?.content?.parts?.[0]?.text ?? '';
      return parseJsonObject(text);
    },
  };
}

export type BackendFactory = (apiKey: string) => ExtractionBackend[];

/** One backend per model name, all sharing a client bound to `apiKey`. */
export function geminiBackendFactory(models: string[]): BackendFactory {
  return (apiKey) => {
    const ai = new GoogleGenAI({ apiKey });
    return models.map((model) => createGeminiBackend(ai.models, model));
  };
}
