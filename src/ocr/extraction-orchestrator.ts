import { coerceRecord, geminiResponseSchema } from '../kyc/record-schema';
import type { KycRecord } from '../kyc/record-schema';
import { KYC_EXTRACTION_PROMPT } from './extraction-prompt';
import type { ExtractionBackend, ExtractionImage } from './gemini-extraction';

export const DEFAULT_EARLY_EXIT_CONFIDENCE = 0.98;

export type BackendAttempt =
  | { model: string; status: 'success'; confidence: number }
  | { model: string; status: 'failed'; error: string };

export interface ExtractionResult {
  /** Best record seen, or null when every backend failed. */
  record: KycRecord | null;
  /** One message per failed backend, in call order. */
  errors: string[];
  attempts: BackendAttempt[];
}

export interface ExtractionOptions {
  earlyExitThreshold?: number;
  prompt?: string;
}

/**
 * Tries each backend once, in order, and keeps the most confident record.
 * A later backend only replaces the current best when its confidence is strictly
 * higher, and a confidence strictly above the early-exit threshold ends the run.
 * Missing or non-numeric confidence counts as 0.
 */
export async function extractBestRecord(
  image: ExtractionImage,
  backends: ExtractionBackend[],
  options: ExtractionOptions = {}
): Promise<ExtractionResult> {
  const { earlyExitThreshold = DEFAULT_EARLY_EXIT_CONFIDENCE, prompt = KYC_EXTRACTION_PROMPT } = options;

  let best: KycRecord | null = null;
  let highestConfidence = -1.0;
  const errors: string[] = [];
  const attempts: BackendAttempt[] = [];

  for (const backend of backends) {
    console.log(`[Extraction] Trying model: ${backend.id}`);
    let raw: Record<string, unknown>;
    try {
      raw = await backend.extract({ prompt, image, responseSchema: geminiResponseSchema });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const entry = `Model \`${backend.id}\` failed: ${message}`;
      errors.push(entry);
      attempts.push({ model: backend.id, status: 'failed', error: message });
      console.warn(`[Extraction] ${entry}`);
      continue;
    }

    const record = coerceRecord(raw);
    const confidence = record.confidence_score ?? 0.0;
    attempts.push({ model: backend.id, status: 'success', confidence });

    if (confidence > highestConfidence) {
      highestConfidence = confidence;
      best = { ...record, model_used: backend.id };
    }

    if (confidence > earlyExitThreshold) {
      console.log(`[Extraction] ${backend.id} reached confidence ${confidence}; skipping remaining models`);
      break;
    }
  }

  if (!best && errors.length > 0) {
    console.error('[Extraction] All models failed to process the image', { errors });
  }

  return { record: best, errors, attempts };
}
