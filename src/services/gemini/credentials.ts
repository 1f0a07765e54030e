import { GoogleGenAI } from '@google/genai';
import { CredentialError } from '../../errors';

export type CredentialValidator = (apiKey: string) => Promise<void>;

/**
 * Checks a Gemini API key by listing models with it. Throws CredentialError when the
 * key is blank or the listing is refused.
 */
export const validateGeminiApiKey: CredentialValidator = async (apiKey) => {
  if (!apiKey.trim()) {
    throw new CredentialError('API key is required');
  }
  try {
    const ai = new GoogleGenAI({ apiKey });
    await ai.models.list({ config: { pageSize: 1 } });
  } catch (error) {
    throw new CredentialError(`Invalid API key: ${error instanceof Error ? error.message : String(error)}`);
  }
};
