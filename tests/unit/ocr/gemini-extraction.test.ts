import { describe, it, expect, vi } from 'vitest';
import { createGeminiBackend, parseJsonObject } from '../../../src/ocr/gemini-extraction';
import type { ContentGenerator } from '../../../src/ocr/gemini-extraction';
import { geminiResponseSchema } from '../../../src/kyc/record-schema';
import { MalformedResponseError } from '../../../src/errors';

const request = {
  prompt: 'Extract the form',
  image: { data: Buffer.from('png-bytes'), mimeType: 'image/png' },
  responseSchema: geminiResponseSchema,
};

function generatorReturning(response: { text?: string; candidates?: { content?: { parts?: { text?: string }[] } }[] }) {
  const generateContent = vi.fn().mockResolvedValue(response);
  const generator: ContentGenerator = { generateContent };
  return { generator, generateContent };
}

describe('Gemini Extraction', () => {
  describe('parseJsonObject', () => {
    it('parses a plain JSON object', () => {
      expect(parseJsonObject('{"name":"Asha Rao","confidence_score":0.8}')).toEqual({
        name: 'Asha Rao',
        confidence_score: 0.8,
      });
    });

    it('strips markdown code fences', () => {
      expect(parseJsonObject('```json\n{"name":"Asha Rao"}\n```')).toEqual({ name: 'Asha Rao' });
    });

    it('rejects empty text', () => {
      expect(() => parseJsonObject('   ')).toThrow('Empty response from model');
    });

    it('rejects invalid JSON', () => {
      expect(() => parseJsonObject('name: Asha')).toThrow(MalformedResponseError);
    });

    it('rejects JSON that is not an object', () => {
      expect(() => parseJsonObject('[1, 2]')).toThrow('Response JSON is not an object');
      expect(() => parseJsonObject('null')).toThrow('Response JSON is not an object');
    });
  });

  describe('createGeminiBackend', () => {
    it('uses the model name as the backend id', () => {
      const { generator } = generatorReturning({ text: '{}' });
      expect(createGeminiBackend(generator, 'gemini-2.5-pro').id).toBe('gemini-2.5-pro');
    });

    it('sends the prompt and inline image with a JSON response schema', async () => {
      const { generator, generateContent } = generatorReturning({ text: '{"name":"Asha Rao"}' });
      const backend = createGeminiBackend(generator, 'gemini-2.5-flash');

      const result = await backend.extract(request);

      expect(result).toEqual({ name: 'Asha Rao' });
      expect(generateContent).toHaveBeenCalledWith({
        model: 'gemini-2.5-flash',
        contents: [
          {
            role: 'user',
            parts: [
              { text: 'Extract the form' },
              { inlineData: { mimeType: 'image/png', data: Buffer.from('png-bytes').toString('base64') } },
            ],
          },
        ],
        config: {
          responseMimeType: 'application/json',
          responseSchema: geminiResponseSchema,
        },
      });
    });

    it('falls back to the first candidate part when text is absent', async () => {
      const { generator } = generatorReturning({
        candidates: [{ content: { parts: [{ text: '{"bank_name":"State Bank"}' }] } }],
      });

      const result = await createGeminiBackend(generator, 'm').extract(request);

      expect(result).toEqual({ bank_name: 'State Bank' });
    });

    it('rejects when the model returns nothing', async () => {
      const { generator } = generatorReturning({});
      await expect(createGeminiBackend(generator, 'm').extract(request)).rejects.toThrow('Empty response from model');
    });

    it('passes client errors through', async () => {
      const generateContent = vi.fn().mockRejectedValue(new Error('429 Resource exhausted'));
      const backend = createGeminiBackend({ generateContent }, 'm');
      await expect(backend.extract(request)).rejects.toThrow('429 Resource exhausted');
    });
  });
});
