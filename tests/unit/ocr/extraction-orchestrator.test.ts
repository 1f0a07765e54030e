import { describe, it, expect, vi, beforeEach } from 'vitest';
import { extractBestRecord } from '../../../src/ocr/extraction-orchestrator';
import { KYC_EXTRACTION_PROMPT } from '../../../src/ocr/extraction-prompt';
import { fieldNames, geminiResponseSchema } from '../../../src/kyc/record-schema';
import type { ExtractionImage } from '../../../src/ocr/gemini-extraction';
import { fakeBackend } from '../../helpers/fake-backend';

const image: ExtractionImage = { data: Buffer.from('image-bytes'), mimeType: 'image/png' };

describe('Extraction Orchestrator', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('replaces an earlier result with a strictly more confident one', async () => {
    const fast = fakeBackend('fast', { name: 'x', confidence_score: 0.6 });
    const pro = fakeBackend('pro', { name: 'x', designation: 'y', confidence_score: 0.9 });

    const result = await extractBestRecord(image, [fast.backend, pro.backend]);

    expect(fast.extract).toHaveBeenCalledTimes(1);
    expect(pro.extract).toHaveBeenCalledTimes(1);
    expect(fast.extract.mock.invocationCallOrder[0]).toBeLessThan(pro.extract.mock.invocationCallOrder[0]);
    expect(result.record?.name).toBe('x');
    expect(result.record?.designation).toBe('y');
    expect(result.record?.confidence_score).toBe(0.9);
    expect(result.record?.model_used).toBe('pro');
    expect(result.errors).toEqual([]);
    expect(result.attempts).toEqual([
      { model: 'fast', status: 'success', confidence: 0.6 },
      { model: 'pro', status: 'success', confidence: 0.9 },
    ]);
  });

  it('keeps the earlier backend on equal confidence', async () => {
    const first = fakeBackend('first', { name: 'from first', confidence_score: 0.7 });
    const second = fakeBackend('second', { name: 'from second', confidence_score: 0.7 });

    const result = await extractBestRecord(image, [first.backend, second.backend]);

    expect(result.record?.model_used).toBe('first');
    expect(result.record?.name).toBe('from first');
  });

  it('keeps the earlier backend when a later one is less confident', async () => {
    const first = fakeBackend('first', { name: 'from first', confidence_score: 0.8 });
    const second = fakeBackend('second', { name: 'from second', confidence_score: 0.5 });

    const result = await extractBestRecord(image, [first.backend, second.backend]);

    expect(result.record?.model_used).toBe('first');
  });

  it('stops calling backends once confidence exceeds 0.98', async () => {
    const first = fakeBackend('first', { name: 'sure', confidence_score: 0.99 });
    const second = fakeBackend('second', { name: 'never', confidence_score: 1 });

    const result = await extractBestRecord(image, [first.backend, second.backend]);

    expect(second.extract).not.toHaveBeenCalled();
    expect(result.record?.model_used).toBe('first');
    expect(result.attempts).toHaveLength(1);
  });

  it('continues when confidence equals the early-exit threshold', async () => {
    const first = fakeBackend('first', { confidence_score: 0.98 });
    const second = fakeBackend('second', { confidence_score: 0.5 });

    await extractBestRecord(image, [first.backend, second.backend]);

    expect(second.extract).toHaveBeenCalledTimes(1);
  });

  it('honours a custom early-exit threshold', async () => {
    const first = fakeBackend('first', { confidence_score: 0.6 });
    const second = fakeBackend('second', { confidence_score: 0.9 });

    const result = await extractBestRecord(image, [first.backend, second.backend], { earlyExitThreshold: 0.5 });

    expect(second.extract).not.toHaveBeenCalled();
    expect(result.record?.model_used).toBe('first');
  });

  it('falls through to the next backend after a failure', async () => {
    const broken = fakeBackend('broken', new Error('quota exceeded'));
    const working = fakeBackend('working', { name: 'Asha Rao', confidence_score: 0.75 });

    const result = await extractBestRecord(image, [broken.backend, working.backend]);

    expect(broken.extract).toHaveBeenCalledTimes(1);
    expect(result.record?.model_used).toBe('working');
    expect(result.errors).toEqual(['Model `broken` failed: quota exceeded']);
    expect(result.attempts[0]).toEqual({ model: 'broken', status: 'failed', error: 'quota exceeded' });
  });

  it('returns no record and one error per backend when all fail', async () => {
    const a = fakeBackend('a', new Error('network down'));
    const b = fakeBackend('b', new Error('Response is not valid JSON'));

    const result = await extractBestRecord(image, [a.backend, b.backend]);

    expect(result.record).toBeNull();
    expect(result.errors).toEqual([
      'Model `a` failed: network down',
      'Model `b` failed: Response is not valid JSON',
    ]);
  });

  it('treats a missing confidence score as 0 and still keeps the record', async () => {
    const only = fakeBackend('only', { name: 'Asha Rao' });

    const result = await extractBestRecord(image, [only.backend]);

    expect(result.record?.name).toBe('Asha Rao');
    expect(result.record?.confidence_score).toBeNull();
    expect(result.record?.model_used).toBe('only');
    expect(result.attempts).toEqual([{ model: 'only', status: 'success', confidence: 0 }]);
  });

  it('prefers a scored record over an earlier unscored one', async () => {
    const unscored = fakeBackend('unscored', { name: 'first', confidence_score: null });
    const scored = fakeBackend('scored', { name: 'second', confidence_score: 0.1 });

    const result = await extractBestRecord(image, [unscored.backend, scored.backend]);

    expect(result.record?.model_used).toBe('scored');
  });

  it('returns a record carrying the full field set', async () => {
    const only = fakeBackend('only', { name: 'Asha Rao', unexpected: 'dropped', confidence_score: 0.5 });

    const result = await extractBestRecord(image, [only.backend]);

    expect(Object.keys(result.record ?? {})).toEqual(fieldNames());
  });

  it('overwrites a model_used value reported by the backend', async () => {
    const only = fakeBackend('gemini-2.5-flash', { model_used: 'something else', confidence_score: 0.5 });

    const result = await extractBestRecord(image, [only.backend]);

    expect(result.record?.model_used).toBe('gemini-2.5-flash');
  });

  it('sends the prompt, image and response schema to every backend', async () => {
    const only = fakeBackend('only', { confidence_score: 0.5 });

    await extractBestRecord(image, [only.backend]);

    expect(only.extract).toHaveBeenCalledWith({
      prompt: KYC_EXTRACTION_PROMPT,
      image,
      responseSchema: geminiResponseSchema,
    });
  });

  it('returns an empty result for an empty backend list', async () => {
    const result = await extractBestRecord(image, []);
    expect(result).toEqual({ record: null, errors: [], attempts: [] });
  });
});
