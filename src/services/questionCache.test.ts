import { describe, expect, it, jest } from '@jest/globals';
import { LegacyDocument } from '../types/migrationTypes';
import { QuestionCache, QuestionKey } from './questionCache';

describe('QuestionCache', () => {
  it('looks each question id up once per run, misses included', async () => {
    const question: LegacyDocument = { question_id: 'q-1', question_type: 'text' };
    const findQuestion = jest.fn(async (questionId: QuestionKey) =>
      questionId === 'q-1' ? question : null
    );
    const cache = new QuestionCache({ findQuestion });

    expect(await cache.get('q-1')).toBe(question);
    expect(await cache.get('q-1')).toBe(question);
    expect(await cache.get('missing')).toBeNull();
    expect(await cache.get('missing')).toBeNull();

    expect(findQuestion).toHaveBeenCalledTimes(2);
    expect(cache.size).toBe(2);
    expect(cache.lookupCount).toBe(2);
  });

  it('keeps numeric and string ids apart', async () => {
    const findQuestion = jest.fn(async (_questionId: QuestionKey): Promise<LegacyDocument | null> => null);
    const cache = new QuestionCache({ findQuestion });

    await cache.get(1);
    await cache.get('1');

    expect(findQuestion).toHaveBeenCalledTimes(2);
  });

  it('does not share entries between runs', async () => {
    const findQuestion = jest.fn(async (_questionId: QuestionKey): Promise<LegacyDocument | null> => null);

    await new QuestionCache({ findQuestion }).get('q-1');
    await new QuestionCache({ findQuestion }).get('q-1');

    expect(findQuestion).toHaveBeenCalledTimes(2);
  });

  it('propagates lookup failures without caching them', async () => {
    const findQuestion = jest
      .fn(async (_questionId: QuestionKey): Promise<LegacyDocument | null> => null)
      .mockRejectedValueOnce(new Error('connection reset'));
    const cache = new QuestionCache({ findQuestion });

    await expect(cache.get('q-1')).rejects.toThrow('connection reset');
    expect(cache.size).toBe(0);
    expect(await cache.get('q-1')).toBeNull();
  });
});
