import {
  GEMINI_USAGE_KEYS,
  OPENAI_EMBEDDING_USAGE_KEYS,
  firstOf,
  messageText,
  toTokenUsage,
  vendorErrorMessage,
} from '../normalize';

describe('normalize helpers', () => {
  describe('toTokenUsage()', () => {
    it('should re-key Gemini usage metadata', () => {
      expect(
        toTokenUsage(
          { promptTokenCount: 8, candidatesTokenCount: 2, totalTokenCount: 10 },
          GEMINI_USAGE_KEYS,
        ),
      ).toEqual({ promptTokens: 8, completionTokens: 2, totalTokens: 10 });
    });

    it('should null out dimensions the vendor does not have', () => {
      expect(
        toTokenUsage(
          { prompt_tokens: 4, completion_tokens: 9, total_tokens: 4 },
          OPENAI_EMBEDDING_USAGE_KEYS,
        ),
      ).toEqual({ promptTokens: 4, completionTokens: null, totalTokens: 4 });
    });

    it('should ignore non-numeric counts and non-object usage', () => {
      expect(toTokenUsage({ promptTokenCount: '8' }, GEMINI_USAGE_KEYS)).toEqual({
        promptTokens: null,
        completionTokens: null,
        totalTokens: null,
      });
      expect(toTokenUsage(null, GEMINI_USAGE_KEYS)).toEqual({
        promptTokens: null,
        completionTokens: null,
        totalTokens: null,
      });
    });
  });

  describe('firstOf()', () => {
    it('should return the first element of a non-empty list', () => {
      expect(firstOf({ data: [{ a: 1 }, { a: 2 }] }, 'data')).toEqual({ a: 1 });
    });

    it('should return undefined for empty, missing or non-list values', () => {
      expect(firstOf({ data: [] }, 'data')).toBeUndefined();
      expect(firstOf({}, 'data')).toBeUndefined();
      expect(firstOf({ data: 'x' }, 'data')).toBeUndefined();
      expect(firstOf('payload', 'data')).toBeUndefined();
    });
  });

  describe('vendorErrorMessage()', () => {
    it('should read error.message', () => {
      expect(vendorErrorMessage({ error: { message: 'Incorrect API key' } })).toBe(
        'Incorrect API key',
      );
    });

    it('should ignore other shapes', () => {
      expect(vendorErrorMessage({ error: 'Incorrect API key' })).toBeUndefined();
      expect(vendorErrorMessage({ error: { code: 401 } })).toBeUndefined();
      expect(vendorErrorMessage(undefined)).toBeUndefined();
    });
  });

  describe('messageText()', () => {
    it('should prefer content over parts', () => {
      expect(messageText({ role: 'user', content: 'a', parts: [{ text: 'b' }] })).toBe('a');
    });

    it('should join parts', () => {
      expect(messageText({ role: 'user', parts: [{ text: 'a' }, { text: 'b' }] })).toBe('ab');
    });

    it('should return an empty string when neither is present', () => {
      expect(messageText({ role: 'user' })).toBe('');
    });
  });
});
