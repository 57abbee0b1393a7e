import { AIResponse } from '../ai-response';

describe('AIResponse', () => {
  describe('success()', () => {
    it('should carry content and usage with no error', () => {
      const response = AIResponse.success({
        content: 'Hello',
        tokenUsage: { promptTokens: 5, completionTokens: 2, totalTokens: 7 },
        rawResponse: { id: 'raw-1' },
        model: 'gpt-4',
        provider: 'openai',
      });

      expect(response.success).toBe(true);
      expect(response.content).toBe('Hello');
      expect(response.errorMessage).toBeNull();
      expect(response.errorKind).toBeNull();
      expect(response.tokenUsage).toEqual({ promptTokens: 5, completionTokens: 2, totalTokens: 7 });
      expect(response.rawResponse).toEqual({ id: 'raw-1' });
    });

    it('should default optional fields to null', () => {
      const response = AIResponse.success({ content: [0.1, 0.2] });

      expect(response.content).toEqual([0.1, 0.2]);
      expect(response.tokenUsage).toBeNull();
      expect(response.rawResponse).toBeNull();
      expect(response.model).toBeNull();
      expect(response.provider).toBeNull();
    });
  });

  describe('failure()', () => {
    it('should carry the error and no content', () => {
      const response = AIResponse.failure({
        errorMessage: 'OpenAI API Error: Incorrect API key',
        errorKind: 'vendor',
      });

      expect(response.success).toBe(false);
      expect(response.content).toBeNull();
      expect(response.tokenUsage).toBeNull();
      expect(response.errorMessage).toBe('OpenAI API Error: Incorrect API key');
      expect(response.errorKind).toBe('vendor');
    });

    it('should never carry a blank error message', () => {
      const response = AIResponse.failure({ errorMessage: '  ', errorKind: 'unhandled' });

      expect(response.errorMessage).toBe('Unknown error');
    });
  });

  describe('isSuccess() / isFailure()', () => {
    it('should always be logical opposites', () => {
      const responses = [
        AIResponse.success({ content: 'ok' }),
        AIResponse.success({ content: [] }),
        AIResponse.failure({ errorMessage: 'boom', errorKind: 'unhandled' }),
        AIResponse.failure({ errorMessage: 'nope', errorKind: 'not_implemented' }),
      ];

      for (const response of responses) {
        expect(response.isSuccess()).toBe(response.success);
        expect(response.isFailure()).toBe(!response.isSuccess());
      }
    });
  });

  it('should be immutable', () => {
    const response = AIResponse.success({
      content: 'Hello',
      tokenUsage: { promptTokens: 1, completionTokens: 1, totalTokens: 2 },
    });

    expect(Object.isFrozen(response)).toBe(true);
    expect(Object.isFrozen(response.tokenUsage)).toBe(true);
  });

  it('should hold its own frozen copy of an embedding vector', () => {
    const vector = [0.1, 0.2];
    const response = AIResponse.success({ content: vector });

    vector.push(7);

    expect(response.content).toEqual([0.1, 0.2]);
    expect(response.content).not.toBe(vector);
    expect(Object.isFrozen(response.content)).toBe(true);
  });

  it('should leave the raw payload out of toJSON()', () => {
    const response = AIResponse.success({
      content: 'Hello',
      rawResponse: { secret: 'payload' },
      model: 'gpt-4',
      provider: 'openai',
    });

    expect(response.toJSON()).toEqual({
      success: true,
      content: 'Hello',
      errorMessage: null,
      errorKind: null,
      tokenUsage: null,
      model: 'gpt-4',
      provider: 'openai',
    });
  });
});
