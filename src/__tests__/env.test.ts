import { afterEach, describe, expect, it, vi } from 'vitest';
import { env, isProviderConfigured, parsePositiveInt } from '../env.js';

describe('Environment configuration', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('parsePositiveInt', () => {
    it('uses the default when unset', () => {
      expect(parsePositiveInt(undefined, 5, 'MAX_RESULTS')).toBe(5);
      expect(parsePositiveInt('', 5, 'MAX_RESULTS')).toBe(5);
    });

    it('parses a positive integer', () => {
      expect(parsePositiveInt('12', 5, 'MAX_RESULTS')).toBe(12);
    });

    it('falls back on zero, negatives and garbage', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});

      expect(parsePositiveInt('0', 2, 'MAX_TOOL_ROUNDS')).toBe(2);
      expect(parsePositiveInt('-3', 2, 'MAX_TOOL_ROUNDS')).toBe(2);
      expect(parsePositiveInt('many', 2, 'MAX_TOOL_ROUNDS')).toBe(2);
      expect(error).toHaveBeenCalledWith('Invalid MAX_TOOL_ROUNDS "0", using default 2');
    });
  });

  describe('isProviderConfigured', () => {
    const original = {
      anthropic: env.ANTHROPIC_API_KEY,
      accessKey: env.AWS_ACCESS_KEY_ID,
      secretKey: env.AWS_SECRET_ACCESS_KEY,
    };

    afterEach(() => {
      env.ANTHROPIC_API_KEY = original.anthropic;
      env.AWS_ACCESS_KEY_ID = original.accessKey;
      env.AWS_SECRET_ACCESS_KEY = original.secretKey;
    });

    it('requires an API key for anthropic', () => {
      env.ANTHROPIC_API_KEY = '';
      expect(isProviderConfigured('anthropic')).toBe(false);

      env.ANTHROPIC_API_KEY = 'test-secret';
      expect(isProviderConfigured('anthropic')).toBe(true);
    });

    it('requires both AWS credentials for bedrock', () => {
      env.AWS_ACCESS_KEY_ID = 'test-access-key';
      env.AWS_SECRET_ACCESS_KEY = '';
      expect(isProviderConfigured('bedrock')).toBe(false);

      env.AWS_SECRET_ACCESS_KEY = 'test-secret';
      expect(isProviderConfigured('bedrock')).toBe(true);
    });

    it('rejects unknown providers', () => {
      expect(isProviderConfigured('vertex')).toBe(false);
    });
  });
});
