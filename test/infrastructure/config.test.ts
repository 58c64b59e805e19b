import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../src/infrastructure/config.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      review: {
        defaultCountry: 'IT',
        defaultCurrency: 'EUR',
        thresholds: { contact: 0.95, freeText: 0.8, default: 0.9 },
        autoApplyThreshold: undefined,
        timeoutMs: undefined,
      },
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      REVIEW_DEFAULT_COUNTRY: 'GB',
      REVIEW_DEFAULT_CURRENCY: 'gbp',
      REVIEW_CONTACT_THRESHOLD: '0.97',
      REVIEW_AUTO_APPLY_THRESHOLD: '0.9',
      REVIEW_TIMEOUT_MS: '5000',
    });
    expect(config.port).toBe(8080);
    expect(config.review.defaultCountry).toBe('GB');
    expect(config.review.defaultCurrency).toBe('GBP');
    expect(config.review.thresholds.contact).toBe(0.97);
    expect(config.review.autoApplyThreshold).toBe(0.9);
    expect(config.review.timeoutMs).toBe(5000);
  });

  it('rejects an unsupported country', () => {
    expect(() => loadConfig({ REVIEW_DEFAULT_COUNTRY: 'XX' })).toThrow(
      'Invalid configuration: REVIEW_DEFAULT_COUNTRY: Unsupported country for phone numbers',
    );
  });

  it('rejects thresholds outside [0, 1]', () => {
    expect(() => loadConfig({ REVIEW_DEFAULT_THRESHOLD: '1.5' })).toThrow(/^Invalid configuration: REVIEW_DEFAULT_THRESHOLD/);
  });
});
