import { z, ZodError } from 'zod';
import { isSupportedCountry, type CountryCode } from 'libphonenumber-js';

export interface ConfidenceThresholds {
  /** phone, email, fiscal_code, iban */
  contact: number;
  freeText: number;
  default: number;
}

export interface ReviewConfig {
  defaultCountry: CountryCode;
  defaultCurrency: string;
  thresholds: ConfidenceThresholds;
  autoApplyThreshold?: number;
  timeoutMs?: number;
}

export interface AppConfig {
  port: number;
  review: ReviewConfig;
}

const unitInterval = z.coerce.number().min(0).max(1);

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  REVIEW_DEFAULT_COUNTRY: z
    .string()
    .default('IT')
    .refine((value): value is CountryCode => isSupportedCountry(value), {
      message: 'Unsupported country for phone numbers',
    }),
  REVIEW_DEFAULT_CURRENCY: z.string().length(3).default('EUR'),
  REVIEW_CONTACT_THRESHOLD: unitInterval.default(0.95),
  REVIEW_FREE_TEXT_THRESHOLD: unitInterval.default(0.8),
  REVIEW_DEFAULT_THRESHOLD: unitInterval.default(0.9),
  REVIEW_AUTO_APPLY_THRESHOLD: unitInterval.optional(),
  REVIEW_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

export const DEFAULT_REVIEW_CONFIG: ReviewConfig = {
  defaultCountry: 'IT',
  defaultCurrency: 'EUR',
  thresholds: { contact: 0.95, freeText: 0.8, default: 0.9 },
};

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  try {
    const parsed = envSchema.parse(env);
    return {
      port: parsed.PORT,
      review: {
        defaultCountry: parsed.REVIEW_DEFAULT_COUNTRY,
        defaultCurrency: parsed.REVIEW_DEFAULT_CURRENCY.toUpperCase(),
        thresholds: {
          contact: parsed.REVIEW_CONTACT_THRESHOLD,
          freeText: parsed.REVIEW_FREE_TEXT_THRESHOLD,
          default: parsed.REVIEW_DEFAULT_THRESHOLD,
        },
        autoApplyThreshold: parsed.REVIEW_AUTO_APPLY_THRESHOLD,
        timeoutMs: parsed.REVIEW_TIMEOUT_MS,
      },
    };
  } catch (error) {
    if (error instanceof ZodError) {
      const details = error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new Error(`Invalid configuration: ${details}`);
    }
    throw error;
  }
}
