// Configuration for Specimen Search
// All tunable values are read from the environment here

export type Env = Record<string, string | undefined>;

export interface AppConfig {
  openai: {
    apiKey: string | undefined;
    model: string;
    timeoutMs: number;
  };
  gbif: {
    baseUrl: string;
    basisOfRecord: string;
    timeoutMs: number;
    // Scopes every search to one institution when set
    institutionKey: string | undefined;
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    jitter: number;
  };
  search: {
    maxQueryLength: number;
  };
}

function optionalString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    openai: {
      apiKey: optionalString(env.OPENAI_API_KEY),
      model: optionalString(env.OPENAI_MODEL) ?? 'o4-mini',
      timeoutMs: Number(env.TRANSLATION_TIMEOUT_MS) || 45000, // 45 seconds, reasoning models are slow
    },
    gbif: {
      baseUrl: (optionalString(env.GBIF_API_BASE) ?? 'https://api.gbif.org/v1').replace(/\/+$/, ''),
      basisOfRecord: optionalString(env.GBIF_BASIS_OF_RECORD) ?? 'PRESERVED_SPECIMEN',
      timeoutMs: Number(env.GBIF_TIMEOUT_MS) || 15000,
      institutionKey: optionalString(env.INSTITUTION_KEY),
    },
    retry: {
      maxAttempts: Number(env.RETRY_MAX_ATTEMPTS) || 3,
      baseDelayMs: Number(env.RETRY_BASE_DELAY_MS) || 400,
      maxDelayMs: Number(env.RETRY_MAX_DELAY_MS) || 4000,
      jitter: 0.25,
    },
    search: {
      maxQueryLength: 500,
    },
  };
}

export const CONFIG: AppConfig = loadConfig();

// Environment validation
export function validateConfig(config: AppConfig = CONFIG) {
  const errors: string[] = [];

  if (!config.openai.apiKey) {
    errors.push('OPENAI_API_KEY must be set');
  }

  if (!Number.isInteger(config.retry.maxAttempts) || config.retry.maxAttempts < 1) {
    errors.push('RETRY_MAX_ATTEMPTS should be a whole number of at least 1');
  }

  if (config.gbif.timeoutMs < 1000) {
    errors.push('GBIF_TIMEOUT_MS should be at least 1000ms');
  }

  if (config.openai.timeoutMs < 1000) {
    errors.push('TRANSLATION_TIMEOUT_MS should be at least 1000ms');
  }

  if (config.retry.maxDelayMs < config.retry.baseDelayMs) {
    errors.push('RETRY_MAX_DELAY_MS should not be smaller than RETRY_BASE_DELAY_MS');
  }

  if (config.gbif.institutionKey && /\s/.test(config.gbif.institutionKey)) {
    errors.push('INSTITUTION_KEY should be a single GRSciColl identifier');
  }

  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return true;
}
