import { createOpenAI } from '@ai-sdk/openai';
import { APICallError, generateObject } from 'ai';
import { z } from 'zod';
import { QUERY_TRANSLATION_AGENT_PROMPT, buildTranslationPrompt } from './agent-prompts';
import { CONFIG, type AppConfig } from './config';
import { TranslationError, ValidationError, isAbortError } from './errors';
import { withTimeout } from './http';
import { RetryExhaustedError, withRetry, type RetryPolicy } from './retry';
import type { SearchContext } from './search-context';
import { CONTINENTS, isEmptyParameters, validateCandidate, type CandidateParameters } from './search-schema';

export interface QueryTranslator {
  /** Rejects with TranslationError when the query cannot be interpreted. */
  translate(text: string, ctx: SearchContext): Promise<CandidateParameters>;
}

export interface CompletionRequest {
  system: string;
  prompt: string;
  signal: AbortSignal;
}

/**
 * One structured language-model call. Resolves with the model's raw object,
 * which is validated by the caller.
 */
export type StructuredCompletion = (request: CompletionRequest) => Promise<unknown>;

// Shape requested from the model. Every key is present and nullable so the
// provider's strict structured output mode accepts it; formats are checked
// afterwards by validateCandidate.
export const translationResponseSchema = z.object({
  taxon: z.string().nullable(),
  location: z.string().nullable(),
  continent: z.enum(CONTINENTS).nullable(),
  country: z.string().nullable(),
  stateProvince: z.string().nullable(),
  dateFrom: z.string().nullable(),
  dateTo: z.string().nullable(),
  collector: z.string().nullable(),
  institution: z.string().nullable(),
  collection: z.string().nullable(),
  hasImage: z.boolean().nullable(),
});

export function createOpenAICompletion(config: AppConfig = CONFIG): StructuredCompletion {
  const provider = createOpenAI({ apiKey: config.openai.apiKey });

  return async ({ system, prompt, signal }) => {
    const { object } = await generateObject({
      model: provider(config.openai.model),
      schema: translationResponseSchema,
      schemaName: 'specimen_search_parameters',
      schemaDescription: 'GBIF occurrence search parameters extracted from a natural language request',
      system,
      prompt,
      // Attempts are counted by withRetry, not by the SDK
      maxRetries: 0,
      abortSignal: signal,
    });
    return object;
  };
}

/**
 * Turns the model's raw object into candidate parameters. Nulls and blank
 * strings mean "not mentioned" and are dropped before validation.
 */
export function interpretModelOutput(raw: unknown): CandidateParameters {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ValidationError('parameters', 'model response is not an object');
  }

  const present = Object.fromEntries(
    Object.entries(raw).filter(([, value]) => {
      if (value === null || value === undefined) return false;
      return typeof value !== 'string' || value.trim() !== '';
    }),
  );

  const validation = validateCandidate(present);
  if (!validation.success) {
    throw validation.error;
  }
  if (isEmptyParameters(validation.data)) {
    throw new ValidationError('parameters', 'no search parameters were recognised');
  }
  return validation.data;
}

function isRetryableTranslationFailure(error: unknown): boolean {
  // Bad credentials or a rejected request will not improve on a second try
  if (APICallError.isInstance(error)) {
    return error.isRetryable;
  }
  return true;
}

export interface LanguageModelTranslatorOptions {
  retry: RetryPolicy;
  timeoutMs: number;
}

export class LanguageModelQueryTranslator implements QueryTranslator {
  constructor(
    private readonly complete: StructuredCompletion,
    private readonly options: LanguageModelTranslatorOptions,
  ) {}

  async translate(text: string, ctx: SearchContext): Promise<CandidateParameters> {
    const prompt = buildTranslationPrompt(text);
    let attempts = 0;

    console.log(`🤖 [${ctx.requestId}] Translating query: "${text}"`);

    try {
      const candidate = await withRetry(
        async (attempt) => {
          attempts = attempt;
          const raw = await withTimeout('language model', this.options.timeoutMs, ctx.signal, (signal) =>
            this.complete({ system: QUERY_TRANSLATION_AGENT_PROMPT, prompt, signal }),
          );
          return interpretModelOutput(raw);
        },
        this.options.retry,
        {
          label: 'Query translation',
          signal: ctx.signal,
          shouldRetry: isRetryableTranslationFailure,
        },
      );

      console.log(`✅ [${ctx.requestId}] Interpreted parameters:`, candidate);
      return candidate;
    } catch (error) {
      if (ctx.signal?.aborted || isAbortError(error)) {
        throw error;
      }
      const attemptsMade = error instanceof RetryExhaustedError ? error.attempts : attempts;
      console.error(`❌ [${ctx.requestId}] Query translation failed after ${attemptsMade} attempt(s):`, error);
      throw new TranslationError('Could not interpret query', attemptsMade, { cause: error });
    }
  }
}

export function createQueryTranslator(config: AppConfig = CONFIG): QueryTranslator {
  return new LanguageModelQueryTranslator(createOpenAICompletion(config), {
    retry: config.retry,
    timeoutMs: config.openai.timeoutMs,
  });
}
