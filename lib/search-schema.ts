import { z } from 'zod';
import { ValidationError } from './errors';

// Search dimensions a query can be translated into, and the only ones the
// occurrence search will accept.

export const CONTINENTS = [
  'AFRICA',
  'ANTARCTICA',
  'ASIA',
  'EUROPE',
  'NORTH_AMERICA',
  'OCEANIA',
  'SOUTH_AMERICA',
] as const;

export type Continent = (typeof CONTINENTS)[number];

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * True for real calendar dates in YYYY-MM-DD form ("1835-02-30" is rejected).
 */
export function isCalendarDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return false;
  const [, year, month, day] = match.map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

const text = z.string().trim().min(1, 'must not be blank').max(200, 'is too long');
const calendarDate = z.string().refine(isCalendarDate, 'must be a calendar date in YYYY-MM-DD format');
// Only keys a GRSciColl lookup can return; INSTITUTION_KEY is applied after validation
const grscicollKey = z.string().uuid('must be a GRSciColl key');
const code = z.string().trim().min(1, 'must not be blank').max(50, 'is too long');

export const PARAMETER_FIELDS = [
  'taxon',
  'location',
  'continent',
  'country',
  'stateProvince',
  'dateFrom',
  'dateTo',
  'collector',
  'institution',
  'collection',
  'hasImage',
] as const;

export type ParameterField = (typeof PARAMETER_FIELDS)[number];

interface FieldDefinition {
  schema: z.ZodTypeAny;
  type: string;
  meaning: string;
  example: string;
}

const FIELDS = {
  taxon: {
    schema: text,
    type: 'string',
    meaning: 'Taxon to search for, as a scientific name. Convert common names to the best matching scientific name.',
    example: '"Cyanocitta cristata"',
  },
  location: {
    schema: text,
    type: 'string',
    meaning: 'Geographic locality: a city, lake, landmark or site description. Never an institution or collection.',
    example: '"Toronto"',
  },
  continent: {
    schema: z.enum(CONTINENTS),
    type: CONTINENTS.join(' | '),
    meaning: 'Continent the specimen was collected on.',
    example: '"SOUTH_AMERICA"',
  },
  country: {
    schema: z.string().regex(/^[A-Z]{2}$/, 'must be a two-letter upper-case ISO 3166 country code'),
    type: 'string',
    meaning: 'Country as its two-letter ISO 3166-1 code in capital letters.',
    example: '"CA"',
  },
  stateProvince: {
    schema: text,
    type: 'string',
    meaning: 'State, province or other first-level administrative division.',
    example: '"Ontario"',
  },
  dateFrom: {
    schema: calendarDate,
    type: 'date (YYYY-MM-DD)',
    meaning: 'Earliest collection date. A bare year starts on January 1st.',
    example: '"1990-01-01"',
  },
  dateTo: {
    schema: calendarDate,
    type: 'date (YYYY-MM-DD)',
    meaning: 'Latest collection date. A bare year ends on December 31st.',
    example: '"2000-12-31"',
  },
  collector: {
    schema: text,
    type: 'string',
    meaning: 'Name of the person who collected the specimen. Only human names.',
    example: '"Darwin"',
  },
  institution: {
    schema: text,
    type: 'string',
    meaning: 'Name of the institution holding the specimen, as written in the query.',
    example: '"Royal Ontario Museum"',
  },
  collection: {
    schema: text,
    type: 'string',
    meaning: 'Name of the collection holding the specimen, as written in the query.',
    example: '"Ornithology Collection"',
  },
  hasImage: {
    schema: z.boolean({ invalid_type_error: 'must be true or false' }),
    type: 'boolean',
    meaning: 'True only when the query asks for specimens with images or photos.',
    example: 'true',
  },
} satisfies Record<ParameterField, FieldDefinition>;

function checkDateOrder(value: { dateFrom?: string; dateTo?: string }, ctx: z.RefinementCtx) {
  if (value.dateFrom && value.dateTo && value.dateFrom > value.dateTo) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['dateFrom'],
      message: `must not be after dateTo (${value.dateTo})`,
    });
  }
}

export const candidateParametersSchema = z
  .object({
    taxon: FIELDS.taxon.schema.optional(),
    location: FIELDS.location.schema.optional(),
    continent: FIELDS.continent.schema.optional(),
    country: FIELDS.country.schema.optional(),
    stateProvince: FIELDS.stateProvince.schema.optional(),
    dateFrom: FIELDS.dateFrom.schema.optional(),
    dateTo: FIELDS.dateTo.schema.optional(),
    collector: FIELDS.collector.schema.optional(),
    institution: FIELDS.institution.schema.optional(),
    collection: FIELDS.collection.schema.optional(),
    hasImage: FIELDS.hasImage.schema.optional(),
  })
  .strict()
  .superRefine(checkDateOrder);

export type CandidateParameters = z.infer<typeof candidateParametersSchema>;

export const resolvedParametersSchema = z
  .object({
    taxon: FIELDS.taxon.schema.optional(),
    location: FIELDS.location.schema.optional(),
    continent: FIELDS.continent.schema.optional(),
    country: FIELDS.country.schema.optional(),
    stateProvince: FIELDS.stateProvince.schema.optional(),
    dateFrom: FIELDS.dateFrom.schema.optional(),
    dateTo: FIELDS.dateTo.schema.optional(),
    collector: FIELDS.collector.schema.optional(),
    hasImage: FIELDS.hasImage.schema.optional(),
    institutionKey: grscicollKey.optional(),
    collectionKey: grscicollKey.optional(),
    institutionCode: code.optional(),
    collectionCode: code.optional(),
  })
  .strict()
  .superRefine(checkDateOrder);

export type ResolvedParameters = z.infer<typeof resolvedParametersSchema>;

export type SchemaValidation<T> = { success: true; data: T } | { success: false; error: ValidationError };

function toValidationError(error: z.ZodError): ValidationError {
  const issue = error.issues[0];
  if (issue.code === z.ZodIssueCode.unrecognized_keys) {
    return new ValidationError(issue.keys[0], 'is not a recognised search parameter');
  }
  const field = issue.path.length > 0 ? issue.path.join('.') : 'parameters';
  return new ValidationError(field, issue.message);
}

function validateWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): SchemaValidation<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: toValidationError(result.error) };
}

/**
 * Structural check of a candidate parameter set. Institution and collection
 * names are only checked for shape here, never looked up.
 */
export function validateCandidate(input: unknown): SchemaValidation<CandidateParameters> {
  return validateWith(candidateParametersSchema, input);
}

export function validateResolved(input: unknown): SchemaValidation<ResolvedParameters> {
  return validateWith(resolvedParametersSchema, input);
}

export function isEmptyParameters(params: CandidateParameters | ResolvedParameters): boolean {
  return Object.values(params).every((value) => value === undefined);
}

/**
 * GBIF range syntax, with "*" for an open end.
 */
export function formatEventDate(dateFrom?: string, dateTo?: string): string | undefined {
  if (!dateFrom && !dateTo) return undefined;
  if (dateFrom && dateTo && dateFrom === dateTo) return dateFrom;
  return `${dateFrom ?? '*'},${dateTo ?? '*'}`;
}

/**
 * Field definitions as handed to the language model.
 */
export function describeParameters(): string {
  return PARAMETER_FIELDS.map((name) => {
    const field: FieldDefinition = FIELDS[name];
    return `- ${name} (${field.type}): ${field.meaning} Example: ${field.example}`;
  }).join('\n');
}
