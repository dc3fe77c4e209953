/**
 * Handler input validation and query building
 */
import { z } from 'zod';
import { ValidationError } from '@qa-relay/fetch-retry';
import type { QueryParams } from '@qa-relay/fetch-client';
import { formatZodIssues } from './schemas.mjs';

export const SEARCH_SORTS = ['relevance', 'activity', 'votes', 'creation'] as const;
export type SearchSort = (typeof SEARCH_SORTS)[number];

/** Largest page the API serves */
export const MAX_PAGE_SIZE = 100;

const PageSchema = z.number().int('must be an integer').min(1, 'must be at least 1').default(1);
const PageSizeSchema = z
  .number()
  .int('must be an integer')
  .min(1, 'must be at least 1')
  .max(MAX_PAGE_SIZE, `must be at most ${MAX_PAGE_SIZE}`)
  .default(10);

export const SearchOptionsSchema = z.object({
  query: z.string().trim().min(1, 'must not be empty'),
  page: PageSchema,
  pageSize: PageSizeSchema,
  sort: z.enum(SEARCH_SORTS).default('relevance'),
});

export const TagSearchOptionsSchema = z.object({
  tags: z.array(z.string().trim().min(1, 'must not be empty')).min(1, 'at least one tag is required'),
  page: PageSchema,
  pageSize: PageSizeSchema,
  sort: z.enum(SEARCH_SORTS).default('activity'),
});

export const QuestionIdSchema = z.number().int('must be an integer').positive('must be a positive integer');

export const QuestionOptionsSchema = z.object({
  includeAnswers: z.boolean().default(true),
  maxAnswers: z.number().int('must be an integer').min(1, 'must be at least 1').optional(),
});

export type SearchOptions = z.input<typeof SearchOptionsSchema>;
export type TagSearchOptions = z.input<typeof TagSearchOptionsSchema>;
export type QuestionOptions = z.input<typeof QuestionOptionsSchema>;

export type ResolvedSearchOptions = z.output<typeof SearchOptionsSchema>;
export type ResolvedTagSearchOptions = z.output<typeof TagSearchOptionsSchema>;
export type ResolvedQuestionOptions = z.output<typeof QuestionOptionsSchema>;

/**
 * Validate handler input; nothing is queued when this throws
 */
export function validateInput<S extends z.ZodTypeAny>(schema: S, input: unknown, label: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(`Invalid ${label}: ${formatZodIssues(result.error.issues)}`);
  }
  return result.data;
}

export function buildSearchParams(options: ResolvedSearchOptions, site: string): QueryParams {
  return {
    intitle: options.query,
    page: options.page,
    pagesize: options.pageSize,
    sort: options.sort,
    order: 'desc',
    filter: 'default',
    site,
  };
}

export function buildTagSearchParams(options: ResolvedTagSearchOptions, site: string): QueryParams {
  return {
    tagged: options.tags,
    page: options.page,
    pagesize: options.pageSize,
    sort: options.sort,
    order: 'desc',
    filter: 'default',
    site,
  };
}

export function buildQuestionParams(site: string): QueryParams {
  return { filter: 'withbody', site };
}

export function buildAnswerParams(site: string): QueryParams {
  return { sort: 'votes', order: 'desc', filter: 'withbody', site };
}
