/**
 * Response schemas for the Stack Exchange API
 *
 * Payloads come back from the dispatcher as `unknown`; every handler narrows
 * them here before returning anything typed. Unknown fields pass through.
 */
import { z } from 'zod';
import { ValidationError } from '@qa-relay/fetch-retry';

export const OwnerSchema = z
  .object({
    user_id: z.number().optional(),
    display_name: z.string().optional(),
    reputation: z.number().optional(),
    link: z.string().optional(),
  })
  .passthrough();

export const QuestionSchema = z
  .object({
    question_id: z.number().int(),
    title: z.string(),
    link: z.string().optional(),
    body: z.string().optional(),
    tags: z.array(z.string()).default([]),
    score: z.number().default(0),
    answer_count: z.number().default(0),
    view_count: z.number().optional(),
    is_answered: z.boolean().default(false),
    accepted_answer_id: z.number().optional(),
    creation_date: z.number().optional(),
    last_activity_date: z.number().optional(),
    owner: OwnerSchema.optional(),
  })
  .passthrough();

export const AnswerSchema = z
  .object({
    answer_id: z.number().int(),
    question_id: z.number().int(),
    body: z.string().optional(),
    score: z.number().default(0),
    is_accepted: z.boolean().default(false),
    creation_date: z.number().optional(),
    last_activity_date: z.number().optional(),
    owner: OwnerSchema.optional(),
  })
  .passthrough();

const envelopeFields = {
  has_more: z.boolean().default(false),
  total: z.number().optional(),
  quota_max: z.number().optional(),
  quota_remaining: z.number().optional(),
};

export const QuestionListSchema = z.object({
  items: z.array(QuestionSchema).default([]),
  ...envelopeFields,
});

export const AnswerListSchema = z.object({
  items: z.array(AnswerSchema).default([]),
  ...envelopeFields,
});

export const InfoSchema = z.object({
  items: z.array(z.record(z.unknown())).default([]),
  ...envelopeFields,
});

export type Owner = z.infer<typeof OwnerSchema>;
export type Question = z.infer<typeof QuestionSchema>;
export type Answer = z.infer<typeof AnswerSchema>;
export type QuestionList = z.infer<typeof QuestionListSchema>;
export type AnswerList = z.infer<typeof AnswerListSchema>;

/**
 * One line per issue, `path: message`
 */
export function formatZodIssues(issues: ReadonlyArray<Pick<z.ZodIssue, 'path' | 'message'>>): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Narrow an upstream payload or throw ValidationError
 */
export function parsePayload<S extends z.ZodTypeAny>(schema: S, data: unknown, operation: string): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(`Unexpected response from ${operation}: ${formatZodIssues(result.error.issues)}`);
  }
  return result.data;
}
