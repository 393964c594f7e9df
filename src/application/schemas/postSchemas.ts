import { z } from "zod";
import type { Post, PostDraft, PostInput } from "../../domain/entities/Post.js";
import { ValidationError } from "../../domain/errors/PostErrors.js";
import {
  DEFAULT_LIMIT,
  DEFAULT_PAGE,
  SortDirection,
  SortField,
  type ListOptions,
} from "../../domain/value-objects/SortOptions.js";

type QueryValue = string | number | undefined;

export interface ListQuery {
  sort?: QueryValue;
  direction?: QueryValue;
  page?: QueryValue;
  limit?: QueryValue;
}

export interface SearchQuery {
  title?: string;
  content?: string;
}

const positiveInt = (label: string, fallback: number) =>
  z.coerce
    .number({ invalid_type_error: `Invalid ${label}` })
    .int({ message: `Invalid ${label}` })
    .positive({ message: `Invalid ${label}` })
    .default(fallback);

const listQuerySchema = z.object({
  sort: z.preprocess(
    (value) => (value === "" ? undefined : value),
    z
      .nativeEnum(SortField, {
        errorMap: () => ({ message: "Invalid sort field" }),
      })
      .optional()
  ),
  direction: z
    .nativeEnum(SortDirection, {
      errorMap: () => ({ message: "Invalid sort direction" }),
    })
    .default(SortDirection.ASC),
  page: positiveInt("page", DEFAULT_PAGE),
  limit: positiveInt("limit", DEFAULT_LIMIT),
});

const requiredText = z
  .string()
  .refine((value) => value.trim().length > 0);

const DRAFT_FIELDS: Array<keyof PostDraft> = ["title", "content"];

function firstMessage(error: z.ZodError): string {
  return error.issues[0]?.message ?? "Invalid request";
}

export function parseListQuery(query: ListQuery): ListOptions {
  const result = listQuerySchema.safeParse(query);
  if (!result.success) {
    throw new ValidationError(firstMessage(result.error));
  }
  return result.data;
}

/**
 * Validates a create/update payload. Every absent, non-string or blank field is
 * reported in one error, in title-then-content order.
 */
export function parsePostDraft(input: PostInput): PostDraft {
  const missing = DRAFT_FIELDS.filter(
    (field) => !requiredText.safeParse(input[field]).success
  );

  if (missing.length > 0) {
    throw new ValidationError(`Missing field: ${missing.join(", ")}`);
  }

  return {
    title: requiredText.parse(input.title),
    content: requiredText.parse(input.content),
  };
}

export function toPost(id: number, draft: PostDraft): Post {
  return { id, title: draft.title, content: draft.content };
}
