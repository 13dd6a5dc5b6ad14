import type { Request } from "express";
import { z } from "zod";
import { ApiError } from "../errors";
import { DEFAULT_POPULAR_LIMIT } from "../services/glossaryService";
import { cleanText } from "../sanitize";
import type { GlossaryInput } from "../types";

/** Set by the authenticating reverse proxy in front of the service; trusted as-is. */
export const AUTHENTICATED_USER_HEADER = "x-authenticated-user-email";

export function actingUser(req: Request): string | null {
  const who = req.get(AUTHENTICATED_USER_HEADER);
  return who ? who : null;
}

// Any 8-4-4-4-12 hex id, whatever its version.
const idSchema = z.string().uuid();

export function parseId(raw: string, what = "glossary"): string {
  if (!idSchema.safeParse(raw).success) throw ApiError.invalidInput(`Invalid ${what} ID format`);
  return raw.toLowerCase();
}

const limitSchema = z.coerce.number().int().min(0).max(255).default(DEFAULT_POPULAR_LIMIT);

export function parseLimit(raw: unknown): number {
  const invalid = ApiError.invalidInput("limit must be an integer between 0 and 255");
  // `?limit=` would otherwise coerce to 0
  if (typeof raw === "string" && raw.trim() === "") throw invalid;
  const parsed = limitSchema.safeParse(raw);
  if (!parsed.success) throw invalid;
  return parsed.data;
}

export function parseQuery(raw: unknown): string {
  return typeof raw === "string" ? raw : "";
}

// Wrong JSON types are rejected before cleaning (422); emptiness and length after (400).
const bodyShape = z.object({
  term: z.string().nullish(),
  definition: z.string().nullish(),
});

const bodyFields = z.object({
  term: z
    .string({ required_error: "term is required" })
    .min(1, "term must not be empty")
    .refine((s) => Array.from(s).length <= 255, "term must be at most 255 characters"),
  definition: z.string({ required_error: "definition is required" }).min(1, "definition must not be empty"),
});

function firstIssue(error: z.ZodError, withPath: boolean): string {
  const [issue] = error.issues;
  if (!issue) return "Invalid request body";
  return withPath && issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

export function parseGlossaryInput(body: unknown): GlossaryInput {
  const shape = bodyShape.safeParse(body);
  if (!shape.success) throw ApiError.unprocessable(firstIssue(shape.error, true));

  const { term, definition } = shape.data;
  const fields = bodyFields.safeParse({
    term: term == null ? undefined : cleanText(term),
    definition: definition == null ? undefined : cleanText(definition),
  });
  if (!fields.success) throw ApiError.invalidInput(firstIssue(fields.error, false));
  return fields.data;
}
