import type { GlossaryEntry, GlossaryHistory, Like } from "./entity";
import type { GlossaryResponse, HistoryResponse, LikeResponse, ListResponse } from "./types";

export function toLikeResponse(like: Like): LikeResponse {
  return { id: like.id, created_at: like.createdAt.toISOString(), who: like.who };
}

export interface EntryExtras {
  likes?: Like[];
  /** Overrides `likes.length`, for lean listings that carry a count without the rows. */
  likesCount?: number;
  who?: string | null;
}

export function toGlossaryResponse(entry: GlossaryEntry, extras: EntryExtras = {}): GlossaryResponse {
  const likes = (extras.likes ?? []).map(toLikeResponse);
  return {
    id: entry.id,
    term: entry.term,
    definition: entry.definition,
    revision: entry.revision,
    likes,
    likes_count: extras.likesCount ?? likes.length,
    who: extras.who ?? null,
    created_at: entry.createdAt.toISOString(),
    updated_at: entry.updatedAt.toISOString(),
  };
}

export function toHistoryResponse(record: GlossaryHistory): HistoryResponse {
  return {
    id: record.id,
    glossary_id: record.glossaryId,
    term: record.term,
    definition: record.definition,
    revision: record.revision,
    who: record.who,
    created_at: record.createdAt.toISOString(),
  };
}

export function listOf<T>(results: T[]): ListResponse<T> {
  return { results, count: results.length };
}
