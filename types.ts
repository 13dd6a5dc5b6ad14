// Wire shapes. Field names are snake_case to match the published API.

export interface LikeResponse {
  id: string;
  created_at: string;
  who: string | null;
}

export interface GlossaryResponse {
  id: string;
  term: string;
  definition: string;
  revision: number;
  likes: LikeResponse[];
  likes_count: number;
  who: string | null;
  created_at: string;
  updated_at: string;
}

export interface HistoryResponse {
  id: string;
  glossary_id: string;
  term: string;
  definition: string;
  revision: number;
  who: string | null;
  created_at: string;
}

/** Entries bucketed by the uppercased first character of their term. */
export type GroupedGlossary = Record<string, GlossaryResponse[]>;

export interface ListResponse<T> {
  results: T[];
  count: number;
}

export interface MessageResponse {
  message: string;
}

export interface ErrorResponse {
  error: string;
}

export interface GlossaryInput {
  term: string;
  definition: string;
}
