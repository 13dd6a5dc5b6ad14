import { In, type EntityManager } from "typeorm";
import { v4 as uuidv4 } from "uuid";
import type { HistoryMode } from "../config";
import { GlossaryEntry, Like } from "../entity";
import { ApiError, isConstraintViolation } from "../errors";
import { log } from "../logger";
import type { GlossaryInput } from "../types";
import { appendHistory } from "./historyService";

export interface WriteOptions {
  historyMode: HistoryMode;
}

export interface PopularEntry {
  entry: GlossaryEntry;
  likes: number;
}

export const DEFAULT_POPULAR_LIMIT = 10;

export async function listGlossary(db: EntityManager): Promise<GlossaryEntry[]> {
  return db.find(GlossaryEntry, { order: { term: "ASC" } });
}

export async function getGlossary(db: EntityManager, id: string): Promise<GlossaryEntry> {
  const entry = await db.findOneBy(GlossaryEntry, { id });
  if (!entry) throw ApiError.notFound();
  return entry;
}

function termConflict(err: unknown, term: string): unknown {
  return isConstraintViolation(err, "unique") ? ApiError.conflict(`Term "${term}" already exists`) : err;
}

/**
 * Runs an entry write and records its history row. In strict mode both share
 * one transaction; in best-effort mode the entry commits first and a failed
 * history insert is only logged.
 */
async function writeWithHistory(
  db: EntityManager,
  who: string | null,
  { historyMode }: WriteOptions,
  write: (tx: EntityManager) => Promise<GlossaryEntry>
): Promise<GlossaryEntry> {
  const snapshot = (entry: GlossaryEntry) => ({
    glossaryId: entry.id,
    term: entry.term,
    definition: entry.definition,
    revision: entry.revision,
    who,
  });

  if (historyMode === "strict") {
    return db.transaction(async (tx) => {
      const entry = await write(tx);
      await appendHistory(tx, snapshot(entry));
      return entry;
    });
  }

  const entry = await db.transaction(write);
  try {
    await appendHistory(db, snapshot(entry));
  } catch (err) {
    log.warn({ err, glossaryId: entry.id, revision: entry.revision }, "history append failed, entry write kept");
  }
  return entry;
}

export async function createGlossary(
  db: EntityManager,
  input: GlossaryInput,
  who: string | null,
  options: WriteOptions
): Promise<GlossaryEntry> {
  return writeWithHistory(db, who, options, async (tx) => {
    const now = new Date();
    const entry = tx.create(GlossaryEntry, {
      id: uuidv4(),
      term: input.term,
      definition: input.definition,
      revision: 0,
      createdAt: now,
      updatedAt: now,
    });
    try {
      await tx.insert(GlossaryEntry, entry);
    } catch (err) {
      throw termConflict(err, input.term);
    }
    return entry;
  });
}

export async function updateGlossary(
  db: EntityManager,
  id: string,
  input: GlossaryInput,
  who: string | null,
  options: WriteOptions
): Promise<GlossaryEntry> {
  return writeWithHistory(db, who, options, async (tx) => {
    await getGlossary(tx, id);
    try {
      // revision is bumped by the database, never read-modify-write
      await tx
        .createQueryBuilder()
        .update(GlossaryEntry)
        .set({
          term: input.term,
          definition: input.definition,
          revision: () => "revision + 1",
          updatedAt: new Date(),
        })
        .where("id = :id", { id })
        .execute();
    } catch (err) {
      throw termConflict(err, input.term);
    }
    return getGlossary(tx, id);
  });
}

/** Likes and history go with the entry through ON DELETE CASCADE. Missing ids are not an error. */
export async function deleteGlossary(db: EntityManager, id: string): Promise<number> {
  const result = await db.delete(GlossaryEntry, { id });
  return result.affected ?? 0;
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (c) => `\\${c}`);
}

export async function searchGlossary(db: EntityManager, query: string): Promise<GlossaryEntry[]> {
  const needle = query.trim();
  if (!needle) throw ApiError.invalidInput("Search query must not be empty");

  const pattern = `%${escapeLike(needle.toLowerCase())}%`;
  return db
    .createQueryBuilder(GlossaryEntry, "entry")
    .where("LOWER(entry.term) LIKE :pattern ESCAPE '\\' OR LOWER(entry.definition) LIKE :pattern ESCAPE '\\'", {
      pattern,
    })
    .orderBy("entry.term", "ASC")
    .getMany();
}

/**
 * Entries ranked by like count, highest first, ties broken by id ascending.
 * Entries nobody liked never show up.
 */
export async function listPopular(db: EntityManager, limit = DEFAULT_POPULAR_LIMIT): Promise<PopularEntry[]> {
  if (limit <= 0) return [];

  const ranked = await db
    .createQueryBuilder(Like, "lk")
    .select("lk.glossaryId", "glossaryId")
    .addSelect("COUNT(lk.id)", "total")
    .groupBy("lk.glossaryId")
    .orderBy("total", "DESC")
    .addOrderBy("lk.glossaryId", "ASC")
    .limit(limit)
    .getRawMany<{ glossaryId: string; total: number | string }>();
  if (ranked.length === 0) return [];

  const entries = await db.findBy(GlossaryEntry, { id: In(ranked.map((r) => r.glossaryId)) });
  const byId = new Map(entries.map((e) => [e.id, e]));

  return ranked.flatMap((r) => {
    const entry = byId.get(r.glossaryId);
    return entry ? [{ entry, likes: Number(r.total) }] : [];
  });
}

/** Buckets items by the uppercased first character of `key(item)`, keeping input order per bucket. */
export function groupByFirstLetter<T>(items: T[], key: (item: T) => string): Record<string, T[]> {
  const groups: Record<string, T[]> = {};
  for (const item of items) {
    const first = Array.from(key(item))[0];
    if (first === undefined) continue;
    const letter = first.toUpperCase();
    (groups[letter] ??= []).push(item);
  }
  return groups;
}
