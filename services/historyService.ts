import type { EntityManager } from "typeorm";
import { v4 as uuidv4 } from "uuid";
import { GlossaryHistory } from "../entity";
import { log } from "../logger";

export interface HistorySnapshot {
  glossaryId: string;
  term: string;
  definition: string;
  who: string | null;
  revision: number;
}

// Newest first; revision breaks ties between writes in the same millisecond.
const NEWEST_FIRST = { createdAt: "DESC", revision: "DESC" } as const;

/** Appends one history row through `db`, so it joins the caller's transaction if there is one. */
export async function appendHistory(db: EntityManager, snapshot: HistorySnapshot): Promise<GlossaryHistory> {
  const record = db.create(GlossaryHistory, { id: uuidv4(), ...snapshot, createdAt: new Date() });
  log.debug(
    { glossaryId: snapshot.glossaryId, revision: snapshot.revision, who: snapshot.who },
    "Insert a history revision"
  );
  await db.insert(GlossaryHistory, record);
  return record;
}

export async function listHistory(db: EntityManager, glossaryId: string): Promise<GlossaryHistory[]> {
  return db.find(GlossaryHistory, { where: { glossaryId }, order: NEWEST_FIRST });
}

export async function mostRecentAuthor(db: EntityManager, glossaryId: string): Promise<string | null> {
  const latest = await db.findOne(GlossaryHistory, { where: { glossaryId }, order: NEWEST_FIRST });
  return latest?.who ?? null;
}
