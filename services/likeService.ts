import type { EntityManager } from "typeorm";
import { v7 as uuidv7 } from "uuid";
import { Like } from "../entity";
import { ApiError, isConstraintViolation } from "../errors";

// v7 ids grow with creation time and break same-millisecond ties
const NEWEST_FIRST = { createdAt: "DESC", id: "DESC" } as const;

export async function listLikes(db: EntityManager, glossaryId: string): Promise<Like[]> {
  return db.find(Like, { where: { glossaryId }, order: NEWEST_FIRST });
}

export async function addLike(db: EntityManager, glossaryId: string, who: string | null): Promise<Like> {
  const like = db.create(Like, { id: uuidv7(), glossaryId, who, createdAt: new Date() });
  try {
    await db.insert(Like, like);
  } catch (err) {
    if (isConstraintViolation(err, "foreign-key")) {
      throw ApiError.conflict(`Glossary entry ${glossaryId} does not exist`);
    }
    throw err;
  }
  return like;
}

/**
 * Removes a single like: the given one when `likeId` is set (only if it
 * belongs to the entry), otherwise the most recently created one.
 * Resolves to false when there was nothing to remove.
 */
export async function removeOneLike(db: EntityManager, glossaryId: string, likeId?: string): Promise<boolean> {
  const like = likeId
    ? await db.findOneBy(Like, { id: likeId, glossaryId })
    : await db.findOne(Like, { where: { glossaryId }, order: NEWEST_FIRST });
  if (!like) return false;

  await db.delete(Like, { id: like.id });
  return true;
}
