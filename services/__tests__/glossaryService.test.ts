import { QueryFailedError, type DataSource, type EntityManager } from "typeorm";
import { v4 as uuidv4 } from "uuid";
import { GlossaryEntry, GlossaryHistory, Like } from "../../entity";
import { createTestDataSource } from "../../__tests__/helpers/db";
import {
  createGlossary,
  deleteGlossary,
  getGlossary,
  groupByFirstLetter,
  listGlossary,
  listPopular,
  searchGlossary,
  updateGlossary,
} from "../glossaryService";
import { listHistory } from "../historyService";
import { addLike } from "../likeService";

const strict = { historyMode: "strict" } as const;
const bestEffort = { historyMode: "best-effort" } as const;

describe("glossaryService", () => {
  let ds: DataSource;
  let db: EntityManager;

  beforeEach(async () => {
    ds = await createTestDataSource();
    db = ds.manager;
  });

  afterEach(async () => {
    await ds.destroy();
  });

  const create = (term: string, definition: string, who: string | null = null) =>
    createGlossary(db, { term, definition }, who, strict);

  describe("createGlossary", () => {
    it("stores revision 0 with equal timestamps and a first history row", async () => {
      const entry = await create("Cache", "A store of precomputed results", "author@example.com");

      expect(entry.revision).toBe(0);
      expect(entry.createdAt.getTime()).toBe(entry.updatedAt.getTime());

      const stored = await getGlossary(db, entry.id);
      expect(stored.term).toBe("Cache");
      expect(stored.definition).toBe("A store of precomputed results");
      expect(stored.createdAt.toISOString()).toBe(entry.createdAt.toISOString());

      const history = await listHistory(db, entry.id);
      expect(history).toHaveLength(1);
      expect(history[0]).toMatchObject({ revision: 0, who: "author@example.com", term: "Cache" });
    });

    it("rejects a duplicate term as a conflict", async () => {
      await create("Cache", "first");
      await expect(create("Cache", "second")).rejects.toMatchObject({
        kind: "Conflict",
        message: 'Term "Cache" already exists',
      });
      expect(await db.count(GlossaryEntry)).toBe(1);
    });

    it("rolls the entry back in strict mode when history cannot be written", async () => {
      await ds.query("DROP TABLE glossary_history");
      await expect(create("Cache", "def")).rejects.toBeInstanceOf(QueryFailedError);
      expect(await db.count(GlossaryEntry)).toBe(0);
    });

    it("keeps the entry in best-effort mode when history cannot be written", async () => {
      await ds.query("DROP TABLE glossary_history");
      const entry = await createGlossary(db, { term: "Cache", definition: "def" }, null, bestEffort);
      expect((await getGlossary(db, entry.id)).term).toBe("Cache");
    });
  });

  describe("updateGlossary", () => {
    it("increments the revision by one per update and records each one", async () => {
      const entry = await create("Cache", "v0", "a@example.com");

      const first = await updateGlossary(db, entry.id, { term: "Cache", definition: "v1" }, "b@example.com", strict);
      const second = await updateGlossary(db, entry.id, { term: "Cache", definition: "v2" }, null, strict);

      expect(first.revision).toBe(1);
      expect(second.revision).toBe(2);
      expect(second.definition).toBe("v2");
      expect(second.createdAt.toISOString()).toBe(entry.createdAt.toISOString());

      const history = await listHistory(db, entry.id);
      expect(history.map((h) => [h.revision, h.definition, h.who])).toEqual([
        [2, "v2", null],
        [1, "v1", "b@example.com"],
        [0, "v0", "a@example.com"],
      ]);
    });

    it("fails with NotFound for an unknown id", async () => {
      await expect(
        updateGlossary(db, uuidv4(), { term: "Ghost", definition: "none" }, null, strict)
      ).rejects.toMatchObject({ kind: "NotFound" });
    });

    it("rejects renaming onto another entry's term", async () => {
      await create("Cache", "one");
      const queue = await create("Queue", "two");
      await expect(
        updateGlossary(db, queue.id, { term: "Cache", definition: "two" }, null, strict)
      ).rejects.toMatchObject({
        kind: "Conflict",
        message: 'Term "Cache" already exists',
      });
      expect((await getGlossary(db, queue.id)).revision).toBe(0);
    });
  });

  describe("deleteGlossary", () => {
    it("removes the entry together with its likes and history", async () => {
      const entry = await create("Cache", "def");
      await addLike(db, entry.id, null);

      expect(await deleteGlossary(db, entry.id)).toBe(1);

      await expect(getGlossary(db, entry.id)).rejects.toMatchObject({ kind: "NotFound" });
      expect(await db.countBy(Like, { glossaryId: entry.id })).toBe(0);
      expect(await db.countBy(GlossaryHistory, { glossaryId: entry.id })).toBe(0);
    });

    it("is a no-op for an unknown id", async () => {
      expect(await deleteGlossary(db, uuidv4())).toBe(0);
    });
  });

  describe("listGlossary", () => {
    it("orders entries by term", async () => {
      await create("Stack", "LIFO");
      await create("Cache", "store");
      await create("Queue", "FIFO");
      expect((await listGlossary(db)).map((e) => e.term)).toEqual(["Cache", "Queue", "Stack"]);
    });
  });

  describe("searchGlossary", () => {
    beforeEach(async () => {
      await create("Stack", "Last in, first out structure");
      await create("Cache", "A store of precomputed results");
      await create("Queue", "First in, first out buffer");
    });

    it("matches definitions case-insensitively, ordered by term", async () => {
      expect((await searchGlossary(db, "FIRST")).map((e) => e.term)).toEqual(["Queue", "Stack"]);
    });

    it("matches terms", async () => {
      expect((await searchGlossary(db, "cach")).map((e) => e.term)).toEqual(["Cache"]);
    });

    it("treats LIKE wildcards literally", async () => {
      expect(await searchGlossary(db, "%")).toEqual([]);
      expect(await searchGlossary(db, "_")).toEqual([]);
    });

    it("rejects an empty or blank query", async () => {
      const invalid = { kind: "InvalidInput", message: "Search query must not be empty" };
      await expect(searchGlossary(db, "")).rejects.toMatchObject(invalid);
      await expect(searchGlossary(db, "   ")).rejects.toMatchObject(invalid);
    });
  });

  describe("listPopular", () => {
    it("is empty when nothing has been liked", async () => {
      await create("Cache", "def");
      expect(await listPopular(db)).toEqual([]);
    });

    it("ranks by like count and breaks ties by id", async () => {
      const a = await create("Alpha", "a");
      const b = await create("Beta", "b");
      const c = await create("Gamma", "c");
      await create("Delta", "never liked");

      for (let i = 0; i < 3; i++) {
        await addLike(db, a.id, null);
        await addLike(db, c.id, null);
      }
      await addLike(db, b.id, "fan@example.com");

      const [firstTied, secondTied] = [a.id, c.id].sort();
      const ranked = await listPopular(db);
      expect(ranked.map((p) => [p.entry.id, p.likes])).toEqual([
        [firstTied, 3],
        [secondTied, 3],
        [b.id, 1],
      ]);

      expect((await listPopular(db, 1)).map((p) => p.entry.id)).toEqual([firstTied]);
      expect(await listPopular(db, 0)).toEqual([]);
    });
  });

  describe("groupByFirstLetter", () => {
    it("buckets by the uppercased first character and keeps order", () => {
      const grouped = groupByFirstLetter(["Apple", "avocado", "Banana", "3D"], (s) => s);
      expect(grouped).toEqual({ A: ["Apple", "avocado"], B: ["Banana"], "3": ["3D"] });
    });
  });
});
