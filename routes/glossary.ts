import { Router } from "express";
import type { DataSource } from "typeorm";
import type { HistoryMode } from "../config";
import type { GlossaryEntry } from "../entity";
import { listOf, toGlossaryResponse } from "../responses";
import {
  createGlossary,
  deleteGlossary,
  getGlossary,
  groupByFirstLetter,
  listGlossary,
  listPopular,
  searchGlossary,
  updateGlossary,
} from "../services/glossaryService";
import { mostRecentAuthor } from "../services/historyService";
import { listLikes } from "../services/likeService";
import type { GlossaryResponse, GroupedGlossary, MessageResponse } from "../types";
import { asyncHandler } from "./asyncHandler";
import { actingUser, parseGlossaryInput, parseId, parseLimit, parseQuery } from "./params";

export interface GlossaryRouterDeps {
  dataSource: DataSource;
  historyMode: HistoryMode;
}

export function glossaryRouter({ dataSource, historyMode }: GlossaryRouterDeps): Router {
  const r = Router();
  const db = dataSource.manager;
  const writeOptions = { historyMode };

  async function enriched(entry: GlossaryEntry): Promise<GlossaryResponse> {
    const [likes, who] = await Promise.all([listLikes(db, entry.id), mostRecentAuthor(db, entry.id)]);
    return toGlossaryResponse(entry, { likes, who });
  }

  r.get(
    "/glossary",
    asyncHandler(async (_req, res) => {
      const entries = await Promise.all((await listGlossary(db)).map(enriched));
      const grouped: GroupedGlossary = groupByFirstLetter(entries, (e) => e.term);
      res.json(grouped);
    })
  );

  r.get(
    "/glossary-search",
    asyncHandler(async (req, res) => {
      const entries = await searchGlossary(db, parseQuery(req.query.q));
      const results = await Promise.all(
        entries.map(async (entry) => toGlossaryResponse(entry, { who: await mostRecentAuthor(db, entry.id) }))
      );
      res.json(listOf(results));
    })
  );

  r.get(
    "/glossary-popular",
    asyncHandler(async (req, res) => {
      const popular = await listPopular(db, parseLimit(req.query.limit));
      res.json(popular.map(({ entry, likes }) => toGlossaryResponse(entry, { likesCount: likes })));
    })
  );

  r.get(
    "/glossary/:id",
    asyncHandler(async (req, res) => {
      const entry = await getGlossary(db, parseId(req.params.id));
      res.json(await enriched(entry));
    })
  );

  r.post(
    "/glossary",
    asyncHandler(async (req, res) => {
      const input = parseGlossaryInput(req.body);
      const who = actingUser(req);
      const entry = await createGlossary(db, input, who, writeOptions);
      res.json(toGlossaryResponse(entry, { who }));
    })
  );

  r.put(
    "/glossary/:id",
    asyncHandler(async (req, res) => {
      const id = parseId(req.params.id);
      const input = parseGlossaryInput(req.body);
      const who = actingUser(req);
      const entry = await updateGlossary(db, id, input, who, writeOptions);
      res.json(toGlossaryResponse(entry, { who }));
    })
  );

  r.delete(
    "/glossary/:id",
    asyncHandler(async (req, res) => {
      await deleteGlossary(db, parseId(req.params.id));
      const body: MessageResponse = { message: "deleted" };
      res.json(body);
    })
  );

  return r;
}
