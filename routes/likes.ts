import { Router } from "express";
import type { DataSource } from "typeorm";
import { listOf, toLikeResponse } from "../responses";
import { addLike, listLikes, removeOneLike } from "../services/likeService";
import type { MessageResponse } from "../types";
import { asyncHandler } from "./asyncHandler";
import { actingUser, parseId } from "./params";

const OK: MessageResponse = { message: "ok" };

export function likesRouter(dataSource: DataSource): Router {
  const r = Router();
  const db = dataSource.manager;

  r.get(
    "/glossary/:id/likes",
    asyncHandler(async (req, res) => {
      const likes = await listLikes(db, parseId(req.params.id));
      res.json(listOf(likes.map(toLikeResponse)));
    })
  );

  r.post(
    "/glossary/:id/likes",
    asyncHandler(async (req, res) => {
      const like = await addLike(db, parseId(req.params.id), actingUser(req));
      res.json(toLikeResponse(like));
    })
  );

  // minus one: drops the newest like
  r.delete(
    "/glossary/:id/likes",
    asyncHandler(async (req, res) => {
      await removeOneLike(db, parseId(req.params.id));
      res.json(OK);
    })
  );

  r.delete(
    "/glossary/:id/likes/:likeId",
    asyncHandler(async (req, res) => {
      const glossaryId = parseId(req.params.id);
      await removeOneLike(db, glossaryId, parseId(req.params.likeId, "like"));
      res.json(OK);
    })
  );

  return r;
}
