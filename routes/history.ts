import { Router } from "express";
import type { DataSource } from "typeorm";
import { listOf, toHistoryResponse } from "../responses";
import { listHistory } from "../services/historyService";
import { asyncHandler } from "./asyncHandler";
import { parseId } from "./params";

export function historyRouter(dataSource: DataSource): Router {
  const r = Router();

  r.get(
    "/glossary/:id/history",
    asyncHandler(async (req, res) => {
      const records = await listHistory(dataSource.manager, parseId(req.params.id));
      res.json(listOf(records.map(toHistoryResponse)));
    })
  );

  return r;
}
