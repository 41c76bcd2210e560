import type { PlannerTables } from "../core/tables.js";
import type { PlannerStore } from "../db/store.js";

export type ApiDeps = {
  store: PlannerStore;
  tables: PlannerTables;
  limitPerCategory: number;
};
