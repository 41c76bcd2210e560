import {
  buildAllocationTable,
  RAW_REGIONAL_ALLOCATIONS,
  type AllocationTable,
  type AllocationWarning,
} from "./allocations.js";
import { CURRENCY_RATES, type CurrencyRates } from "./currency.js";

export type PlannerTables = {
  rates: CurrencyRates;
  allocations: AllocationTable;
};

function warnAllocation(w: AllocationWarning) {
  console.warn(
    `[planner] allocation profile "${w.region}" sums to ${w.rawTotal}; ${w.unallocated}% of the budget stays unallocated`
  );
}

/** Built once at startup and passed to every component that reads the tables. */
export function loadPlannerTables(onWarning: (w: AllocationWarning) => void = warnAllocation): PlannerTables {
  return Object.freeze({
    rates: CURRENCY_RATES,
    allocations: buildAllocationTable(RAW_REGIONAL_ALLOCATIONS, onWarning),
  });
}
