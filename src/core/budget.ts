import { allocationsFor, BUDGET_CATEGORIES } from "./allocations.js";
import { convertFromUsd, convertToUsd } from "./currency.js";
import type { BudgetItem } from "./schemas.js";
import type { PlannerTables } from "./tables.js";

/**
 * Splits `total` (stated in `currency`) across the regional profile.
 * Each share is computed in USD and converted back, so non-USD budgets can
 * drift by a cent per line against `total * percent / 100`.
 */
export function buildBudget(total: number, currency: string, region: string, tables: PlannerTables): BudgetItem[] {
  const profile = allocationsFor(region, tables.allocations);
  const totalUsd = convertToUsd(total, currency, tables.rates);

  return BUDGET_CATEGORIES.map((category) => {
    const pct = profile[category];
    return {
      category,
      allocation_percent: pct,
      amount: convertFromUsd(totalUsd * (pct / 100), currency, tables.rates),
    };
  });
}
