import type { Region } from "./schemas.js";

export const BUDGET_CATEGORIES = [
  "venue",
  "catering",
  "decor",
  "florals",
  "media",
  "entertainment",
  "beauty",
  "attire",
  "stationery",
  "misc",
] as const;

export type BudgetCategory = (typeof BUDGET_CATEGORIES)[number];

export type AllocationProfile = Readonly<Record<BudgetCategory, number>>;

export type AllocationTable = Readonly<Record<Region, AllocationProfile>>;

export const DEFAULT_REGION: Region = "lebanon";

// Percent of total budget per category, as entered.
export const RAW_REGIONAL_ALLOCATIONS: AllocationTable = Object.freeze({
  lebanon: Object.freeze({
    venue: 28, catering: 22, decor: 12, florals: 8, media: 8,
    entertainment: 8, beauty: 5, attire: 5, stationery: 2, misc: 2,
  }),
  gcc: Object.freeze({
    venue: 30, catering: 20, decor: 12, florals: 8, media: 8,
    entertainment: 10, beauty: 4, attire: 4, stationery: 2, misc: 2,
  }),
  // sums to 95; served as entered, the remaining 5% is left unallocated
  egypt: Object.freeze({
    venue: 22, catering: 25, decor: 10, florals: 6, media: 8,
    entertainment: 8, beauty: 5, attire: 5, stationery: 3, misc: 3,
  }),
});

export type AllocationWarning = {
  region: Region;
  rawTotal: number;
  unallocated: number;
};

export function profileTotal(profile: AllocationProfile): number {
  return BUDGET_CATEGORIES.reduce((sum, cat) => sum + profile[cat], 0);
}

/**
 * Over-allocated profiles are rejected. A short profile is served as entered;
 * the caller gets a warning naming the unallocated share.
 */
export function checkProfile(region: Region, profile: AllocationProfile): AllocationWarning | null {
  const total = profileTotal(profile);
  if (total > 100) {
    throw new Error(`Allocation profile "${region}" sums to ${total}, expected at most 100`);
  }
  if (total === 100) return null;
  return { region, rawTotal: total, unallocated: 100 - total };
}

export function buildAllocationTable(
  raw: AllocationTable = RAW_REGIONAL_ALLOCATIONS,
  onWarning: (w: AllocationWarning) => void = () => {}
): AllocationTable {
  const checked = (region: Region): AllocationProfile => {
    const warning = checkProfile(region, raw[region]);
    if (warning) onWarning(warning);
    return raw[region];
  };

  return Object.freeze({
    lebanon: checked("lebanon"),
    gcc: checked("gcc"),
    egypt: checked("egypt"),
  });
}

export function allocationsFor(region: string | null | undefined, table: AllocationTable): AllocationProfile {
  if (region === "gcc") return table.gcc;
  if (region === "egypt") return table.egypt;
  if (region === "lebanon") return table.lebanon;
  return table[DEFAULT_REGION];
}
