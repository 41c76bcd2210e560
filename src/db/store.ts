import type { Inquiry, PriceTier, Region, UserPreference, Vendor, VendorCategory, VendorInput } from "../core/schemas.js";

export type VendorFilter = {
  region?: Region;
  category?: VendorCategory;
  featured?: boolean;
  city?: string;
  price_tier?: PriceTier;
  min_capacity?: number;
  /** Case-insensitive substring of name or description. */
  q?: string;
};

export type StoreStatus = {
  connected: boolean;
  database: string;
  collections: string[];
  error?: string;
};

/**
 * Everything the planner reads from or writes to persistence.
 * Records cross this boundary already typed; ids are strings.
 */
export interface PlannerStore {
  insertPreference(pref: UserPreference): Promise<string>;
  insertInquiry(inquiry: Inquiry): Promise<string>;
  findVendors(filter: VendorFilter, limit: number): Promise<Vendor[]>;
  findVendorByName(name: string, region: Region): Promise<Vendor | null>;
  insertVendor(vendor: VendorInput): Promise<string>;
  countVendors(): Promise<number>;
  status(): Promise<StoreStatus>;
}

export function escapeRegex(input: string): string {
  return input.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
