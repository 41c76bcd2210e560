import { z } from "zod";

export const REGIONS = ["lebanon", "gcc", "egypt"] as const;
export const CURRENCIES = ["USD", "LBP", "AED", "SAR", "EGP"] as const;

export const VENDOR_CATEGORIES = [
  "venue",
  "planner",
  "photography",
  "videography",
  "catering",
  "music",
  "zaffe",
  "makeup",
  "hair",
  "florals",
  "decor",
  "lighting",
  "dj",
  "band",
  "cake",
  "stationery",
  "transport",
] as const;

export const CHECKLIST_CATEGORIES = [
  "planning",
  "venue",
  "attire",
  "beauty",
  "decor",
  "florals",
  "media",
  "entertainment",
  "food",
  "logistics",
  "paperwork",
  "traditions",
] as const;

export const PRICE_TIERS = ["$", "$$", "$$$", "$$$$"] as const;

export const regionSchema = z.enum(REGIONS);
export const currencySchema = z.enum(CURRENCIES);
export const vendorCategorySchema = z.enum(VENDOR_CATEGORIES);

export type Region = z.infer<typeof regionSchema>;
export type Currency = z.infer<typeof currencySchema>;
export type VendorCategory = z.infer<typeof vendorCategorySchema>;
export type ChecklistCategory = (typeof CHECKLIST_CATEGORIES)[number];
export type PriceTier = (typeof PRICE_TIERS)[number];

// Contact and style fields are stored as given; only region, guest_count, budget and currency drive planning.
export const userPreferenceSchema = z.object({
  full_name: z.string().trim().min(1).max(120),
  email: z.string().trim().min(1).max(200),
  phone: z.string().trim().max(40).optional(),
  region: regionSchema,
  city: z.string().trim().max(80).optional(),
  wedding_date: z.string().trim().max(40).optional(),
  guest_count: z.number().int().min(1).max(2000),
  style: z.string().trim().max(60).optional(),
  budget: z.number().min(0),
  currency: currencySchema.default("USD"),
});

export type UserPreference = z.infer<typeof userPreferenceSchema>;

export const vendorSchema = z.object({
  name: z.string().trim().min(1),
  category: vendorCategorySchema,
  region: regionSchema,
  city: z.string().optional(),
  description: z.string().optional(),
  languages: z.array(z.string()).default([]),
  price_tier: z.enum(PRICE_TIERS).default("$$"),
  average_price_usd: z.number().min(0).optional(),
  capacity: z.number().int().min(1).optional(),
  images: z.array(z.string()).default([]),
  contact_phone: z.string().optional(),
  contact_email: z.string().optional(),
  website: z.string().optional(),
  instagram: z.string().optional(),
  featured: z.boolean().default(false),
});

export type VendorInput = z.infer<typeof vendorSchema>;

export type Vendor = VendorInput & { id: string };

export const inquirySchema = z.object({
  name: z.string().trim().min(1).max(120),
  email: z.string().trim().min(1).max(200),
  phone: z.string().trim().max(40).optional(),
  vendor_id: z.string().trim().optional(),
  message: z.string().trim().min(1).max(4000),
  region: regionSchema.optional(),
});

export type Inquiry = z.infer<typeof inquirySchema>;

// `currency` is a plain string here: unknown codes fall back to USD in the assistant.
export const assistRequestSchema = z.object({
  message: z.string().max(2000).default(""),
  region: regionSchema.optional(),
  budget: z.number().min(0).optional(),
  currency: z.string().trim().max(8).optional(),
  style: z.string().trim().max(60).optional(),
  guest_count: z.number().int().min(1).max(2000).optional(),
  locale: z.string().optional(),
});

export type AssistRequest = z.infer<typeof assistRequestSchema>;

export const recommendRequestSchema = z.object({
  region: regionSchema,
  categories: z.array(vendorCategorySchema).min(1).max(VENDOR_CATEGORIES.length),
  limit: z.number().int().min(1).max(20).optional(),
});

export type RecommendRequest = z.infer<typeof recommendRequestSchema>;

const queryBool = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

export const vendorQuerySchema = z.object({
  region: regionSchema.optional(),
  category: vendorCategorySchema.optional(),
  featured: queryBool.optional(),
  city: z.string().trim().min(1).max(80).optional(),
  price_tier: z.enum(PRICE_TIERS).optional(),
  min_capacity: z.coerce.number().int().min(1).optional(),
  q: z.string().trim().min(1).max(80).optional(),
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

export type VendorQuery = z.infer<typeof vendorQuerySchema>;

export type ChecklistItem = {
  label: string;
  category: ChecklistCategory;
  due_months_before: number;
  optional: boolean;
};

export type BudgetItem = {
  category: string;
  allocation_percent: number;
  amount: number;
};

export function isRegion(value: unknown): value is Region {
  return regionSchema.safeParse(value).success;
}

export function isCurrency(value: unknown): value is Currency {
  return currencySchema.safeParse(value).success;
}
