import assert from "node:assert/strict";
import { ObjectId } from "mongodb";

import { assistRequestSchema, userPreferenceSchema, vendorQuerySchema } from "../../core/schemas.js";
import { toVendor, vendorQuery } from "../mongo.js";
import { escapeRegex } from "../store.js";
import { runCases, type Case } from "../../__tests__/harness.js";

const basePref = {
  full_name: "Test Couple",
  email: "couple@example.test",
  region: "lebanon",
  guest_count: 250,
  budget: 50000,
};

const cases: Case[] = [
  {
    name: "preference: currency defaults to USD",
    run: () => {
      const parsed = userPreferenceSchema.parse(basePref);
      assert.equal(parsed.currency, "USD");
      assert.equal(parsed.region, "lebanon");
    },
  },
  {
    name: "preference: guest count, budget and region are validated",
    run: () => {
      assert.equal(userPreferenceSchema.safeParse({ ...basePref, guest_count: 0 }).success, false);
      assert.equal(userPreferenceSchema.safeParse({ ...basePref, guest_count: 2001 }).success, false);
      assert.equal(userPreferenceSchema.safeParse({ ...basePref, guest_count: 12.5 }).success, false);
      assert.equal(userPreferenceSchema.safeParse({ ...basePref, budget: -1 }).success, false);
      assert.equal(userPreferenceSchema.safeParse({ ...basePref, region: "europe" }).success, false);
      assert.equal(userPreferenceSchema.safeParse({ ...basePref, currency: "JPY" }).success, false);
      const { region: _omit, ...noRegion } = basePref;
      assert.equal(userPreferenceSchema.safeParse(noRegion).success, false);
      assert.equal(userPreferenceSchema.safeParse({ ...basePref, guest_count: 2000, budget: 0 }).success, true);
    },
  },
  {
    name: "assist request: every field optional, currency left as free text",
    run: () => {
      assert.deepEqual(assistRequestSchema.parse({}), { message: "" });
      assert.equal(assistRequestSchema.parse({ currency: "xyz" }).currency, "xyz");
    },
  },
  {
    name: "vendor query: query-string values are coerced",
    run: () => {
      const parsed = vendorQuerySchema.parse({ featured: "true", limit: "10", min_capacity: "200", region: "gcc" });
      assert.deepEqual(parsed, { featured: true, limit: 10, min_capacity: 200, region: "gcc" });
      assert.equal(vendorQuerySchema.parse({}).limit, 50);
      assert.equal(vendorQuerySchema.parse({ featured: "0" }).featured, false);
      assert.equal(vendorQuerySchema.safeParse({ limit: "500" }).success, false);
      assert.equal(vendorQuerySchema.safeParse({ category: "fireworks" }).success, false);
    },
  },
  {
    name: "mongo query: exact fields, case-insensitive city and escaped free text",
    run: () => {
      assert.deepEqual(vendorQuery({ region: "gcc", category: "venue" }), { region: "gcc", category: "venue" });
      assert.deepEqual(vendorQuery({ city: "Beirut", min_capacity: 300, featured: false }), {
        featured: false,
        city: { $regex: "^Beirut$", $options: "i" },
        capacity: { $gte: 300 },
      });
      assert.deepEqual(vendorQuery({ q: "a.b" }), {
        $or: [
          { name: { $regex: "a\\.b", $options: "i" } },
          { description: { $regex: "a\\.b", $options: "i" } },
        ],
      });
      assert.equal(escapeRegex("$$$ (x)"), "\\$\\$\\$ \\(x\\)");
    },
  },
  {
    name: "mongo boundary: documents become typed vendors with string ids",
    run: () => {
      const _id = new ObjectId("65a1b2c3d4e5f60718293a4b");
      const v = toVendor({
        _id,
        name: "Cedar Hall",
        category: "venue",
        region: "lebanon",
        languages: ["Arabic"],
        price_tier: "$$$",
        images: [],
        featured: true,
        capacity: 400,
      });
      assert.equal(v.id, "65a1b2c3d4e5f60718293a4b");
      assert.equal(v.capacity, 400);
      assert.equal(v.average_price_usd, undefined);
      assert.equal(v.featured, true);
      assert.equal("_id" in v, false);
    },
  },
];

await runCases("boundary", cases);
