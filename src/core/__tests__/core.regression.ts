import assert from "node:assert/strict";

import {
  allocationsFor,
  BUDGET_CATEGORIES,
  buildAllocationTable,
  checkProfile,
  profileTotal,
  RAW_REGIONAL_ALLOCATIONS,
  type AllocationWarning,
} from "../allocations.js";
import { buildBudget } from "../budget.js";
import { checklistFor } from "../checklist.js";
import {
  convertFromUsd,
  convertToUsd,
  priceInAllCurrencies,
  rateFor,
  roundMoney,
} from "../currency.js";
import { CURRENCIES, REGIONS } from "../schemas.js";
import { loadPlannerTables } from "../tables.js";
import { runCases, type Case } from "../../__tests__/harness.js";

const tables = loadPlannerTables(() => {});

const cases: Case[] = [
  {
    name: "currency: USD conversion is identity",
    run: () => {
      for (const x of [0, 1, 123.45, 50000, 999999.99]) {
        assert.equal(convertFromUsd(x, "USD"), x);
      }
    },
  },
  {
    name: "currency: converting out and back through the inverse rate stays within a cent",
    run: () => {
      for (const code of CURRENCIES) {
        for (const x of [1, 1234.56, 75000]) {
          const back = convertFromUsd(x, code) / rateFor(code);
          assert.ok(Math.abs(back - x) <= 0.01, `${code} ${x} -> ${back}`);
        }
      }
    },
  },
  {
    name: "currency: unknown codes are priced as USD, known codes are case-insensitive",
    run: () => {
      assert.equal(rateFor("JPY"), 1);
      assert.equal(rateFor(""), 1);
      assert.equal(rateFor(undefined), 1);
      assert.equal(convertFromUsd(100, "JPY"), 100);
      assert.equal(rateFor("aed"), 3.6725);
      assert.equal(convertFromUsd(100, "aed"), 367.25);
      assert.equal(convertToUsd(970000, "EGP"), 20000);
    },
  },
  {
    name: "currency: vendor price annotated in all five currencies",
    run: () => {
      assert.deepEqual(priceInAllCurrencies(3000), {
        USD: 3000,
        LBP: 268500000,
        AED: 11017.5,
        SAR: 11250,
        EGP: 145500,
      });
    },
  },
  {
    name: "currency: rounding to two decimals",
    run: () => {
      assert.equal(roundMoney(10.006), 10.01);
      assert.equal(roundMoney(10.004), 10);
      assert.equal(roundMoney(2800.0000000000005), 2800);
    },
  },
  {
    name: "allocations: raw egypt profile sums to 95, lebanon and gcc to 100",
    run: () => {
      assert.equal(profileTotal(RAW_REGIONAL_ALLOCATIONS.lebanon), 100);
      assert.equal(profileTotal(RAW_REGIONAL_ALLOCATIONS.gcc), 100);
      assert.equal(profileTotal(RAW_REGIONAL_ALLOCATIONS.egypt), 95);
    },
  },
  {
    name: "allocations: profiles are served as entered, short egypt profile only warns",
    run: () => {
      const warnings: AllocationWarning[] = [];
      const table = buildAllocationTable(RAW_REGIONAL_ALLOCATIONS, (w) => warnings.push(w));
      for (const region of REGIONS) {
        assert.equal(table[region], RAW_REGIONAL_ALLOCATIONS[region], region);
      }
      assert.deepEqual(warnings, [{ region: "egypt", rawTotal: 95, unallocated: 5 }]);
      assert.equal(profileTotal(table.egypt), 95);
      assert.equal(table.egypt.misc, 3);
    },
  },
  {
    name: "allocations: over-allocated profile is rejected",
    run: () => {
      assert.throws(
        () => checkProfile("gcc", { ...RAW_REGIONAL_ALLOCATIONS.gcc, venue: 31 }),
        /sums to 101/
      );
    },
  },
  {
    name: "allocations: unknown region falls back to lebanon",
    run: () => {
      assert.equal(allocationsFor("atlantis", tables.allocations), tables.allocations.lebanon);
      assert.equal(allocationsFor(undefined, tables.allocations), tables.allocations.lebanon);
      assert.equal(allocationsFor("gcc", tables.allocations).entertainment, 10);
    },
  },
  {
    name: "checklist: 8 items up to 300 guests, 9 above",
    run: () => {
      assert.equal(checklistFor(1).length, 8);
      assert.equal(checklistFor(300).length, 8);
      assert.equal(checklistFor(301).length, 9);
      assert.equal(checklistFor(2000).length, 9);
    },
  },
  {
    name: "checklist: base order does not depend on guest count",
    run: () => {
      const small = checklistFor(10);
      const large = checklistFor(1500).slice(0, 8);
      assert.deepEqual(large, small);
      assert.deepEqual(
        small.map((x) => x.due_months_before),
        [12, 11, 9, 6, 5, 7, 3, 1]
      );
      assert.deepEqual(
        small.map((x) => x.category),
        ["planning", "venue", "entertainment", "florals", "entertainment", "media", "paperwork", "logistics"]
      );
    },
  },
  {
    name: "checklist: only the zaffe item is optional",
    run: () => {
      const items = checklistFor(100, "en");
      const optional = items.filter((x) => x.optional);
      assert.equal(optional.length, 1);
      assert.equal(optional[0].label, "Book the zaffe");
      assert.equal(items.indexOf(optional[0]), 4);
    },
  },
  {
    name: "checklist: valet item is appended last, out of chronological order",
    run: () => {
      const items = checklistFor(450, "en");
      const last = items[8];
      assert.deepEqual(last, {
        label: "Confirm valet parking arrangements",
        category: "logistics",
        due_months_before: 2,
        optional: false,
      });
      assert.ok(last.due_months_before > items[7].due_months_before);
    },
  },
  {
    name: "checklist: arabic labels by default",
    run: () => {
      assert.equal(checklistFor(50)[0].label, "حددوا الميزانية الكاملة");
    },
  },
  {
    name: "budget: USD lebanon 50000 splits into exact category amounts",
    run: () => {
      const items = buildBudget(50000, "USD", "lebanon", tables);
      assert.deepEqual(
        items.map((x) => x.category),
        [...BUDGET_CATEGORIES]
      );
      assert.deepEqual(
        items.map((x) => x.amount),
        [14000, 11000, 6000, 4000, 4000, 4000, 2500, 2500, 1000, 1000]
      );
      assert.equal(
        items.reduce((s, x) => s + x.allocation_percent, 0),
        100
      );
      assert.equal(
        items.reduce((s, x) => s + x.amount, 0),
        50000
      );
    },
  },
  {
    name: "budget: egypt lines follow the raw profile and leave 5% unallocated",
    run: () => {
      const items = buildBudget(10000, "USD", "egypt", tables);
      const misc = items.find((x) => x.category === "misc");
      assert.deepEqual(misc, { category: "misc", allocation_percent: 3, amount: 300 });
      assert.deepEqual(
        items.map((x) => x.amount),
        [2200, 2500, 1000, 600, 800, 800, 500, 500, 300, 300]
      );
      assert.equal(
        items.reduce((s, x) => s + x.amount, 0),
        9500
      );
    },
  },
  {
    name: "budget: non-USD budgets round-trip through USD within rounding",
    run: () => {
      const items = buildBudget(36725, "AED", "lebanon", tables);
      const venue = items.find((x) => x.category === "venue")?.amount ?? Number.NaN;
      assert.ok(Math.abs(venue - 10283) <= 0.01, String(venue));
      const total = items.reduce((s, x) => s + x.amount, 0);
      assert.ok(Math.abs(total - 36725) <= 0.1, String(total));
    },
  },
];

await runCases("core", cases);
