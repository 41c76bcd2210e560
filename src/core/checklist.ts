import { pickLocalized, type AppLocale, type Localized } from "../i18n/locale.js";
import type { ChecklistCategory, ChecklistItem } from "./schemas.js";

type ChecklistTemplate = {
  label: Localized;
  category: ChecklistCategory;
  due_months_before: number;
  optional?: boolean;
};

export const LARGE_WEDDING_GUESTS = 300;

// Display order, not chronological order.
const BASE_CHECKLIST: readonly ChecklistTemplate[] = Object.freeze([
  {
    label: { ar: "حددوا الميزانية الكاملة", en: "Set the full budget" },
    category: "planning",
    due_months_before: 12,
  },
  {
    label: { ar: "اختيار القاعة أو المكان", en: "Choose the hall or venue" },
    category: "venue",
    due_months_before: 11,
  },
  {
    label: { ar: "حجز الفرقة أو الدي جي", en: "Book the band or DJ" },
    category: "entertainment",
    due_months_before: 9,
  },
  {
    label: { ar: "تصميم الزينة والورود", en: "Design decor and florals" },
    category: "florals",
    due_months_before: 6,
  },
  {
    label: { ar: "حجز الزفة", en: "Book the zaffe" },
    category: "entertainment",
    due_months_before: 5,
    optional: true,
  },
  {
    label: { ar: "التصوير والفيديو", en: "Photography and video" },
    category: "media",
    due_months_before: 7,
  },
  {
    label: { ar: "الدعوات والبطاقات", en: "Invitations and cards" },
    category: "paperwork",
    due_months_before: 3,
  },
  {
    label: { ar: "بروفة نهائية وجدول اليوم الكبير", en: "Final rehearsal and big-day schedule" },
    category: "logistics",
    due_months_before: 1,
  },
]);

const VALET_ITEM: ChecklistTemplate = {
  label: { ar: "تأكيد ترتيبات خدمة صف السيارات", en: "Confirm valet parking arrangements" },
  category: "logistics",
  due_months_before: 2,
};

function render(t: ChecklistTemplate, locale: AppLocale): ChecklistItem {
  return {
    label: pickLocalized(t.label, locale),
    category: t.category,
    due_months_before: t.due_months_before,
    optional: !!t.optional,
  };
}

export function checklistFor(guestCount: number, locale: AppLocale = "ar"): ChecklistItem[] {
  const items = BASE_CHECKLIST.map((t) => render(t, locale));
  // appended after the base items even though it is due before the rehearsal
  if (guestCount > LARGE_WEDDING_GUESTS) items.push(render(VALET_ITEM, locale));
  return items;
}
