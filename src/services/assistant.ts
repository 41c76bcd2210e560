import { normalizeLocale, pickLocalized, type AppLocale, type Localized } from "../i18n/locale.js";
import { convertToUsd } from "../core/currency.js";
import type { AssistRequest, Region } from "../core/schemas.js";
import type { PlannerTables } from "../core/tables.js";

export const LIMITED_BUDGET_USD = 30000;
export const MID_BUDGET_USD = 80000;
export const LARGE_GUEST_COUNT = 300;
export const INTIMATE_GUEST_COUNT = 100;

export const REGION_TIPS: Readonly<Record<Region, Localized>> = Object.freeze({
  lebanon: {
    en: "Lebanon: summer weekends in Beirut and Byblos book out early, so secure the venue about a year ahead.",
    ar: "لبنان: عطل الصيف في بيروت وجبيل تُحجز باكراً، احجزوا المكان قبل سنة تقريباً.",
  },
  gcc: {
    en: "GCC: plan separate men's and women's receptions where needed and favour indoor venues between June and September.",
    ar: "الخليج: خططوا لحفلات منفصلة للرجال والنساء عند الحاجة، وفضّلوا القاعات المغلقة بين يونيو وسبتمبر.",
  },
  egypt: {
    en: "Egypt: Nile-side and hotel venues fill fast in autumn and spring; confirm catering headcounts in writing.",
    ar: "مصر: قاعات النيل والفنادق تمتلئ بسرعة في الخريف والربيع، ثبّتوا عدد ضيوف الضيافة كتابياً.",
  },
});

export const BUDGET_TIPS = Object.freeze({
  limited: {
    en: "With a limited budget, prioritise venue and catering and consider a weekday or off-season date.",
    ar: "مع ميزانية محدودة، ركّزوا على المكان والضيافة وفكّروا بموعد خلال الأسبوع أو خارج الموسم.",
  },
  mid: {
    en: "A mid-range budget covers a full package; bundle decor and florals with one vendor to save.",
    ar: "الميزانية المتوسطة تغطي باقة كاملة؛ اجمعوا الزينة والورود عند مزوّد واحد للتوفير.",
  },
  premium: {
    en: "A premium budget leaves room for a planner, a live band and a zaffe troupe.",
    ar: "الميزانية المرتفعة تسمح بمنظم أعراس وفرقة حية وفرقة زفة.",
  },
} satisfies Record<string, Localized>);

export const STYLE_TIPS: Readonly<Record<string, Localized>> = Object.freeze({
  classic: {
    en: "Classic style: white florals, candlelight and a string quartet for the entrance.",
    ar: "الطابع الكلاسيكي: ورود بيضاء وإضاءة شموع وفرقة وترية للدخلة.",
  },
  modern: {
    en: "Modern style: clean lines, monochrome palettes and statement lighting.",
    ar: "الطابع العصري: خطوط بسيطة وألوان أحادية وإضاءة مميزة.",
  },
  boho: {
    en: "Boho style: outdoor settings, dried flowers and relaxed lounge seating.",
    ar: "طابع البوهو: أماكن خارجية وورود مجففة وجلسات مريحة.",
  },
  luxury: {
    en: "Luxury style: book a five-star ballroom early and budget extra for custom staging.",
    ar: "الطابع الفاخر: احجزوا قاعة فندق خمس نجوم باكراً وخصصوا ميزانية إضافية للمسرح.",
  },
});

export const GUEST_TIPS = Object.freeze({
  large: {
    en: "Over 300 guests: arrange valet parking and a seating chart well in advance.",
    ar: "أكثر من 300 ضيف: رتّبوا خدمة صف السيارات ومخطط الجلوس مسبقاً.",
  },
  intimate: {
    en: "An intimate guest list opens up restaurants, rooftops and private villas as venues.",
    ar: "قائمة الضيوف الصغيرة تفتح خيار المطاعم والأسطح والفلل الخاصة.",
  },
} satisfies Record<string, Localized>);

export const FALLBACK_PROMPT: Localized = Object.freeze({
  en: "Tell me your region, budget, style or guest count and I will suggest next steps.",
  ar: "أخبروني بالمنطقة أو الميزانية أو الطابع أو عدد الضيوف وسأقترح الخطوات التالية.",
});

function budgetTip(budget: number, currency: string | undefined, tables: PlannerTables): Localized {
  const usd = convertToUsd(budget, currency || "USD", tables.rates);
  if (usd < LIMITED_BUDGET_USD) return BUDGET_TIPS.limited;
  if (usd < MID_BUDGET_USD) return BUDGET_TIPS.mid;
  return BUDGET_TIPS.premium;
}

function guestTip(guestCount: number): Localized | null {
  if (guestCount > LARGE_GUEST_COUNT) return GUEST_TIPS.large;
  if (guestCount <= INTIMATE_GUEST_COUNT) return GUEST_TIPS.intimate;
  return null;
}

/**
 * Rule-based tips, in a fixed order: region, budget, style, guest count.
 * `message` is accepted but not read.
 */
export function advise(req: Partial<AssistRequest>, tables: PlannerTables): { reply: string } {
  const locale: AppLocale = normalizeLocale(req.locale);
  const tips: Localized[] = [];

  if (req.region) tips.push(REGION_TIPS[req.region]);
  if (typeof req.budget === "number") tips.push(budgetTip(req.budget, req.currency, tables));

  const style = String(req.style || "").trim().toLowerCase();
  if (style && Object.prototype.hasOwnProperty.call(STYLE_TIPS, style)) tips.push(STYLE_TIPS[style]);

  if (typeof req.guest_count === "number") {
    const tip = guestTip(req.guest_count);
    if (tip) tips.push(tip);
  }

  if (!tips.length) return { reply: pickLocalized(FALLBACK_PROMPT, locale) };
  return { reply: tips.map((t) => pickLocalized(t, locale)).join("\n") };
}
