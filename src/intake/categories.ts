// src/intake/categories.ts

export type ProvideCategory =
  | "providing_driver"
  | "providing_collecting_aid"
  | "providing_useful_contact";

export type NeedCategory = "need_evacuation" | "need_humanitarian_aid";

export type RequestCategory = ProvideCategory | NeedCategory;

// Menu order is the keyboard order.
export const PROVIDE_CATEGORIES: readonly ProvideCategory[] = [
  "providing_driver",
  "providing_collecting_aid",
  "providing_useful_contact",
];

export const NEED_CATEGORIES: readonly NeedCategory[] = [
  "need_evacuation",
  "need_humanitarian_aid",
];

export const ALL_CATEGORIES: readonly RequestCategory[] = [...PROVIDE_CATEGORIES, ...NEED_CATEGORIES];

export function isRequestCategory(value: unknown): value is RequestCategory {
  return typeof value === "string" && (ALL_CATEGORIES as readonly string[]).includes(value);
}
