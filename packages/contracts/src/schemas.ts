import { z } from "zod";
import { icePctLevels, isIcePct, recipeIceValues } from "./levels.js";

// Spreadsheet cells arrive as strings; blanks mean "not set".
const blankToUndefined = (value: unknown) =>
  value === null || value === undefined || (typeof value === "string" && value.trim() === "") ? undefined : value;

const optionalNumber = z.preprocess(blankToUndefined, z.coerce.number().finite().nonnegative().optional());
const optionalText = z.preprocess(blankToUndefined, z.coerce.string().trim().optional());
const requiredText = z.string().trim().min(1);

const flag = z.preprocess(
  blankToUndefined,
  z
    .union([
      z.boolean(),
      z.enum(["0", "1", "true", "false", "TRUE", "FALSE"]),
      z.literal(0),
      z.literal(1)
    ])
    .optional()
    .transform((value) => value === true || value === 1 || value === "1" || value === "true" || value === "TRUE")
);

const icePctSchema = z.coerce.number().refine(isIcePct, {
  message: `ice_pct must be one of ${icePctLevels.join(", ")}`
});

export const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Must be YYYY-MM-DD");

export const tokenMapRowSchema = z.object({
  raw_token: requiredText,
  token_type: z.enum(["ice", "sugar", "topping", "tea_base", "tea_override"]),
  canonical_value: requiredText,
  match: z.preprocess(blankToUndefined, z.enum(["exact", "substring"]).default("exact"))
});

export const itemRuleRowSchema = z.object({
  category_key: requiredText,
  item_key: requiredText,
  default_tea_base: optionalText,
  requires_tea_choice: flag,
  milk_ratio: z.preprocess(blankToUndefined, z.coerce.number().min(0).max(1).optional()),
  drinks_per_item: z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional())
});

export const blendRuleRowSchema = z.object({
  category_key: requiredText,
  item_key: requiredText,
  component_tea: requiredText,
  share: z.coerce.number().finite().min(0).max(1)
});

export const defaultComponentRowSchema = z.object({
  category_key: requiredText,
  item_key: requiredText,
  component_key: requiredText,
  qty: z.preprocess(blankToUndefined, z.coerce.number().positive().default(1))
});

export const namedBlendRowSchema = z.object({
  blend_name: requiredText,
  component_tea: requiredText,
  share: z.coerce.number().finite().min(0).max(1)
});

export const recipeOverrideRowSchema = z.object({
  category: z.preprocess((value) => blankToUndefined(value) ?? "", z.string().trim()),
  item_name: z.preprocess((value) => blankToUndefined(value) ?? "", z.string().trim()),
  tea_base_ml: optionalNumber,
  milk_ml: optionalNumber,
  ice: z.preprocess(
    (value) => (typeof value === "string" ? blankToUndefined(value.trim().toLowerCase()) : blankToUndefined(value)),
    z.enum(recipeIceValues).optional()
  ),
  match_tokens: optionalText,
  tea_base_ml_0: optionalNumber,
  tea_base_ml_25: optionalNumber,
  tea_base_ml_50: optionalNumber,
  tea_base_ml_75: optionalNumber,
  tea_base_ml_100: optionalNumber
});

export const iceBucketMeanRowSchema = z.object({
  ice_pct: icePctSchema,
  tea_base_ml: z.coerce.number().finite().positive()
});

export const manualSampleRowSchema = z.object({
  ice_pct: icePctSchema,
  tea_base_ml: z.coerce.number().finite().positive()
});

export const batchConstantsRowSchema = z.object({
  tea_component: requiredText,
  batch_key: optionalText,
  batch_yield_ml: z.coerce.number().finite().positive(),
  leaf_grams_per_batch: z.coerce.number().finite().positive(),
  bag_grams: z.coerce.number().finite().positive()
});

export const posExportRowSchema = z.object({
  // XLSX exports may store the date as a serial day number.
  Date: z.union([z.number().finite(), requiredText]),
  Time: optionalText,
  "Transaction ID": optionalText,
  Category: z.preprocess((value) => blankToUndefined(value) ?? "", z.coerce.string()),
  Item: z.preprocess((value) => blankToUndefined(value) ?? "", z.coerce.string()),
  Qty: z.coerce.number().finite(),
  "Modifiers Applied": z.preprocess((value) => blankToUndefined(value) ?? "", z.string()),
  "Event Type": z.preprocess((value) => blankToUndefined(value) ?? "", z.string())
});

export const iceFallbackSchema = z.enum(["nearest", "lower", "error"]);

export const usageRunOptionsSchema = z
  .object({
    startDate: isoDateSchema.optional(),
    endDate: isoDateSchema.optional(),
    iceFallback: iceFallbackSchema.default("nearest"),
    defaultIcePct: icePctSchema.default(100),
    zeroIceBaseMl: z.number().finite().positive().default(550)
  })
  .refine((value) => !value.startDate || !value.endDate || value.startDate <= value.endDate, {
    message: "startDate must not be after endDate",
    path: ["startDate"]
  });

export type TokenMapRow = z.infer<typeof tokenMapRowSchema>;
export type ItemRuleRow = z.infer<typeof itemRuleRowSchema>;
export type BlendRuleRow = z.infer<typeof blendRuleRowSchema>;
export type DefaultComponentRow = z.infer<typeof defaultComponentRowSchema>;
export type NamedBlendRow = z.infer<typeof namedBlendRowSchema>;
export type RecipeOverrideRow = z.infer<typeof recipeOverrideRowSchema>;
export type BatchConstantsRow = z.infer<typeof batchConstantsRowSchema>;
export type PosExportRow = z.infer<typeof posExportRowSchema>;
export type IceFallback = z.infer<typeof iceFallbackSchema>;
export type UsageRunOptionsInput = z.input<typeof usageRunOptionsSchema>;
export type UsageRunOptions = z.output<typeof usageRunOptionsSchema>;
