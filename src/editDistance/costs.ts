import { z } from "zod";

import { InvalidConfigurationError } from "../errors.js";

/** Weights applied to each edit operation when filling the distance matrix. */
export interface EditCosts {
  readonly insertCost: number;
  readonly deleteCost: number;
  readonly replaceCost: number;
}

export const DEFAULT_EDIT_COSTS: EditCosts = Object.freeze({
  insertCost: 1,
  deleteCost: 1,
  replaceCost: 1,
});

const costValue = z
  .number({ invalid_type_error: "cost must be a number" })
  .finite("cost must be finite")
  .nonnegative("cost must not be negative");

const EditCostsSchema = z
  .object({
    insertCost: costValue.optional(),
    deleteCost: costValue.optional(),
    replaceCost: costValue.optional(),
  })
  .strict();

export type EditCostsInput = z.input<typeof EditCostsSchema>;

/**
 * Merges the provided overrides with {@link DEFAULT_EDIT_COSTS}. Zero costs are
 * accepted; negative or non-finite ones raise {@link InvalidConfigurationError}.
 */
export function resolveEditCosts(overrides: EditCostsInput = {}): EditCosts {
  const parsed = EditCostsSchema.safeParse(overrides);
  if (!parsed.success) {
    throw InvalidConfigurationError.fromZod("edit costs", parsed.error);
  }
  return Object.freeze({
    insertCost: parsed.data.insertCost ?? DEFAULT_EDIT_COSTS.insertCost,
    deleteCost: parsed.data.deleteCost ?? DEFAULT_EDIT_COSTS.deleteCost,
    replaceCost: parsed.data.replaceCost ?? DEFAULT_EDIT_COSTS.replaceCost,
  });
}
