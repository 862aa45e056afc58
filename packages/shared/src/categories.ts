/**
 * Edit-category registry and sparse subtotal helpers.
 *
 * A sparse subtotal is null whenever all of its counts are zero. Every JSON
 * and tile writer goes through `sparse()` so zeros never reach a payload.
 */

import type {
  Category,
  ElementSubtotal,
  Sparse,
  Subtotal,
  TagCategory,
} from "@mapper-activity/types";

export interface CategoryDefinition {
  name: Category;
  fields: readonly string[];
  sparse: boolean;
}

export const CATEGORIES: readonly CategoryDefinition[] = [
  { name: "buildings", fields: ["new", "edited"], sparse: true },
  { name: "highways", fields: ["new", "edited"], sparse: true },
  { name: "amenities", fields: ["new", "edited"], sparse: true },
  { name: "nodes", fields: ["new", "edited", "deleted"], sparse: true },
  { name: "ways", fields: ["new", "edited", "deleted"], sparse: true },
  { name: "relations", fields: ["new", "edited", "deleted"], sparse: true },
  { name: "elements", fields: ["new", "edited", "deleted", "num_changes"], sparse: false },
  { name: "features", fields: ["new", "edited", "new_vertices", "edited_vertices"], sparse: false },
];

export const TAG_CATEGORIES: readonly TagCategory[] = ["buildings", "highways", "amenities"];

export const ZERO: Subtotal = { new: 0, edited: 0 };

/** Null when every count of the subtotal is zero */
export function sparse<T extends Subtotal | ElementSubtotal>(subtotal: Sparse<T> | undefined): Sparse<T> {
  if (!subtotal) return null;
  const counts: number[] = Object.values(subtotal);
  return counts.some((n) => n !== 0) ? subtotal : null;
}

/** Null-safe addition - an absent subtotal counts as zero */
export function add(a: Sparse<Subtotal> | undefined, b: Sparse<Subtotal> | undefined): Subtotal {
  return {
    new: (a?.new ?? 0) + (b?.new ?? 0),
    edited: (a?.edited ?? 0) + (b?.edited ?? 0),
  };
}

/** new + edited, zero when absent */
export function total(subtotal: Sparse<Subtotal> | undefined): number {
  return (subtotal?.new ?? 0) + (subtotal?.edited ?? 0);
}

/**
 * Features outside the named tag categories.
 * Negative only when a feature was counted twice upstream.
 */
export function otherFeatures(
  features: Sparse<Subtotal> | undefined,
  named: ReadonlyArray<Sparse<Subtotal> | undefined>,
): number {
  return named.reduce<number>((acc, s) => acc - total(s), total(features));
}
