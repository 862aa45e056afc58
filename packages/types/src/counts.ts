/**
 * Edit-category counts.
 *
 * Each changeset carries one subtotal per category. Sparse categories are
 * null whenever every count is zero so JSON and tile payloads stay small;
 * dense categories are always present.
 */

/** New / edited counts for a tag-based category (buildings, highways, amenities) */
export interface Subtotal {
  new: number;
  edited: number;
}

/** New / edited / deleted counts for an OSM element type */
export interface ElementSubtotal extends Subtotal {
  deleted: number;
}

/** All elements touched by a changeset */
export interface ElementTotals extends ElementSubtotal {
  num_changes: number;
}

/** Tagged features, plus untagged vertices */
export interface FeatureTotals extends Subtotal {
  new_vertices: number;
  edited_vertices: number;
}

/** A subtotal that is absent when all of its counts are zero */
export type Sparse<T> = T | null;

/** Categories counted by tag presence */
export type TagCategory = "buildings" | "highways" | "amenities";

/** Categories counted by element type */
export type ElementCategory = "nodes" | "ways" | "relations";

/** Every per-changeset category */
export type Category = TagCategory | ElementCategory | "elements" | "features";

/** Category subtotals of one changeset, as written by the catalog query */
export interface ChangesetCounts {
  buildings: Sparse<Subtotal>;
  highways: Sparse<Subtotal>;
  amenities: Sparse<Subtotal>;
  nodes: Sparse<ElementSubtotal>;
  ways: Sparse<ElementSubtotal>;
  relations: Sparse<ElementSubtotal>;
  elements: ElementTotals;
  features: FeatureTotals;
}
