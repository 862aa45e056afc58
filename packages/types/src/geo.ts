/**
 * Geographic utility types.
 */

/**
 * Changeset bounding box as emitted by the catalog query.
 * `diameter` is the great-circle distance between the corners, in km.
 */
export interface ChangesetBbox {
  xmin: number;
  ymin: number;
  xmax: number;
  ymax: number;
  diameter?: number | null;
}
