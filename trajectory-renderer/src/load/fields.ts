import type { Dimension, FieldBuffer, StorageClass } from "../types/simulation.js";

export const FIELD_POSITION = "position";
export const FIELD_ANGLE = "angle";
export const FIELD_SIZE = "size";
export const FIELD_COLOR = "color";
export const FIELD_DIAMETER = "diameter";
export const FIELD_NEIGHBORS = "neighbor_idx";

export function parseStorageClass(tag: unknown): StorageClass | undefined {
  switch (tag) {
    case "dynamic":
    case "static":
    case "global":
      return tag;
    default:
      return undefined;
  }
}

/**
 * Components per element, fixed by the field's semantic name.
 * Returns undefined for names the renderer does not know.
 */
export function componentsFor(field: string, dimension: Dimension, maxNeighbors = 0): number | undefined {
  switch (field) {
    case FIELD_POSITION:
      return dimension;
    case FIELD_ANGLE:
      return dimension - 1;
    case FIELD_SIZE:
    case FIELD_DIAMETER:
      return 1;
    case FIELD_COLOR:
      return 3;
    case FIELD_NEIGHBORS:
      return maxNeighbors > 0 ? maxNeighbors : undefined;
    default:
      return undefined;
  }
}

/** Float count a payload for this storage class must carry. */
export function expectedLength(storage: StorageClass, frames: number, count: number, components: number): number {
  switch (storage) {
    case "dynamic":
      return frames * count * components;
    case "static":
      return count * components;
    case "global":
      return components;
  }
}

/** Values for one frame. Static and Global fields return their whole data. */
export function frameSlice(field: FieldBuffer, frame: number): Float32Array {
  if (field.storage !== "dynamic") return field.data;
  const stride = field.count * field.components;
  return field.data.subarray(frame * stride, (frame + 1) * stride);
}
