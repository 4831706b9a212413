import type { ResolvedViewerOptions } from "../config.js";
import type { Dimension } from "../types/simulation.js";
import { OrbitCamera } from "./orbit.js";
import { PlanarCamera } from "./planar.js";
import type { CameraController } from "./types.js";

export { OrbitCamera, MAX_PITCH, type OrbitView } from "./orbit.js";
export { PlanarCamera, type PlanarView } from "./planar.js";
export type { CameraController } from "./types.js";

export function createCameraController(
  dimension: Dimension,
  box: number[],
  opts: Pick<ResolvedViewerOptions, "zoomFactor" | "rotateSpeed">
): CameraController {
  return dimension === 3
    ? new OrbitCamera(box, opts.zoomFactor, opts.rotateSpeed)
    : new PlanarCamera(box, opts.zoomFactor);
}
