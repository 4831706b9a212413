import type * as THREE from "three";
import type { Dimension } from "../types/simulation.js";

/**
 * Pointer-driven view state. Drags are previewed live and only committed on
 * release; `update` writes the current (possibly previewed) view into `camera`.
 */
export interface CameraController {
  readonly dimension: Dimension;
  readonly camera: THREE.Camera;
  readonly dragging: boolean;
  setViewport(width: number, height: number): void;
  beginDrag(x: number, y: number): void;
  drag(x: number, y: number): void;
  endDrag(): void;
  wheel(deltaY: number): void;
  update(): void;
}
