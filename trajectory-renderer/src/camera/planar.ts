import * as THREE from "three";
import type { CameraController } from "./types.js";

export interface PlanarView {
  centerX: number;
  centerY: number;
  halfExtent: number;
}

/** 2D pan/zoom over an orthographic camera looking down -Z. */
export class PlanarCamera implements CameraController {
  readonly dimension = 2 as const;
  readonly camera = new THREE.OrthographicCamera(-1, 1, 1, -1, 0.1, 10);

  private centerX: number;
  private centerY: number;
  private halfExtent: number;
  private zoomFactor: number;
  private width = 1;
  private height = 1;
  private dragStart: [number, number] | null = null;
  private dragDelta: [number, number] = [0, 0];

  constructor(box: number[], zoomFactor: number) {
    this.centerX = box[0] / 2;
    this.centerY = box[1] / 2;
    this.halfExtent = Math.max(box[0], box[1]) / 2;
    this.zoomFactor = zoomFactor;
  }

  get dragging(): boolean {
    return this.dragStart !== null;
  }

  setViewport(width: number, height: number) {
    this.width = Math.max(1, width);
    this.height = Math.max(1, height);
  }

  beginDrag(x: number, y: number) {
    this.dragStart = [x, y];
    this.dragDelta = [0, 0];
  }

  drag(x: number, y: number) {
    if (!this.dragStart) return;
    this.dragDelta = [x - this.dragStart[0], y - this.dragStart[1]];
  }

  endDrag() {
    if (!this.dragStart) return;
    const v = this.view();
    this.centerX = v.centerX;
    this.centerY = v.centerY;
    this.dragStart = null;
    this.dragDelta = [0, 0];
  }

  wheel(deltaY: number) {
    if (deltaY > 0) this.halfExtent *= this.zoomFactor;
    else if (deltaY < 0) this.halfExtent /= this.zoomFactor;
  }

  /** Effective view, including an uncommitted drag. */
  view(): PlanarView {
    const worldPerPixel = (2 * this.halfExtent) / this.height;
    return {
      centerX: this.centerX - this.dragDelta[0] * worldPerPixel,
      centerY: this.centerY + this.dragDelta[1] * worldPerPixel,
      halfExtent: this.halfExtent,
    };
  }

  update() {
    const { centerX, centerY, halfExtent } = this.view();
    const aspect = this.width / this.height;
    this.camera.left = -halfExtent * aspect;
    this.camera.right = halfExtent * aspect;
    this.camera.top = halfExtent;
    this.camera.bottom = -halfExtent;
    this.camera.position.set(centerX, centerY, 1);
    this.camera.updateProjectionMatrix();
    this.camera.updateMatrixWorld();
  }
}
