import * as THREE from "three";
import type { CameraController } from "./types.js";

/** Pitch limit, kept short of the poles so lookAt never flips. */
export const MAX_PITCH = Math.PI / 2 / 1.05;

export interface OrbitView {
  yaw: number;
  pitch: number;
  distance: number;
}

function clampPitch(pitch: number): number {
  return Math.max(-MAX_PITCH, Math.min(MAX_PITCH, pitch));
}

/** 3D orbit around the box midpoint with a perspective camera. */
export class OrbitCamera implements CameraController {
  readonly dimension = 3 as const;
  readonly camera = new THREE.PerspectiveCamera(45, 1, 0.01, 1000);
  readonly target: THREE.Vector3;

  private yaw = 0;
  private pitch = 0;
  private distance: number;
  private zoomFactor: number;
  private rotateSpeed: number;
  private width = 1;
  private height = 1;
  private dragStart: [number, number] | null = null;
  private dragDelta: [number, number] = [0, 0];

  constructor(box: number[], zoomFactor: number, rotateSpeed: number) {
    this.target = new THREE.Vector3(box[0] / 2, box[1] / 2, box[2] / 2);
    this.distance = 2 * Math.max(box[0], box[1], box[2]);
    this.zoomFactor = zoomFactor;
    this.rotateSpeed = rotateSpeed;
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
    this.yaw = v.yaw;
    this.pitch = v.pitch;
    this.dragStart = null;
    this.dragDelta = [0, 0];
  }

  wheel(deltaY: number) {
    if (deltaY > 0) this.distance *= this.zoomFactor;
    else if (deltaY < 0) this.distance /= this.zoomFactor;
  }

  /** Committed view with any in-progress drag applied on top. */
  view(): OrbitView {
    return {
      yaw: this.yaw - this.dragDelta[0] * this.rotateSpeed,
      pitch: clampPitch(this.pitch + this.dragDelta[1] * this.rotateSpeed),
      distance: this.distance,
    };
  }

  update() {
    const { yaw, pitch, distance } = this.view();
    const cp = Math.cos(pitch);
    this.camera.position.set(
      this.target.x + distance * cp * Math.sin(yaw),
      this.target.y + distance * Math.sin(pitch),
      this.target.z + distance * cp * Math.cos(yaw)
    );
    this.camera.aspect = this.width / this.height;
    this.camera.near = distance * 0.01;
    this.camera.far = distance * 100;
    this.camera.lookAt(this.target);
    this.camera.updateProjectionMatrix();
    this.camera.updateMatrixWorld();
  }
}
