import * as THREE from "three";
import type { Dimension } from "../types/simulation.js";

export interface BondMeshInput {
  /** Current-frame positions of the reference geometry, count * dimension. */
  positions: Float32Array;
  dimension: Dimension;
  /** Neighbor table, count * maxNeighbors, indices stored as floats. */
  neighbors: Float32Array;
  count: number;
  maxNeighbors: number;
  box: number[];
  diameter: number;
  segments: number;
}

export interface BondMeshTarget {
  positions: Float32Array;
  normals: Float32Array;
}

/**
 * How a rebuilt bond buffer reaches the GPU. The draw range is set by the
 * caller either way; strategies only decide what gets marked dirty.
 */
export interface BondUploadStrategy {
  readonly name: string;
  upload(attribute: THREE.BufferAttribute, vertexCount: number): void;
}

export const fullReupload: BondUploadStrategy = {
  name: "full",
  upload(attribute) {
    attribute.needsUpdate = true;
  },
};

export const emittedRangeUpload: BondUploadStrategy = {
  name: "emitted-range",
  upload(attribute, vertexCount) {
    attribute.clearUpdateRanges();
    if (vertexCount === 0) return;
    attribute.addUpdateRange(0, vertexCount * attribute.itemSize);
    attribute.needsUpdate = true;
  },
};

/** Worst-case vertex count: every slot of every particle emits a cylinder. */
export function bondVertexCapacity(count: number, maxNeighbors: number, segments: number): number {
  return count * maxNeighbors * segments * 6;
}

const WORLD_UP = new THREE.Vector3(0, 1, 0);
const FALLBACK_UP = new THREE.Vector3(1, 0, 0);
const _a = new THREE.Vector3();
const _b = new THREE.Vector3();
const _axis = new THREE.Vector3();
const _left = new THREE.Vector3();
const _up = new THREE.Vector3();
const _off0 = new THREE.Vector3();
const _off1 = new THREE.Vector3();
const _normal = new THREE.Vector3();
const _v = new THREE.Vector3();

function readPoint(positions: Float32Array, dimension: Dimension, index: number, out: THREE.Vector3): THREE.Vector3 {
  const o = index * dimension;
  return out.set(positions[o], positions[o + 1], dimension === 3 ? positions[o + 2] : 0);
}

/**
 * True when the raw displacement exceeds half the box on any axis. Such bonds
 * are taken to cross the periodic boundary and are not drawn; no minimum-image
 * correction is attempted.
 */
export function crossesBoundary(a: THREE.Vector3, b: THREE.Vector3, box: number[], dimension: Dimension): boolean {
  for (let k = 0; k < dimension; k++) {
    const half = box[k] / 2;
    if (Math.abs(b.getComponent(k) - a.getComponent(k)) > half) return true;
  }
  return false;
}

function cylinderOffset(theta: number, radius: number, out: THREE.Vector3): THREE.Vector3 {
  return out
    .copy(_left)
    .multiplyScalar(Math.cos(theta) * radius)
    .addScaledVector(_up, Math.sin(theta) * radius);
}

/**
 * Rebuild the bond cylinders for one frame into `out`.
 *
 * A slot (i, j) holding neighbor n emits a bond only when n < i, which skips
 * unused slots (marked >= i) and draws each undirected pair once. Every bond is
 * `segments` quads of 6 vertices with one flat normal per quad.
 *
 * @returns number of vertices written
 */
export function buildBondMesh(input: BondMeshInput, out: BondMeshTarget): number {
  const { positions, dimension, neighbors, maxNeighbors, box, segments } = input;
  const radius = input.diameter / 2;
  const rows = Math.min(input.count, Math.floor(positions.length / dimension));
  const step = (2 * Math.PI) / segments;

  let w = 0;
  const emit = (p: THREE.Vector3, offset: THREE.Vector3) => {
    _v.addVectors(p, offset);
    out.positions[w] = _v.x;
    out.positions[w + 1] = _v.y;
    out.positions[w + 2] = _v.z;
    out.normals[w] = _normal.x;
    out.normals[w + 1] = _normal.y;
    out.normals[w + 2] = _normal.z;
    w += 3;
  };

  for (let i = 0; i < rows; i++) {
    for (let j = 0; j < maxNeighbors; j++) {
      const n = Math.round(neighbors[i * maxNeighbors + j]);
      if (!(n >= 0 && n < i)) continue;

      readPoint(positions, dimension, i, _a);
      readPoint(positions, dimension, n, _b);
      if (crossesBoundary(_a, _b, box, dimension)) continue;

      _axis.subVectors(_b, _a);
      const len = _axis.length();
      if (len <= 1e-6) continue;
      _axis.divideScalar(len);

      _left.crossVectors(_axis, WORLD_UP);
      if (_left.lengthSq() < 1e-12) _left.crossVectors(_axis, FALLBACK_UP);
      _left.normalize();
      _up.crossVectors(_left, _axis);

      for (let s = 0; s < segments; s++) {
        const t0 = s * step;
        const t1 = (s + 1) * step;
        cylinderOffset(t0, radius, _off0);
        cylinderOffset(t1, radius, _off1);
        cylinderOffset((t0 + t1) / 2, 1, _normal);

        emit(_a, _off0);
        emit(_b, _off0);
        emit(_a, _off1);
        emit(_a, _off1);
        emit(_b, _off0);
        emit(_b, _off1);
      }
    }
  }

  return w / 3;
}
