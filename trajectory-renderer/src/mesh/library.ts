import * as THREE from "three";
import type { ResolvedViewerOptions } from "../config.js";
import type { Dimension, ParticleShape } from "../types/simulation.js";
import { ViewerError } from "../utils/errors.js";
import { makeDiskMesh } from "./disk.js";
import { makeSphereMesh } from "./sphere.js";
import type { BaseMesh } from "./types.js";

function toBufferGeometry(mesh: BaseMesh): THREE.BufferGeometry {
  const geom = new THREE.BufferGeometry();
  geom.setAttribute("position", new THREE.BufferAttribute(mesh.positions, mesh.itemSize));
  if (mesh.normals) geom.setAttribute("normal", new THREE.BufferAttribute(mesh.normals, 3));
  return geom;
}

/** Builds each canonical shape once per session and hands out the shared geometry. */
export class MeshLibrary {
  private cache = new Map<ParticleShape, THREE.BufferGeometry>();
  private dimension: Dimension;
  private opts: ResolvedViewerOptions;

  constructor(dimension: Dimension, opts: ResolvedViewerOptions) {
    this.dimension = dimension;
    this.opts = opts;
  }

  get(shape: ParticleShape): THREE.BufferGeometry {
    let geom = this.cache.get(shape);
    if (!geom) {
      geom = toBufferGeometry(this.build(shape));
      this.cache.set(shape, geom);
    }
    return geom;
  }

  dispose() {
    for (const geom of this.cache.values()) geom.dispose();
    this.cache.clear();
  }

  private build(shape: ParticleShape): BaseMesh {
    const { particleRadius } = this.opts;
    switch (shape) {
      case "Disk":
        return makeDiskMesh(this.opts.diskSegments, particleRadius);
      case "Sphere":
        if (this.dimension !== 3) {
          throw new ViewerError("InvalidDimension", `Sphere geometry needs a 3D simulation, got ${this.dimension}D`);
        }
        return makeSphereMesh(this.opts.sphereSegments.horizontal, this.opts.sphereSegments.vertical, particleRadius);
    }
  }
}
