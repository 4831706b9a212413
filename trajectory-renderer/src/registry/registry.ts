import * as THREE from "three";
import type { FieldBuffer, GeometryDescriptor, ParticleShape } from "../types/simulation.js";
import { FIELD_NEIGHBORS } from "../load/fields.js";
import { bondVertexCapacity, type BondMeshTarget } from "../mesh/bondMesh.js";

interface GeometryBase {
  name: string;
  count: number;
  fields: Map<string, FieldBuffer>;
  /** Per-instance GPU buffers, one per non-global field. */
  buffers: Map<string, THREE.InstancedBufferAttribute>;
}

export interface ParticleGeometry extends GeometryBase {
  shape: ParticleShape;
}

export interface BondGeometry extends GeometryBase {
  shape: "Bond";
  reference: string;
  maxNeighbors: number;
  /** Sized for every slot emitting a bond; only a prefix is drawn each frame. */
  bondMesh: BondMeshTarget;
  bondPositions: THREE.BufferAttribute;
  bondNormals: THREE.BufferAttribute;
}

export type GeometryRecord = ParticleGeometry | BondGeometry;

/**
 * GPU buffer for one field. Static data is uploaded once; dynamic fields get a
 * one-frame streaming buffer refilled every tick; global fields become uniforms.
 */
export function allocateFieldBuffer(field: FieldBuffer): THREE.InstancedBufferAttribute | undefined {
  switch (field.storage) {
    case "global":
      return undefined;
    case "static":
      return new THREE.InstancedBufferAttribute(field.data, field.components).setUsage(THREE.StaticDrawUsage);
    case "dynamic":
      return new THREE.InstancedBufferAttribute(
        new Float32Array(field.count * field.components),
        field.components
      ).setUsage(THREE.StreamDrawUsage);
  }
}

export class GeometryRegistry {
  private table = new Map<string, GeometryRecord>();
  private bondSegments: number;

  constructor(bondSegments: number) {
    this.bondSegments = bondSegments;
  }

  register(descriptor: GeometryDescriptor, fields: Map<string, FieldBuffer>): GeometryRecord {
    const buffers = new Map<string, THREE.InstancedBufferAttribute>();
    for (const [name, field] of fields) {
      if (descriptor.shape === "Bond" && name === FIELD_NEIGHBORS) continue;
      const attr = allocateFieldBuffer(field);
      if (attr) buffers.set(name, attr);
    }

    let record: GeometryRecord;
    if (descriptor.shape === "Bond") {
      const capacity = bondVertexCapacity(descriptor.count, descriptor.maxNeighbors, this.bondSegments);
      const bondMesh: BondMeshTarget = {
        positions: new Float32Array(capacity * 3),
        normals: new Float32Array(capacity * 3),
      };
      record = {
        shape: "Bond",
        name: descriptor.name,
        count: descriptor.count,
        fields,
        buffers,
        reference: descriptor.referenceGeometry,
        maxNeighbors: descriptor.maxNeighbors,
        bondMesh,
        bondPositions: new THREE.BufferAttribute(bondMesh.positions, 3).setUsage(THREE.StreamDrawUsage),
        bondNormals: new THREE.BufferAttribute(bondMesh.normals, 3).setUsage(THREE.StreamDrawUsage),
      };
    } else {
      record = { shape: descriptor.shape, name: descriptor.name, count: descriptor.count, fields, buffers };
    }
    this.table.set(descriptor.name, record);
    return record;
  }

  get(name: string): GeometryRecord | undefined {
    return this.table.get(name);
  }

  /** Records in registration order. */
  all(): GeometryRecord[] {
    return Array.from(this.table.values());
  }

  get size(): number {
    return this.table.size;
  }
}
