export type Dimension = 2 | 3;
export type RGB = [number, number, number];

export interface SimulationMetadata {
  dimension: Dimension;
  box: number[]; // length = dimension
  frameCount: number; // > 0
  simulationIndex?: number;
  chunkSize?: number; // frames per GetArrayChunk; whole range in one GetArray when absent
  backgroundColor?: RGB;
  resolution?: [number, number];
  geometry: string[];
}

export type StorageClass = "dynamic" | "static" | "global";
export type ShapeKind = "Disk" | "Sphere" | "Bond";
export type ParticleShape = Exclude<ShapeKind, "Bond">;

export interface DynamicField {
  storage: "dynamic";
  data: Float32Array; // length = frames * count * components
  frames: number;
  count: number;
  components: number;
}

export interface StaticField {
  storage: "static";
  data: Float32Array; // length = count * components
  count: number;
  components: number;
}

export interface GlobalField {
  storage: "global";
  data: Float32Array; // length = components
  components: number;
}

export type FieldBuffer = DynamicField | StaticField | GlobalField;

interface DescriptorBase {
  name: string;
  count: number;
  fields: Record<string, StorageClass>;
}

export interface ParticleDescriptor extends DescriptorBase {
  shape: ParticleShape;
}

export interface BondDescriptor extends DescriptorBase {
  shape: "Bond";
  referenceGeometry: string;
  maxNeighbors: number;
}

export type GeometryDescriptor = ParticleDescriptor | BondDescriptor;
