import * as THREE from "three";
import type { ResolvedViewerOptions } from "../config.js";
import {
  FIELD_ANGLE,
  FIELD_COLOR,
  FIELD_DIAMETER,
  FIELD_NEIGHBORS,
  FIELD_POSITION,
  FIELD_SIZE,
  frameSlice,
} from "../load/fields.js";
import { buildBondMesh } from "../mesh/bondMesh.js";
import type { MeshLibrary } from "../mesh/library.js";
import type { BondGeometry, GeometryRecord, GeometryRegistry, ParticleGeometry } from "../registry/registry.js";
import type { DynamicField, FieldBuffer, GlobalField, SimulationMetadata, StaticField } from "../types/simulation.js";
import type { DiagnosticLog } from "../utils/diagnostics.js";
import { ViewerError } from "../utils/errors.js";
import { bondVertexShader, particleVertexShader, shadedFragmentShader } from "./shaders.js";

export interface DrawContext {
  metadata: SimulationMetadata;
  options: ResolvedViewerOptions;
  meshes: MeshLibrary;
  registry: GeometryRegistry;
  diagnostics: DiagnosticLog;
}

export interface Drawable {
  readonly name: string;
  readonly object: THREE.Mesh;
  /** Bring GPU state up to date for `frame` before the draw call. */
  update(frame: number): void;
  dispose(): void;
}

/** How one shader input is fed for a geometry. */
export type AttributeBinding =
  | { source: "default" }
  | { source: "uniform"; field: GlobalField }
  | { source: "attribute"; field: StaticField | DynamicField; attribute: THREE.InstancedBufferAttribute };

export function resolveBinding(record: GeometryRecord, field: string): AttributeBinding {
  const buffer: FieldBuffer | undefined = record.fields.get(field);
  if (!buffer) return { source: "default" };
  if (buffer.storage === "global") return { source: "uniform", field: buffer };
  const attribute = record.buffers.get(field);
  if (!attribute) return { source: "default" };
  return { source: "attribute", field: buffer, attribute };
}

function uniformValue(data: ArrayLike<number>, components: number): number | THREE.Vector3 {
  if (components === 1) return data[0];
  return new THREE.Vector3(data[0], data[1], components > 2 ? data[2] : 0);
}

const ATTRIBUTE_NAMES = {
  [FIELD_POSITION]: "particlePosition",
  [FIELD_SIZE]: "particleSize",
  [FIELD_COLOR]: "particleColor",
  [FIELD_ANGLE]: "particleAngle",
} as const;

type ParticleInput = keyof typeof ATTRIBUTE_NAMES;

export class ParticleDrawable implements Drawable {
  readonly name: string;
  readonly object: THREE.Mesh<THREE.InstancedBufferGeometry, THREE.ShaderMaterial>;
  private streaming: Array<{ field: DynamicField; attribute: THREE.InstancedBufferAttribute }> = [];

  constructor(record: ParticleGeometry, ctx: DrawContext) {
    this.name = record.name;
    const { options, metadata } = ctx;
    if (!record.fields.has(FIELD_POSITION)) {
      throw new ViewerError("MissingField", `Geometry ${record.name} has no ${FIELD_POSITION} field`);
    }
    const base = ctx.meshes.get(record.shape);

    const geometry = new THREE.InstancedBufferGeometry();
    geometry.setAttribute("position", base.getAttribute("position"));
    if (base.hasAttribute("normal")) geometry.setAttribute("normal", base.getAttribute("normal"));
    geometry.instanceCount = record.count;

    const defaults: Record<ParticleInput, number | THREE.Vector3> = {
      [FIELD_POSITION]: new THREE.Vector3(0, 0, 0),
      [FIELD_SIZE]: options.defaultSize,
      [FIELD_COLOR]: new THREE.Vector3(...options.defaultColor),
      [FIELD_ANGLE]: 0,
    };
    const inputs: ParticleInput[] = [FIELD_POSITION, FIELD_SIZE, FIELD_COLOR];
    // 3D orientations are not drawn: spheres are symmetric.
    if (metadata.dimension === 2) inputs.push(FIELD_ANGLE);

    const defines: Record<string, boolean> = {};
    const uniforms: Record<string, THREE.IUniform> = {
      lightDirection: { value: new THREE.Vector3(...options.lightDirection) },
      [ATTRIBUTE_NAMES[FIELD_ANGLE]]: { value: 0 },
    };

    for (const input of inputs) {
      const attrName = ATTRIBUTE_NAMES[input];
      const binding = resolveBinding(record, input);
      switch (binding.source) {
        case "default":
          uniforms[attrName] = { value: defaults[input] };
          break;
        case "uniform":
          uniforms[attrName] = { value: uniformValue(binding.field.data, binding.field.components) };
          break;
        case "attribute":
          geometry.setAttribute(attrName, binding.attribute);
          defines[`INSTANCED_${input.toUpperCase()}`] = true;
          if (binding.field.storage === "dynamic") {
            this.streaming.push({ field: binding.field, attribute: binding.attribute });
          }
          break;
      }
    }
    if (record.shape === "Sphere") defines.LIT = true;

    const material = new THREE.ShaderMaterial({
      vertexShader: particleVertexShader,
      fragmentShader: shadedFragmentShader,
      uniforms,
      defines,
      side: THREE.DoubleSide,
    });

    this.object = new THREE.Mesh(geometry, material);
    this.object.frustumCulled = false;
    this.object.name = record.name;
  }

  update(frame: number) {
    for (const { field, attribute } of this.streaming) {
      attribute.set(frameSlice(field, frame));
      attribute.needsUpdate = true;
    }
  }

  dispose() {
    // base mesh attributes belong to the MeshLibrary
    const geometry = this.object.geometry;
    geometry.deleteAttribute("position");
    geometry.deleteAttribute("normal");
    geometry.dispose();
    this.object.material.dispose();
  }
}

export class BondDrawable implements Drawable {
  readonly name: string;
  readonly object: THREE.Mesh<THREE.BufferGeometry, THREE.ShaderMaterial>;
  /** Vertices emitted by the last update. */
  vertexCount = 0;

  private record: BondGeometry;
  private positions: FieldBuffer;
  private neighbors: FieldBuffer;
  private diameter: number;
  private ctx: DrawContext;

  constructor(record: BondGeometry, ctx: DrawContext) {
    this.name = record.name;
    this.record = record;
    this.ctx = ctx;
    const { options, metadata } = ctx;

    const reference = ctx.registry.get(record.reference);
    const positions = reference?.fields.get(FIELD_POSITION);
    if (!reference || reference.shape === "Bond" || !positions) {
      throw new ViewerError("MissingField", `Bond geometry ${record.name} references ${record.reference}, which has no positions`);
    }
    const neighbors = record.fields.get(FIELD_NEIGHBORS);
    if (!neighbors || neighbors.storage === "global") {
      throw new ViewerError("MissingField", `Bond geometry ${record.name} has no per-particle ${FIELD_NEIGHBORS}`);
    }
    this.positions = positions;
    this.neighbors = neighbors;

    const diameter = record.fields.get(FIELD_DIAMETER);
    const color = record.fields.get(FIELD_COLOR);
    if (diameter && diameter.storage !== "global") {
      ctx.diagnostics.warn(`${record.name}.${FIELD_DIAMETER} must be global for bonds; using ${options.bondDiameter}`);
    }
    if (color && color.storage !== "global") {
      ctx.diagnostics.warn(`${record.name}.${FIELD_COLOR} must be global for bonds; using the default color`);
    }
    this.diameter = diameter?.storage === "global" ? diameter.data[0] : options.bondDiameter;
    const bondColor =
      color?.storage === "global"
        ? new THREE.Vector3(color.data[0], color.data[1], color.data[2])
        : new THREE.Vector3(...options.defaultColor);

    const geometry = new THREE.BufferGeometry();
    geometry.setAttribute("position", record.bondPositions);
    geometry.setAttribute("normal", record.bondNormals);
    geometry.setDrawRange(0, 0);

    const material = new THREE.ShaderMaterial({
      vertexShader: bondVertexShader,
      fragmentShader: shadedFragmentShader,
      uniforms: {
        bondColor: { value: bondColor },
        lightDirection: { value: new THREE.Vector3(...options.lightDirection) },
      },
      defines: metadata.dimension === 3 ? { LIT: true } : {},
      side: THREE.DoubleSide,
    });

    this.object = new THREE.Mesh(geometry, material);
    this.object.frustumCulled = false;
    this.object.name = record.name;
  }

  update(frame: number) {
    const { metadata, options } = this.ctx;
    const record = this.record;
    this.vertexCount = buildBondMesh(
      {
        positions: frameSlice(this.positions, frame),
        dimension: metadata.dimension,
        neighbors: frameSlice(this.neighbors, frame),
        count: record.count,
        maxNeighbors: record.maxNeighbors,
        box: metadata.box,
        diameter: this.diameter,
        segments: options.bondSegments,
      },
      record.bondMesh
    );
    options.bondUpload.upload(record.bondPositions, this.vertexCount);
    options.bondUpload.upload(record.bondNormals, this.vertexCount);
    this.object.geometry.setDrawRange(0, this.vertexCount);
  }

  dispose() {
    this.object.geometry.dispose();
    this.object.material.dispose();
  }
}

export function createDrawable(record: GeometryRecord, ctx: DrawContext): Drawable {
  switch (record.shape) {
    case "Disk":
    case "Sphere":
      return new ParticleDrawable(record, ctx);
    case "Bond":
      return new BondDrawable(record, ctx);
  }
}
