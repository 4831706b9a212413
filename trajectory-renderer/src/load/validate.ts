import type { GeometryMetadataResponse, SimulationMetadataResponse } from "../host/types.js";
import type { Dimension, GeometryDescriptor, RGB, SimulationMetadata } from "../types/simulation.js";
import { ViewerError } from "../utils/errors.js";

function isFiniteNumber(v: unknown): v is number {
  return typeof v === "number" && Number.isFinite(v);
}

function isNumberArray(v: unknown): v is number[] {
  return Array.isArray(v) && v.every(isFiniteNumber);
}

function isPositiveInteger(v: unknown): v is number {
  return isFiniteNumber(v) && Number.isInteger(v) && v > 0;
}

function isShape(v: string): v is GeometryDescriptor["shape"] {
  return v === "Disk" || v === "Sphere" || v === "Bond";
}

/** Validate a GetSimulationMetadata response. Throws ViewerError. */
export function parseSimulationMetadata(res: SimulationMetadataResponse): SimulationMetadata {
  if (res.dimension === undefined) {
    throw new ViewerError("MissingField", "Simulation metadata is missing dimension");
  }
  if (res.dimension !== 2 && res.dimension !== 3) {
    throw new ViewerError("InvalidDimension", `Unsupported dimension ${String(res.dimension)}; expected 2 or 3`);
  }
  const dimension: Dimension = res.dimension === 3 ? 3 : 2;

  if (!isNumberArray(res.box_size)) {
    throw new ViewerError("MissingField", "Simulation metadata is missing box_size");
  }
  if (res.box_size.length !== dimension) {
    throw new ViewerError(
      "MissingField",
      `box_size has ${res.box_size.length} entries but the simulation is ${dimension}D`
    );
  }
  if (!isPositiveInteger(res.frame_count)) {
    throw new ViewerError("MissingField", "Simulation metadata is missing a positive frame_count");
  }

  const bg = res.background_color;
  const backgroundColor: RGB | undefined = isNumberArray(bg) && bg.length === 3 ? [bg[0], bg[1], bg[2]] : undefined;
  const size = res.resolution;
  const resolution: [number, number] | undefined =
    isNumberArray(size) && size.length === 2 && size.every((r) => r > 0) ? [size[0], size[1]] : undefined;
  const geometry = Array.isArray(res.geometry) ? res.geometry.filter((g): g is string => typeof g === "string") : [];

  return {
    dimension,
    box: res.box_size.slice(),
    frameCount: res.frame_count,
    simulationIndex: isFiniteNumber(res.simulation_idx) ? res.simulation_idx : undefined,
    chunkSize: isPositiveInteger(res.chunk_size) ? res.chunk_size : undefined,
    backgroundColor,
    resolution,
    geometry,
  };
}

export interface ParsedGeometry {
  descriptor: GeometryDescriptor;
  /** Raw storage tags per field, classified by the loader. */
  rawFields: Record<string, unknown>;
}

/**
 * Validate a GetGeometryMetadata response. The returned descriptor has no
 * fields yet; the loader fills them in once each tag is classified.
 */
export function parseGeometryMetadata(name: string, res: GeometryMetadataResponse): ParsedGeometry {
  if (typeof res.shape !== "string" || res.shape.length === 0) {
    throw new ViewerError("MissingField", `Geometry ${name} is missing shape`);
  }
  if (!isShape(res.shape)) {
    throw new ViewerError("UnknownShape", `Geometry ${name} has unknown shape ${res.shape}`);
  }
  if (!isFiniteNumber(res.count) || !Number.isInteger(res.count) || res.count < 0) {
    throw new ViewerError("MissingField", `Geometry ${name} is missing count`);
  }
  const rawFields: Record<string, unknown> =
    typeof res.fields === "object" && res.fields !== null ? { ...res.fields } : {};

  if (res.shape === "Bond") {
    if (typeof res.reference_geometry !== "string" || res.reference_geometry.length === 0) {
      throw new ViewerError("MissingField", `Bond geometry ${name} is missing reference_geometry`);
    }
    if (!isPositiveInteger(res.max_neighbors)) {
      throw new ViewerError("MissingField", `Bond geometry ${name} is missing max_neighbors`);
    }
    return {
      descriptor: {
        shape: "Bond",
        name,
        count: res.count,
        fields: {},
        referenceGeometry: res.reference_geometry,
        maxNeighbors: res.max_neighbors,
      },
      rawFields,
    };
  }

  return { descriptor: { shape: res.shape, name, count: res.count, fields: {} }, rawFields };
}
