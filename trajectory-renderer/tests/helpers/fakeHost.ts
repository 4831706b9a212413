import type {
  ArrayChunkResponse,
  ArrayResponse,
  GeometryMetadataResponse,
  SimulationHost,
  SimulationMetadataResponse,
} from "../../src/host/types.js";
import { encodeFloat32 } from "./wire.js";

export interface FakeGeometry {
  meta: GeometryMetadataResponse;
  /** Full flattened values per field; dynamic fields hold every frame. */
  arrays: Record<string, number[]>;
  /** Fields whose responses come back without a payload. */
  emptyPayload?: string[];
}

/** In-process host that yields to the event loop on every call and tracks concurrency. */
export class FakeHost implements SimulationHost {
  calls: string[] = [];
  chunkCalls: Array<{ name: string; field: string; offset: number; size: number }> = [];
  inFlight = 0;
  maxInFlight = 0;
  failing = new Set<string>();

  constructor(
    public metadata: SimulationMetadataResponse,
    public geometries: Record<string, FakeGeometry> = {}
  ) {}

  getSimulationMetadata(): Promise<SimulationMetadataResponse> {
    return this.respond("GetSimulationMetadata", () => this.metadata);
  }

  getGeometryMetadata(name: string): Promise<GeometryMetadataResponse> {
    return this.respond(`GetGeometryMetadata ${name}`, () => this.geometry(name).meta);
  }

  getArray(name: string, field: string): Promise<ArrayResponse> {
    return this.respond(`GetArray ${name}.${field}`, () => {
      const geom = this.geometry(name);
      if (geom.emptyPayload?.includes(field)) return {};
      return { array: encodeFloat32(geom.arrays[field] ?? []) };
    });
  }

  getArrayChunk(name: string, field: string, frameOffset: number, frameCount: number): Promise<ArrayChunkResponse> {
    this.chunkCalls.push({ name, field, offset: frameOffset, size: frameCount });
    return this.respond(`GetArrayChunk ${name}.${field}@${frameOffset}`, () => {
      const geom = this.geometry(name);
      if (geom.emptyPayload?.includes(field)) return {};
      const values = geom.arrays[field] ?? [];
      const stride = values.length / (this.metadata.frame_count ?? 1);
      return { array_chunk: encodeFloat32(values.slice(frameOffset * stride, (frameOffset + frameCount) * stride)) };
    });
  }

  private geometry(name: string): FakeGeometry {
    const geom = this.geometries[name];
    if (!geom) throw new Error(`no geometry ${name}`);
    return geom;
  }

  private async respond<T>(label: string, value: () => T): Promise<T> {
    this.calls.push(label);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await new Promise((resolve) => setTimeout(resolve, 0));
      if (this.failing.has(label)) throw new Error("connection reset");
      return value();
    } finally {
      this.inFlight--;
    }
  }
}
