import type {
  ArrayChunkResponse,
  ArrayResponse,
  GeometryMetadataResponse,
  SimulationHost,
  SimulationMetadataResponse,
} from "./types.js";

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * SimulationHost over plain HTTP: each call is a POST of its arguments as JSON
 * to `<baseUrl>/<MethodName>`.
 */
export class HttpSimulationHost implements SimulationHost {
  private baseUrl: string;
  private fetchImpl: FetchLike;

  constructor(baseUrl: string, fetchImpl: FetchLike = (input, init) => fetch(input, init)) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.fetchImpl = fetchImpl;
  }

  getSimulationMetadata(): Promise<SimulationMetadataResponse> {
    return this.call("GetSimulationMetadata", {});
  }

  getGeometryMetadata(name: string): Promise<GeometryMetadataResponse> {
    return this.call("GetGeometryMetadata", { name });
  }

  getArray(name: string, field: string): Promise<ArrayResponse> {
    return this.call("GetArray", { name, field });
  }

  getArrayChunk(name: string, field: string, frameOffset: number, frameCount: number): Promise<ArrayChunkResponse> {
    return this.call("GetArrayChunk", { name, field, frame_offset: frameOffset, frame_count: frameCount });
  }

  private async call<T>(method: string, args: Record<string, string | number>): Promise<T> {
    const res = await this.fetchImpl(`${this.baseUrl}/${method}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(args),
    });
    if (!res.ok) throw new Error(`Failed to fetch ${method}: ${res.status} ${res.statusText}`);
    const body: T = await res.json();
    return body;
  }
}
