/**
 * Wire shapes returned by the simulation host. Every property is optional here
 * because the loader validates responses rather than trusting them.
 */
export interface SimulationMetadataResponse {
  box_size?: number[];
  dimension?: number;
  frame_count?: number;
  simulation_idx?: number;
  chunk_size?: number;
  background_color?: number[];
  resolution?: number[];
  geometry?: string[];
}

export interface GeometryMetadataResponse {
  shape?: string;
  count?: number;
  fields?: Record<string, string>;
  reference_geometry?: string;
  max_neighbors?: number;
}

export interface ArrayResponse {
  array?: string; // base64 float32 blob
}

export interface ArrayChunkResponse {
  array_chunk?: string; // base64 float32 blob covering the requested frames
}

export interface SimulationHost {
  getSimulationMetadata(): Promise<SimulationMetadataResponse>;
  getGeometryMetadata(name: string): Promise<GeometryMetadataResponse>;
  getArray(name: string, field: string): Promise<ArrayResponse>;
  getArrayChunk(name: string, field: string, frameOffset: number, frameCount: number): Promise<ArrayChunkResponse>;
}
