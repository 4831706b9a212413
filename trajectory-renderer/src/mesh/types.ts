/** Static vertex data for one canonical shape, shared by every instance. */
export interface BaseMesh {
  positions: Float32Array;
  normals?: Float32Array;
  itemSize: 2 | 3;
  vertexCount: number;
}
