import type { BaseMesh } from "./types.js";

/**
 * Triangle fan in the XY plane: `segments` triangles, each made of the origin
 * and two consecutive rim points. Two components per vertex.
 */
export function makeDiskMesh(segments: number, radius: number): BaseMesh {
  const n = Math.max(0, Math.floor(segments));
  const positions = new Float32Array(n * 3 * 2);
  const step = (2 * Math.PI) / n;
  let w = 0;
  for (let s = 0; s < n; s++) {
    const a0 = s * step;
    const a1 = (s + 1) * step;
    positions[w++] = 0;
    positions[w++] = 0;
    positions[w++] = radius * Math.cos(a0);
    positions[w++] = radius * Math.sin(a0);
    positions[w++] = radius * Math.cos(a1);
    positions[w++] = radius * Math.sin(a1);
  }
  return { positions, itemSize: 2, vertexCount: n * 3 };
}
