import type { BaseMesh } from "./types.js";

/**
 * Latitude/longitude sphere centered at the origin. Every grid cell becomes two
 * triangles (6 vertices, no index buffer). Normals are the normalized positions.
 */
export function makeSphereMesh(hSegments: number, vSegments: number, radius: number): BaseMesh {
  const h = Math.max(3, Math.floor(hSegments));
  const v = Math.max(2, Math.floor(vSegments));
  const vertexCount = h * v * 6;
  const positions = new Float32Array(vertexCount * 3);
  const normals = new Float32Array(vertexCount * 3);

  // unit direction at grid point (i: latitude ring, j: longitude)
  const dir = (i: number, j: number): [number, number, number] => {
    const theta = (i / v) * Math.PI;
    const phi = (j / h) * 2 * Math.PI;
    const st = Math.sin(theta);
    return [st * Math.cos(phi), Math.cos(theta), st * Math.sin(phi)];
  };

  let w = 0;
  const put = (d: [number, number, number]) => {
    const len = Math.hypot(d[0], d[1], d[2]) || 1;
    for (let k = 0; k < 3; k++) {
      positions[w + k] = d[k] * radius;
      normals[w + k] = d[k] / len;
    }
    w += 3;
  };

  for (let i = 0; i < v; i++) {
    for (let j = 0; j < h; j++) {
      const p00 = dir(i, j);
      const p10 = dir(i + 1, j);
      const p01 = dir(i, j + 1);
      const p11 = dir(i + 1, j + 1);
      put(p00); put(p10); put(p11);
      put(p00); put(p11); put(p01);
    }
  }

  return { positions, normals, itemSize: 3, vertexCount };
}
