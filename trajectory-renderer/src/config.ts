import type { RGB } from "./types/simulation.js";
import { fullReupload, type BondUploadStrategy } from "./mesh/bondMesh.js";

export interface ViewerOptions {
  /** Triangles in the base disk fan. */
  diskSegments?: number;
  sphereSegments?: { horizontal?: number; vertical?: number };
  /** Base mesh radius; 0.5 makes the size field a diameter. */
  particleRadius?: number;
  /** Circular segments per bond cylinder. */
  bondSegments?: number;
  /** Used when a Bond geometry has no global diameter field. */
  bondDiameter?: number;
  defaultSize?: number;
  defaultColor?: RGB;
  defaultBackground?: RGB;
  /** Multiplicative step for wheel zoom. */
  zoomFactor?: number;
  /** Orbit radians per dragged pixel. */
  rotateSpeed?: number;
  lightDirection?: RGB;
  bondUpload?: BondUploadStrategy;
}

export interface ResolvedViewerOptions {
  diskSegments: number;
  sphereSegments: { horizontal: number; vertical: number };
  particleRadius: number;
  bondSegments: number;
  bondDiameter: number;
  defaultSize: number;
  defaultColor: RGB;
  defaultBackground: RGB;
  zoomFactor: number;
  rotateSpeed: number;
  lightDirection: RGB;
  bondUpload: BondUploadStrategy;
}

export function resolveViewerOptions(opts: ViewerOptions = {}): ResolvedViewerOptions {
  return {
    diskSegments: Math.max(3, Math.floor(opts.diskSegments ?? 24)),
    sphereSegments: {
      horizontal: Math.max(3, Math.floor(opts.sphereSegments?.horizontal ?? 16)),
      vertical: Math.max(2, Math.floor(opts.sphereSegments?.vertical ?? 12)),
    },
    particleRadius: opts.particleRadius ?? 0.5,
    bondSegments: Math.max(3, Math.floor(opts.bondSegments ?? 3)),
    bondDiameter: opts.bondDiameter ?? 0.1,
    defaultSize: opts.defaultSize ?? 1.0,
    defaultColor: opts.defaultColor ?? [0.6, 0.6, 0.6],
    defaultBackground: opts.defaultBackground ?? [1, 1, 1],
    zoomFactor: opts.zoomFactor ?? 1.1,
    rotateSpeed: opts.rotateSpeed ?? 0.01,
    lightDirection: opts.lightDirection ?? [0.3, 0.5, 1.0],
    bondUpload: opts.bondUpload ?? fullReupload,
  };
}
