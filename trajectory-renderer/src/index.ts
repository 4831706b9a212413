export * from "./types/simulation.js";
export { resolveViewerOptions, type ViewerOptions, type ResolvedViewerOptions } from "./config.js";
export { Session } from "./session.js";
export { decodeFloat32 } from "./wire/decode.js";
export type * from "./host/types.js";
export { HttpSimulationHost } from "./host/http.js";
export { RequestGate } from "./host/requestGate.js";
export { ChunkedLoader } from "./load/loader.js";
export { componentsFor, parseStorageClass, frameSlice } from "./load/fields.js";
export { GeometryRegistry, type GeometryRecord, type ParticleGeometry, type BondGeometry } from "./registry/registry.js";
export { makeDiskMesh } from "./mesh/disk.js";
export { makeSphereMesh } from "./mesh/sphere.js";
export type { BaseMesh } from "./mesh/types.js";
export { MeshLibrary } from "./mesh/library.js";
export {
  buildBondMesh,
  bondVertexCapacity,
  fullReupload,
  emittedRangeUpload,
  type BondMeshInput,
  type BondUploadStrategy,
} from "./mesh/bondMesh.js";
export { FrameCursor } from "./render/cursor.js";
export { FrameLoop, type RenderSurface, type Scheduler } from "./render/frameLoop.js";
export * from "./camera/index.js";
export { DiagnosticLog, consoleSink, type Diagnostic, type DiagnosticLevel } from "./utils/diagnostics.js";
export { ViewerError, type ViewerErrorKind } from "./utils/errors.js";
export { bindPointerInput } from "./viewer/pointer.js";
export { mountViewer, type MountOptions, type ViewerHandle } from "./viewer/mount.js";
