import { resolveViewerOptions, type ResolvedViewerOptions, type ViewerOptions } from "./config.js";
import type { CameraController } from "./camera/types.js";
import { RequestGate } from "./host/requestGate.js";
import { GeometryRegistry } from "./registry/registry.js";
import { FrameCursor } from "./render/cursor.js";
import type { SimulationMetadata } from "./types/simulation.js";
import { DiagnosticLog } from "./utils/diagnostics.js";
import type { ViewerError } from "./utils/errors.js";

/**
 * All mutable viewer state, shared by reference between the loader, the frame
 * loop and the pointer bindings. Metadata and the geometry table are written
 * once by the loader and only read afterwards.
 */
export class Session {
  readonly options: ResolvedViewerOptions;
  readonly registry: GeometryRegistry;
  readonly cursor = new FrameCursor();
  readonly diagnostics = new DiagnosticLog();
  readonly gate = new RequestGate();

  metadata: SimulationMetadata | undefined;
  camera: CameraController | undefined;
  loaded = false;
  fatal: ViewerError | undefined;

  constructor(opts: ViewerOptions = {}) {
    this.options = resolveViewerOptions(opts);
    this.registry = new GeometryRegistry(this.options.bondSegments);
  }

  get frameCount(): number {
    return this.metadata?.frameCount ?? 0;
  }

  togglePlay(): boolean {
    return this.cursor.togglePlay();
  }

  /** Jump to an exact frame. Ignored until loading has finished. */
  scrub(frame: number): boolean {
    if (!this.loaded) {
      this.diagnostics.info(`Ignoring scrub to frame ${frame}: still loading`);
      return false;
    }
    this.cursor.scrub(frame, this.frameCount);
    return true;
  }
}
