import { createCameraController } from "../camera/index.js";
import type { SimulationHost } from "../host/types.js";
import type { Session } from "../session.js";
import type {
  DynamicField,
  FieldBuffer,
  GeometryDescriptor,
  SimulationMetadata,
  StorageClass,
} from "../types/simulation.js";
import { describeError, ViewerError } from "../utils/errors.js";
import { decodeFloat32 } from "../wire/decode.js";
import { componentsFor, expectedLength, parseStorageClass } from "./fields.js";
import { parseGeometryMetadata, parseSimulationMetadata } from "./validate.js";

/**
 * Pulls metadata and field arrays from the host one request at a time.
 * Every request goes through the session's RequestGate; failures are logged to
 * the session diagnostics and the affected field or geometry is skipped.
 */
export class ChunkedLoader {
  private session: Session;
  private host: SimulationHost;

  constructor(session: Session, host: SimulationHost) {
    this.session = session;
    this.host = host;
  }

  /** Metadata, then every listed geometry in order, then marks the session loaded. */
  async loadAll(): Promise<boolean> {
    const meta = await this.loadMetadata();
    if (!meta) return false;
    for (const name of meta.geometry) {
      await this.loadGeometry(name);
    }
    this.session.loaded = true;
    this.session.diagnostics.info(`Loaded ${this.session.registry.size} of ${meta.geometry.length} geometries`);
    return true;
  }

  async loadMetadata(): Promise<SimulationMetadata | undefined> {
    const log = this.session.diagnostics;
    log.info("Loading simulation metadata");
    const res = await this.request("GetSimulationMetadata", () => this.host.getSimulationMetadata());
    if (!res) return undefined;

    let meta: SimulationMetadata;
    try {
      meta = parseSimulationMetadata(res);
    } catch (e) {
      this.fail(e);
      return undefined;
    }

    this.session.metadata = meta;
    const camera = createCameraController(meta.dimension, meta.box, this.session.options);
    if (meta.resolution) camera.setViewport(meta.resolution[0], meta.resolution[1]);
    this.session.camera = camera;
    log.info(`Simulation is ${meta.dimension}D with ${meta.frameCount} frames`);
    return meta;
  }

  async loadGeometry(name: string): Promise<GeometryDescriptor | undefined> {
    const meta = this.session.metadata;
    if (!meta) return undefined;
    const log = this.session.diagnostics;
    log.info(`Loading geometry ${name}`);

    const res = await this.request(`GetGeometryMetadata ${name}`, () => this.host.getGeometryMetadata(name));
    if (!res) return undefined;

    let parsed: ReturnType<typeof parseGeometryMetadata>;
    try {
      parsed = parseGeometryMetadata(name, res);
    } catch (e) {
      this.fail(e);
      return undefined;
    }
    const { descriptor, rawFields } = parsed;
    const maxNeighbors = descriptor.shape === "Bond" ? descriptor.maxNeighbors : 0;

    const fields = new Map<string, FieldBuffer>();
    for (const [field, tag] of Object.entries(rawFields)) {
      const storage = parseStorageClass(tag);
      if (!storage) {
        this.fail(new ViewerError("UnknownStorageClass", `${name}.${field} has unknown storage class ${String(tag)}`));
        continue;
      }
      const components = componentsFor(field, meta.dimension, maxNeighbors);
      if (components === undefined) {
        log.warn(`Skipping ${name}.${field}: unrecognised field`);
        continue;
      }
      descriptor.fields[field] = storage;

      const buffer =
        storage === "dynamic"
          ? await this.loadDynamicArray(name, field, descriptor.count, components)
          : await this.loadArray(name, field, storage, descriptor.count, components);
      if (buffer) fields.set(field, buffer);
    }

    this.session.registry.register(descriptor, fields);
    return descriptor;
  }

  /**
   * Fill a frames x count x components array chunk by chunk. The last chunk is
   * shortened when frame_count is not a multiple of the chunk size. Without a
   * chunk size the whole range comes from a single GetArray.
   */
  async loadDynamicArray(name: string, field: string, count: number, components: number): Promise<DynamicField | undefined> {
    const meta = this.session.metadata;
    if (!meta) return undefined;
    const frames = meta.frameCount;
    const stride = count * components;
    const data = new Float32Array(frames * stride);
    const label = `${name}.${field}`;

    if (meta.chunkSize === undefined) {
      const res = await this.request(`GetArray ${label}`, () => this.host.getArray(name, field));
      if (!res) return undefined;
      const values = this.decodePayload(label, res.array, data.length);
      if (!values) return undefined;
      data.set(values);
      return { storage: "dynamic", data, frames, count, components };
    }

    const chunkSize = meta.chunkSize;
    for (let offset = 0; offset < frames; offset += chunkSize) {
      const size = Math.min(chunkSize, frames - offset);
      const res = await this.request(`GetArrayChunk ${label}@${offset}`, () =>
        this.host.getArrayChunk(name, field, offset, size)
      );
      if (!res) return undefined;
      const values = this.decodePayload(`${label} frames ${offset}..${offset + size - 1}`, res.array_chunk, size * stride);
      if (!values) return undefined;
      data.set(values, offset * stride);
      this.session.diagnostics.info(`Loaded ${label} frames ${offset + size} / ${frames}`);
    }
    return { storage: "dynamic", data, frames, count, components };
  }

  async loadArray(
    name: string,
    field: string,
    storage: Exclude<StorageClass, "dynamic">,
    count: number,
    components: number
  ): Promise<FieldBuffer | undefined> {
    const label = `${name}.${field}`;
    const res = await this.request(`GetArray ${label}`, () => this.host.getArray(name, field));
    if (!res) return undefined;
    const data = this.decodePayload(label, res.array, expectedLength(storage, 1, count, components));
    if (!data) return undefined;
    return storage === "static"
      ? { storage, data, count, components }
      : { storage, data, components };
  }

  private decodePayload(label: string, payload: unknown, expected: number): Float32Array | undefined {
    if (typeof payload !== "string") {
      this.fail(new ViewerError("MissingArrayPayload", `Host response for ${label} has no array data`));
      return undefined;
    }
    let values: Float32Array;
    try {
      values = decodeFloat32(payload);
    } catch (e) {
      this.fail(e);
      return undefined;
    }
    if (values.length !== expected) {
      this.fail(new ViewerError("MalformedPayload", `${label}: expected ${expected} values, got ${values.length}`));
      return undefined;
    }
    return values;
  }

  private async request<T>(label: string, task: () => Promise<T>): Promise<T | undefined> {
    try {
      return await this.session.gate.run(task);
    } catch (e) {
      this.fail(new ViewerError("RequestFailed", `${label} failed: ${describeError(e)}`));
      return undefined;
    }
  }

  private fail(e: unknown) {
    if (!(e instanceof ViewerError)) throw e;
    this.session.diagnostics.report(e);
  }
}
