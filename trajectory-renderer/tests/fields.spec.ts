import { describe, it, expect } from "vitest";
import { componentsFor, expectedLength, frameSlice, parseStorageClass } from "../src/load/fields.js";
import type { DynamicField, StaticField } from "../src/types/simulation.js";

describe("componentsFor", () => {
  it("gives position one component per dimension", () => {
    expect(componentsFor("position", 2)).toBe(2);
    expect(componentsFor("position", 3)).toBe(3);
  });

  it("gives angle dimension - 1 components", () => {
    expect(componentsFor("angle", 2)).toBe(1);
    expect(componentsFor("angle", 3)).toBe(2);
  });

  it("fixes size, diameter and color", () => {
    expect(componentsFor("size", 3)).toBe(1);
    expect(componentsFor("diameter", 3)).toBe(1);
    expect(componentsFor("color", 2)).toBe(3);
  });

  it("sizes the neighbor table by max neighbors", () => {
    expect(componentsFor("neighbor_idx", 3, 4)).toBe(4);
    expect(componentsFor("neighbor_idx", 3)).toBeUndefined();
  });

  it("does not know other names", () => {
    expect(componentsFor("velocity", 3)).toBeUndefined();
  });
});

describe("parseStorageClass", () => {
  it("accepts the three storage tags only", () => {
    expect(parseStorageClass("dynamic")).toBe("dynamic");
    expect(parseStorageClass("static")).toBe("static");
    expect(parseStorageClass("global")).toBe("global");
    expect(parseStorageClass("Dynamic")).toBeUndefined();
    expect(parseStorageClass(3)).toBeUndefined();
  });
});

describe("expectedLength", () => {
  it("scales with storage class", () => {
    expect(expectedLength("dynamic", 23, 5, 3)).toBe(345);
    expect(expectedLength("static", 23, 5, 3)).toBe(15);
    expect(expectedLength("global", 23, 5, 3)).toBe(3);
  });
});

describe("frameSlice", () => {
  it("returns one frame of a dynamic field", () => {
    const field: DynamicField = {
      storage: "dynamic",
      data: new Float32Array([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11]),
      frames: 3,
      count: 2,
      components: 2,
    };
    expect(Array.from(frameSlice(field, 1))).toEqual([4, 5, 6, 7]);
  });

  it("returns static data unchanged for any frame", () => {
    const field: StaticField = { storage: "static", data: new Float32Array([1, 2]), count: 2, components: 1 };
    expect(frameSlice(field, 5)).toBe(field.data);
  });
});
