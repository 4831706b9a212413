import { describe, it, expect } from "vitest";
import { makeDiskMesh } from "../src/mesh/disk.js";
import { makeSphereMesh } from "../src/mesh/sphere.js";
import { MeshLibrary } from "../src/mesh/library.js";
import { resolveViewerOptions } from "../src/config.js";
import { ViewerError } from "../src/utils/errors.js";

describe("makeDiskMesh", () => {
  it("emits three 2D vertices per fan triangle", () => {
    const disk = makeDiskMesh(6, 1);
    expect(disk.itemSize).toBe(2);
    expect(disk.vertexCount).toBe(18);
    expect(disk.positions.length).toBe(36);
    expect(disk.normals).toBeUndefined();
  });

  it("starts each triangle at the center and walks the rim", () => {
    const p = makeDiskMesh(6, 1).positions;
    expect([p[0], p[1]]).toEqual([0, 0]);
    expect([p[2], p[3]]).toEqual([1, 0]);
    expect(p[4]).toBeCloseTo(0.5, 6);
    expect(p[5]).toBeCloseTo(Math.sqrt(3) / 2, 6);
    // next triangle shares the previous rim point
    expect(p[8]).toBeCloseTo(p[4], 6);
    expect(p[9]).toBeCloseTo(p[5], 6);
  });

  it("emits exactly the requested number of triangles", () => {
    expect(makeDiskMesh(2, 1).vertexCount).toBe(6);
    expect(makeDiskMesh(2, 1).positions.length).toBe(12);
  });

  it("is deterministic", () => {
    expect(Array.from(makeDiskMesh(24, 0.5).positions)).toEqual(Array.from(makeDiskMesh(24, 0.5).positions));
  });
});

describe("makeSphereMesh", () => {
  const sphere = makeSphereMesh(8, 4, 2);

  it("emits two triangles per grid cell", () => {
    expect(sphere.itemSize).toBe(3);
    expect(sphere.vertexCount).toBe(8 * 4 * 6);
    expect(sphere.positions.length).toBe(192 * 3);
    expect(sphere.normals?.length).toBe(192 * 3);
  });

  it("puts every vertex on the radius with a unit normal", () => {
    const { positions } = sphere;
    const normals = sphere.normals ?? new Float32Array();
    for (let v = 0; v < sphere.vertexCount; v++) {
      const o = v * 3;
      expect(Math.hypot(positions[o], positions[o + 1], positions[o + 2])).toBeCloseTo(2, 5);
      expect(Math.hypot(normals[o], normals[o + 1], normals[o + 2])).toBeCloseTo(1, 5);
    }
  });

  it("starts at the north pole", () => {
    expect(sphere.positions[0]).toBeCloseTo(0, 6);
    expect(sphere.positions[1]).toBeCloseTo(2, 6);
    expect(sphere.positions[2]).toBeCloseTo(0, 6);
  });

  it("is deterministic", () => {
    const again = makeSphereMesh(8, 4, 2);
    expect(Array.from(again.positions)).toEqual(Array.from(sphere.positions));
    expect(Array.from(again.normals ?? [])).toEqual(Array.from(sphere.normals ?? []));
  });
});

describe("MeshLibrary", () => {
  it("builds each shape once", () => {
    const lib = new MeshLibrary(2, resolveViewerOptions());
    const disk = lib.get("Disk");
    expect(lib.get("Disk")).toBe(disk);
    expect(disk.getAttribute("position").itemSize).toBe(2);
    expect(disk.getAttribute("position").count).toBe(24 * 3);
  });

  it("builds spheres with normals in 3D", () => {
    const lib = new MeshLibrary(3, resolveViewerOptions({ sphereSegments: { horizontal: 8, vertical: 4 } }));
    const sphere = lib.get("Sphere");
    expect(sphere.getAttribute("position").count).toBe(192);
    expect(sphere.hasAttribute("normal")).toBe(true);
  });

  it("refuses spheres in a 2D simulation", () => {
    const lib = new MeshLibrary(2, resolveViewerOptions());
    expect(() => lib.get("Sphere")).toThrow(ViewerError);
    try {
      lib.get("Sphere");
    } catch (e) {
      expect(e instanceof ViewerError && e.kind).toBe("InvalidDimension");
    }
  });
});
