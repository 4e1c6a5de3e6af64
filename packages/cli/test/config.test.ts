import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { DEFAULT_LAYOUT, describeLayout, parseLayoutConfig, readLayoutFromYaml } from "../src/index.js";

describe("parseLayoutConfig", () => {
  it("falls back to the defaults", () => {
    expect(parseLayoutConfig(undefined)).toEqual(DEFAULT_LAYOUT);
    expect(parseLayoutConfig({})).toEqual({ chunk: { x: 16, y: 16, z: 16 }, format: "u8", debugChecks: true });
  });

  it("merges partial settings over the defaults", () => {
    expect(parseLayoutConfig({ chunk: { sizeX: 32 }, format: "u16" })).toEqual({
      chunk: { x: 32, y: 16, z: 16 },
      format: "u16",
      debugChecks: true
    });
  });

  it("names the offending key", () => {
    expect(() => parseLayoutConfig({ chunk: { sizeX: 0 } })).toThrow(
      "Invalid layout config: chunk.sizeX must be an integer in [1, 255]"
    );
    expect(() => parseLayoutConfig({ chunk: { sizeZ: "16" } })).toThrow(
      "Invalid layout config: chunk.sizeZ must be an integer in [1, 255]"
    );
    expect(() => parseLayoutConfig({ chunk: [16] })).toThrow("Invalid layout config: chunk must be a mapping");
    expect(() => parseLayoutConfig({ format: "u64" })).toThrow(
      "Invalid layout config: format must be one of u8, u16, u32"
    );
    expect(() => parseLayoutConfig({ debugChecks: "yes" })).toThrow(
      "Invalid layout config: debugChecks must be a boolean"
    );
  });
});

describe("readLayoutFromYaml", () => {
  it("loads a layout file", () => {
    const base = mkdtempSync(join(tmpdir(), "voxgrid-config-"));
    const path = join(base, "voxgrid.yaml");
    writeFileSync(path, "chunk:\n  sizeX: 8\n  sizeY: 4\n  sizeZ: 2\nformat: u32\ndebugChecks: false\n");

    const layout = readLayoutFromYaml(path);
    expect(layout).toEqual({ chunk: { x: 8, y: 4, z: 2 }, format: "u32", debugChecks: false });
    expect(describeLayout(layout)).toEqual({
      sizeX: 8,
      sizeY: 4,
      sizeZ: 2,
      layerSize: 32,
      size: 64,
      format: "u32",
      bytesPerVoxel: 4,
      totalBytes: 256,
      maxVoxel: 4294967295,
      debugChecks: false
    });
  });

  it("treats an empty file as the defaults", () => {
    const base = mkdtempSync(join(tmpdir(), "voxgrid-config-"));
    const path = join(base, "empty.yaml");
    writeFileSync(path, "");
    expect(readLayoutFromYaml(path)).toEqual(DEFAULT_LAYOUT);
  });
});
