// test/core/reader/names.spec.ts
// NameTable interning and result-code minting

import { describe, it, expect } from "vitest";
import { NameTable } from "../../../src/core/reader/names";

describe("NameTable", () => {
  it("interns strings to insertion-ordered ids", () => {
    const names = new NameTable();
    expect(names.intern("DEVICES")).toBe(0);
    expect(names.intern("sw1")).toBe(1);
    expect(names.intern("DEVICES")).toBe(0);
    expect(names.size).toBe(2);
  });

  it("interns many at once", () => {
    const names = new NameTable();
    names.intern("a");
    expect(names.internMany(["b", "a", "c"])).toEqual([1, 0, 2]);
  });

  it("queries without inserting", () => {
    const names = new NameTable();
    names.intern("g1");
    expect(names.query("g1")).toBe(0);
    expect(names.query("g2")).toBeNull();
    expect(names.size).toBe(1);
  });

  it("resolves ids and rejects ids outside the table", () => {
    const names = new NameTable();
    names.internMany(["x", "y"]);
    expect(names.resolve(1)).toBe("y");
    expect(names.resolve(2)).toBeNull();
    expect(names.resolve(-1)).toBeNull();
    expect(names.resolve(0.5)).toBeNull();
  });

  describe("allocate", () => {
    it("mints consecutive codes that are never reused", () => {
      const names = new NameTable();
      expect(names.allocate(3)).toEqual([0, 1, 2]);
      expect(names.allocate(2)).toEqual([3, 4]);
      expect(names.allocate(0)).toEqual([]);
      expect(names.allocate(1)).toEqual([5]);
    });

    it("counts codes separately from name ids", () => {
      const names = new NameTable();
      names.internMany(["a", "b"]);
      expect(names.allocate(1)).toEqual([0]);
      expect(names.intern("c")).toBe(2);
    });

    it("rejects negative and fractional counts", () => {
      const names = new NameTable();
      expect(() => names.allocate(-1)).toThrow(TypeError);
      expect(() => names.allocate(1.5)).toThrow("allocate expects a non-negative integer, got 1.5");
    });

    it("keeps tables independent", () => {
      const a = new NameTable();
      const b = new NameTable();
      a.allocate(4);
      expect(b.allocate(1)).toEqual([0]);
    });
  });
});
