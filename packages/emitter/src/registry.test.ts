/**
 * Tests for registry assembly
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { createInputFile, memoryByteSource } from "@binembed/frontend";
import { assembleRegistry, lookupEntry } from "./registry.js";

const file = (path: string, content = "") =>
  createInputFile(path, memoryByteSource(new TextEncoder().encode(content)));

describe("Registry Assembler", () => {
  it("should keep discovery order", () => {
    const result = assembleRegistry([file("b/z.txt"), file("a/a.txt"), file("m.bin")]);

    expect(result.ok).to.equal(true);
    if (result.ok) {
      const { registry, diagnostics } = result.value;
      expect(registry.entries.map((e) => e.displayName)).to.deep.equal([
        "z.txt",
        "a.txt",
        "m.bin",
      ]);
      expect(registry.entries.map((e) => e.index)).to.deep.equal([0, 1, 2]);
      expect(registry.count).to.equal(3);
      expect(registry.byName.size).to.equal(3);
      expect(diagnostics).to.deep.equal([]);
    }
  });

  it("should assemble an empty registry", () => {
    const result = assembleRegistry([]);
    expect(result.ok).to.equal(true);
    if (result.ok) {
      expect(result.value.registry.count).to.equal(0);
      expect(result.value.registry.entries).to.deep.equal([]);
    }
  });

  it("should disambiguate colliding identifiers with the discovery index", () => {
    const result = assembleRegistry([file("a.bin"), file("x/y.txt"), file("a_bin")]);

    expect(result.ok).to.equal(true);
    if (result.ok) {
      const { registry, diagnostics } = result.value;
      expect(registry.entries.map((e) => e.identifier)).to.deep.equal([
        "file_a_bin",
        "file_y_txt",
        "file_a_bin_2",
      ]);
      expect(diagnostics).to.have.length(1);
      expect(diagnostics[0]?.code).to.equal("EMB2002");
      expect(diagnostics[0]?.message).to.equal(
        "Identifier 'file_a_bin' is already used; 'a_bin' is emitted as 'file_a_bin_2'"
      );
    }
  });

  it("should keep adding underscores until the identifier is free", () => {
    const result = assembleRegistry([
      file("a.bin"),
      file("a_bin_2"),
      file("a_bin"),
    ]);

    expect(result.ok).to.equal(true);
    if (result.ok) {
      expect(result.value.registry.entries.map((e) => e.identifier)).to.deep.equal([
        "file_a_bin",
        "file_a_bin_2",
        "file_a_bin_2_",
      ]);
    }
  });

  it("should let the later duplicate name win under overwrite", () => {
    const first = file("one/x.bin", "first");
    const second = file("two/x.bin", "second");
    const result = assembleRegistry([first, second]);

    expect(result.ok).to.equal(true);
    if (result.ok) {
      const { registry, diagnostics } = result.value;
      expect(registry.count).to.equal(2);
      expect(registry.byName.size).to.equal(1);
      expect(registry.byName.get("x.bin")?.file).to.equal(second);
      expect(registry.entries.map((e) => e.identifier)).to.deep.equal([
        "file_x_bin",
        "file_x_bin_1",
      ]);
      expect(diagnostics.map((d) => d.code)).to.deep.equal(["EMB2002", "EMB2001"]);
      expect(diagnostics[1]?.severity).to.equal("warning");
      expect(diagnostics[1]?.message).to.equal(
        "Duplicate file name 'x.bin': replaces one/x.bin in allEmbeddedFiles()"
      );
    }
  });

  it("should reject duplicate names under the error policy", () => {
    const result = assembleRegistry([file("one/x.bin"), file("two/x.bin")], {
      duplicateNames: "error",
    });

    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error).to.have.length(1);
      expect(result.error[0]?.code).to.equal("EMB2001");
      expect(result.error[0]?.severity).to.equal("error");
      expect(result.error[0]?.path).to.equal("two/x.bin");
      expect(result.error[0]?.message).to.equal(
        "Duplicate file name 'x.bin' (also one/x.bin)"
      );
    }
  });

  describe("lookupEntry", () => {
    it("should find entries by display name", () => {
      const result = assembleRegistry([file("dir/data.bin")]);
      expect(result.ok).to.equal(true);
      if (result.ok) {
        const entry = lookupEntry(result.value.registry, "data.bin");
        expect(entry.ok && entry.value.identifier).to.equal("file_data_bin");
      }
    });

    it("should signal a lookup miss", () => {
      const result = assembleRegistry([file("dir/data.bin")]);
      expect(result.ok).to.equal(true);
      if (result.ok) {
        const entry = lookupEntry(result.value.registry, "dir/data.bin");
        expect(entry.ok).to.equal(false);
        if (!entry.ok) {
          expect(entry.error.code).to.equal("EMB4001");
          expect(entry.error.message).to.equal("Embedded file not found: dir/data.bin");
        }
      }
    });
  });
});
