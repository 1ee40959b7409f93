/**
 * Tests for input discovery
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { discoverInputFiles, discoverPaths } from "./discovery.js";
import { readAll } from "./input-file.js";

describe("Discovery", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "binembed-discovery-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe("discoverPaths", () => {
    it("should keep explicit files in the order given", () => {
      writeFileSync(join(dir, "b.txt"), "b");
      writeFileSync(join(dir, "a.txt"), "a");

      const result = discoverPaths([join(dir, "b.txt"), join(dir, "a.txt")]);
      expect(result).to.deep.equal({
        ok: true,
        value: [join(dir, "b.txt"), join(dir, "a.txt")],
      });
    });

    it("should walk directories recursively in name order", () => {
      mkdirSync(join(dir, "assets", "img"), { recursive: true });
      writeFileSync(join(dir, "assets", "z.txt"), "z");
      writeFileSync(join(dir, "assets", "img", "logo.png"), "png");
      writeFileSync(join(dir, "assets", "a.txt"), "a");

      const result = discoverPaths([join(dir, "assets")]);
      expect(result).to.deep.equal({
        ok: true,
        value: [
          join(dir, "assets", "a.txt"),
          join(dir, "assets", "img", "logo.png"),
          join(dir, "assets", "z.txt"),
        ],
      });
    });

    it("should follow symlinked files but not symlinked directories", () => {
      mkdirSync(join(dir, "real"));
      mkdirSync(join(dir, "tree"));
      writeFileSync(join(dir, "real", "inner.txt"), "inner");
      writeFileSync(join(dir, "target.txt"), "target");
      symlinkSync(join(dir, "real"), join(dir, "tree", "linked-dir"), "dir");
      symlinkSync(join(dir, "target.txt"), join(dir, "tree", "linked.txt"));

      const result = discoverPaths([join(dir, "tree")]);
      expect(result).to.deep.equal({
        ok: true,
        value: [join(dir, "tree", "linked.txt")],
      });
    });

    it("should return an empty list for an empty directory", () => {
      expect(discoverPaths([dir])).to.deep.equal({ ok: true, value: [] });
    });

    it("should fail on a missing input", () => {
      const missing = join(dir, "nope");
      const result = discoverPaths([missing]);

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("EMB1001");
        expect(result.error.message).to.equal(
          `Can't find file or directory '${missing}'`
        );
      }
    });

    it("should report an input that cannot be inspected", () => {
      const loop = join(dir, "loop");
      symlinkSync(loop, loop);

      const result = discoverPaths([loop]);

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("EMB1001");
        expect(result.error.path).to.equal(loop);
        expect(result.error.message).to.include(
          `Can't access '${loop}': ELOOP`
        );
      }
    });

    it("should report a looping symlink found while walking", () => {
      const loop = join(dir, "loop");
      symlinkSync(loop, loop);

      const result = discoverPaths([dir]);

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("EMB1001");
        expect(result.error.path).to.equal(loop);
      }
    });
  });

  describe("discoverInputFiles", () => {
    it("should derive display names and identifiers", () => {
      mkdirSync(join(dir, "data"));
      writeFileSync(join(dir, "data", "table.csv"), "a,b\n");

      const result = discoverInputFiles([join(dir, "data")]);
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value).to.have.length(1);
        const [file] = result.value;
        expect(file?.displayName).to.equal("table.csv");
        expect(file?.identifier).to.equal("file_table_csv");
        expect(file?.path).to.equal(join(dir, "data", "table.csv"));
      }
    });

    it("should read content lazily from disk", () => {
      const path = join(dir, "late.txt");
      writeFileSync(path, "before");

      const result = discoverInputFiles([path]);
      writeFileSync(path, "after");

      expect(result.ok).to.equal(true);
      if (result.ok && result.value[0]) {
        const bytes = readAll(result.value[0].source);
        expect(bytes.ok && Buffer.from(bytes.value).toString()).to.equal("after");
      }
    });
  });
});
