/**
 * Tests for the input file model
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  createInputFile,
  memoryByteSource,
  readAll,
  type ByteSource,
} from "./input-file.js";
import { createDiagnostic } from "./types/diagnostic.js";
import { error } from "./types/result.js";

describe("Input File", () => {
  describe("createInputFile", () => {
    it("should use the base name as display name", () => {
      const file = createInputFile(
        "assets/img/logo.png",
        memoryByteSource(new Uint8Array())
      );
      expect(file.displayName).to.equal("logo.png");
      expect(file.identifier).to.equal("file_logo_png");
      expect(file.path).to.equal("assets/img/logo.png");
    });

    it("should accept an explicit display name", () => {
      const file = createInputFile(
        "/tmp/x",
        memoryByteSource(new Uint8Array()),
        "config.json"
      );
      expect(file.displayName).to.equal("config.json");
      expect(file.identifier).to.equal("file_config_json");
    });
  });

  describe("memoryByteSource", () => {
    it("should deliver the bytes and their count", () => {
      const chunks: number[][] = [];
      const result = memoryByteSource(new Uint8Array([1, 2, 3]))((chunk) => {
        chunks.push([...chunk]);
      });
      expect(result).to.deep.equal({ ok: true, value: 3 });
      expect(chunks).to.deep.equal([[1, 2, 3]]);
    });

    it("should not call back for empty content", () => {
      let calls = 0;
      const result = memoryByteSource(new Uint8Array())(() => {
        calls++;
      });
      expect(result).to.deep.equal({ ok: true, value: 0 });
      expect(calls).to.equal(0);
    });
  });

  describe("readAll", () => {
    it("should concatenate chunks even when the buffer is reused", () => {
      const shared = new Uint8Array(2);
      const source: ByteSource = (onChunk) => {
        shared.set([1, 2]);
        onChunk(shared);
        shared.set([3, 4]);
        onChunk(shared);
        shared.set([5]);
        onChunk(shared.subarray(0, 1));
        return { ok: true, value: 5 };
      };

      const result = readAll(source);
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect([...result.value]).to.deep.equal([1, 2, 3, 4, 5]);
      }
    });

    it("should propagate source failures", () => {
      const failure = createDiagnostic("EMB1002", "error", "boom", "a.bin");
      const result = readAll(() => error(failure));
      expect(result).to.deep.equal({ ok: false, error: failure });
    });
  });
});
