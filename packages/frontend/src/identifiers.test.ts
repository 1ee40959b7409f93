/**
 * Tests for identifier derivation
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  deriveIdentifier,
  isValidIdentifier,
  isCppKeyword,
  validateNamespace,
  makeGuardToken,
} from "./identifiers.js";

describe("Identifiers", () => {
  describe("deriveIdentifier", () => {
    it("should prefix and replace punctuation", () => {
      expect(deriveIdentifier("data.bin")).to.equal("file_data_bin");
    });

    it("should keep letters and digits without case folding", () => {
      expect(deriveIdentifier("Logo2X.PNG")).to.equal("file_Logo2X_PNG");
    });

    it("should replace each ASCII punctuation character with one underscore", () => {
      expect(deriveIdentifier("a b-c..d")).to.equal("file_a_b_c__d");
      expect(deriveIdentifier("a b-c..d")).to.have.length(
        "file_".length + "a b-c..d".length
      );
    });

    it("should yield just the prefix for an empty name", () => {
      expect(deriveIdentifier("")).to.equal("file_");
    });

    it("should replace each UTF-8 byte of a non-ASCII character", () => {
      expect(deriveIdentifier("café.txt")).to.equal("file_caf___txt");
      expect(deriveIdentifier("é.bin")).to.equal("file____bin");
    });

    it("should map distinct names to the same identifier", () => {
      expect(deriveIdentifier("a.bin")).to.equal(deriveIdentifier("a_bin"));
    });

    it("should always produce a valid identifier", () => {
      const names = ["", "9lives", "-", "x y z", "über", "\u0000\n", "ok"];
      for (const name of names) {
        const id = deriveIdentifier(name);
        expect(isValidIdentifier(id), name).to.equal(true);
        expect(id.startsWith("file_")).to.equal(true);
        expect(deriveIdentifier(name)).to.equal(id);
      }
    });
  });

  describe("isValidIdentifier", () => {
    it("should reject leading digits and punctuation", () => {
      expect(isValidIdentifier("1abc")).to.equal(false);
      expect(isValidIdentifier("a-b")).to.equal(false);
      expect(isValidIdentifier("")).to.equal(false);
      expect(isValidIdentifier("_ok1")).to.equal(true);
    });
  });

  describe("isCppKeyword", () => {
    it("should recognise keywords and alternative tokens", () => {
      expect(isCppKeyword("namespace")).to.equal(true);
      expect(isCppKeyword("and")).to.equal(true);
      expect(isCppKeyword("assets")).to.equal(false);
    });
  });

  describe("validateNamespace", () => {
    it("should accept a simple namespace", () => {
      const result = validateNamespace("assets");
      expect(result).to.deep.equal({ ok: true, value: ["assets"] });
    });

    it("should split nested namespaces", () => {
      const result = validateNamespace("game::assets");
      expect(result).to.deep.equal({ ok: true, value: ["game", "assets"] });
    });

    it("should reject invalid segments", () => {
      const result = validateNamespace("my-assets");
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("EMB2003");
        expect(result.error.message).to.equal(
          "Invalid namespace 'my-assets': 'my-assets' is not a valid C++ identifier"
        );
      }
    });

    it("should reject empty segments", () => {
      expect(validateNamespace("a::").ok).to.equal(false);
      expect(validateNamespace("").ok).to.equal(false);
    });

    it("should reject keywords", () => {
      const result = validateNamespace("std::class");
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.message).to.equal(
          "Invalid namespace 'std::class': 'class' is a C++ keyword"
        );
      }
    });
  });

  describe("makeGuardToken", () => {
    it("should embed the namespace", () => {
      expect(makeGuardToken("assets")).to.equal("GENERATED_BINEMBED_assets_H");
    });

    it("should sanitize nested namespaces", () => {
      expect(makeGuardToken("game::assets")).to.equal(
        "GENERATED_BINEMBED_game__assets_H"
      );
    });

    it("should work without a namespace", () => {
      expect(makeGuardToken(undefined)).to.equal("GENERATED_BINEMBED__H");
    });
  });
});
