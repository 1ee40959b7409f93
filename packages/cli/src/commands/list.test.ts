/**
 * Tests for list command
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DEFAULT_ENCODER_OPTIONS } from "@binembed/emitter";
import { captureConsole } from "../console-capture.js";
import type { ResolvedConfig } from "../types.js";
import { listCommand } from "./list.js";

describe("List Command", () => {
  let root: string;

  const configFor = (inputs: readonly string[]): ResolvedConfig => ({
    inputs,
    outputDirectory: join(root, "out"),
    outputDirectoryGiven: true,
    outputName: "embedded_files",
    namespace: undefined,
    encoder: DEFAULT_ENCODER_OPTIONS,
    duplicateNames: "overwrite",
    verbose: false,
    quiet: false,
  });

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "binembed-list-"));
    mkdirSync(join(root, "in", "icons"), { recursive: true });
    writeFileSync(join(root, "in", "readme.md"), "# hi\n");
    writeFileSync(join(root, "in", "icons", "app-icon.png"), Uint8Array.from([0x89]));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("should print identifier, name and path per file without writing", async () => {
    const { result, out } = await captureConsole(() => listCommand(configFor([join(root, "in")])));

    expect(result.ok).to.equal(true);
    expect(out).to.deep.equal([
      `file_app_icon_png  app-icon.png  ${join(root, "in", "icons", "app-icon.png")}`,
      `file_readme_md  readme.md  ${join(root, "in", "readme.md")}`,
    ]);
    expect(existsSync(join(root, "out"))).to.equal(false);
  });

  it("should show disambiguated identifiers", async () => {
    writeFileSync(join(root, "in", "readme_md"), "");

    const { out, err } = await captureConsole(() =>
      listCommand(configFor([join(root, "in", "readme.md"), join(root, "in", "readme_md")]))
    );

    expect(out).to.deep.equal([
      `file_readme_md  readme.md  ${join(root, "in", "readme.md")}`,
      `file_readme_md_1  readme_md  ${join(root, "in", "readme_md")}`,
    ]);
    expect(err).to.have.length(1);
  });

  it("should fail on a missing input", async () => {
    const { result } = await captureConsole(() => listCommand(configFor([join(root, "nope")])));

    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error.exitCode).to.equal(4);
      expect(result.error.diagnostics[0]?.message).to.equal(
        `Can't find file or directory '${join(root, "nope")}'`
      );
    }
  });
});
