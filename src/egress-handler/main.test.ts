import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { pathToFileURL } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { isEntryPoint } from "./main.js";

describe("isEntryPoint", () => {
  let dir: string;
  let script: string;
  let scriptUrl: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "egress-main-"));
    script = path.join(dir, "main.js");
    fs.writeFileSync(script, "");
    scriptUrl = pathToFileURL(fs.realpathSync(script)).href;
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("matches the script itself", () => {
    expect(isEntryPoint(script, scriptUrl)).toBe(true);
  });

  it("matches through an installed bin symlink", () => {
    const bin = path.join(dir, "egress-handler");
    fs.symlinkSync(script, bin);

    expect(isEntryPoint(bin, scriptUrl)).toBe(true);
  });

  it("does not match another script", () => {
    const other = path.join(dir, "other.js");
    fs.writeFileSync(other, "");

    expect(isEntryPoint(other, scriptUrl)).toBe(false);
  });

  it("does not match a missing or absent script", () => {
    expect(isEntryPoint(path.join(dir, "missing.js"), scriptUrl)).toBe(false);
    expect(isEntryPoint(undefined, scriptUrl)).toBe(false);
  });

  it("is false under the test runner", () => {
    expect(isEntryPoint(process.argv[1], new URL("./main.ts", import.meta.url).href)).toBe(false);
  });
});
