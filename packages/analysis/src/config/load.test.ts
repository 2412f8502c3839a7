import { expect } from "chai";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { BindgenError } from "../diagnostics.js";
import { configuredFunctions, emptyConfig, identMatches, matchedParameters } from "./functions.js";
import { loadConfig, parseConfig } from "./load.js";

describe("@bindforge/analysis config", () => {
  function expectCode(fn: () => unknown, code: string): void {
    try {
      fn();
    } catch (err) {
      expect(err).to.be.instanceOf(BindgenError);
      if (err instanceof BindgenError) expect(err.code).to.equal(code);
      return;
    }
    expect.fail(`expected ${code}`);
  }

  it("parses functions with defaults and parameter overrides", () => {
    const config = parseConfig(
      {
        schema: 1,
        functions: [
          {
            name: "set_data",
            disableLengthDetect: true,
            parameters: [
              { name: "buf", nullable: true, const: true },
              { name: "count", lengthOf: "items" },
              { pattern: "path.*", stringType: "filename" },
            ],
          },
          { pattern: ".*_unsafe", ignore: true },
        ],
      },
      "bindforge.json"
    );
    const [setData, unsafe] = config.functions;
    expect(setData?.ignore).to.equal(false);
    expect(setData?.disableLengthDetect).to.equal(true);
    expect(setData?.parameters[0]).to.deep.equal({
      ident: { kind: "name", name: "buf" },
      nullable: true,
      constant: true,
      lengthOf: undefined,
      stringType: undefined,
    });
    expect(setData?.parameters[1]?.constant).to.equal(false);
    expect(setData?.parameters[1]?.lengthOf).to.equal("items");
    expect(setData?.parameters[2]?.stringType).to.equal("filename");
    expect(unsafe?.ignore).to.equal(true);
    expect(unsafe?.parameters).to.deep.equal([]);
  });

  it("anchors patterns", () => {
    const config = parseConfig({ schema: 1, functions: [{ pattern: "get_.*" }] }, "bindforge.json");
    const ident = config.functions[0]?.ident;
    expect(ident?.kind).to.equal("pattern");
    if (ident === undefined) return;
    expect(identMatches(ident, "get_name")).to.equal(true);
    expect(identMatches(ident, "widget_get_name")).to.equal(false);
  });

  it("selects configured functions and matching parameter entries", () => {
    const config = parseConfig(
      {
        schema: 1,
        functions: [
          { name: "draw", parameters: [{ name: "len", lengthOf: "points" }] },
          { pattern: "dra.*", parameters: [{ pattern: "l.*", nullable: false }] },
          { name: "erase" },
        ],
      },
      "bindforge.json"
    );
    const fns = configuredFunctions(config, "draw");
    expect(fns.length).to.equal(2);
    expect(matchedParameters(fns, "len").map((p) => p.lengthOf)).to.deep.equal(["points", undefined]);
    expect(matchedParameters(fns, "points")).to.deep.equal([]);
    expect(configuredFunctions(emptyConfig, "draw")).to.deep.equal([]);
  });

  it("accepts an empty configuration", () => {
    expect(parseConfig({ schema: 1 }, "bindforge.json")).to.deep.equal(emptyConfig);
  });

  it("rejects invalid configuration with coded errors", () => {
    expectCode(() => parseConfig({ schema: 3 }, "bindforge.json"), "BFG2002");
    expectCode(() => parseConfig({ schema: 1, extra: 1 }, "bindforge.json"), "BFG2003");
    expectCode(() => parseConfig({ schema: 1, functions: [{ name: "f", ignore: "yes" }] }, "bindforge.json"), "BFG2004");
    expectCode(
      () => parseConfig({ schema: 1, functions: [{ name: "f", parameters: [{ name: "x", stringType: "ascii" }] }] }, "bindforge.json"),
      "BFG2004"
    );
    expectCode(() => parseConfig({ schema: 1, functions: [{ ignore: true }] }, "bindforge.json"), "BFG2005");
    expectCode(() => parseConfig({ schema: 1, functions: [{ name: "f", pattern: "f" }] }, "bindforge.json"), "BFG2005");
    expectCode(() => parseConfig({ schema: 1, functions: [{ pattern: "(" }] }, "bindforge.json"), "BFG2006");
  });

  it("loads configuration from disk", () => {
    const dir = mkdtempSync(join(tmpdir(), "bindforge-config-"));
    try {
      const path = join(dir, "bindforge.json");
      writeFileSync(path, JSON.stringify({ schema: 1, functions: [{ name: "f", ignore: true }] }), "utf-8");
      expect(loadConfig(path).functions[0]?.ignore).to.equal(true);
      expectCode(() => loadConfig(join(dir, "missing.json")), "BFG2001");
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
