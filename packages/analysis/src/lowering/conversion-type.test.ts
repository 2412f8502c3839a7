import { expect } from "chai";

import { createEnv } from "../env.js";
import { Library } from "../library/library.js";
import { conversionType, isValueConversion } from "./conversion-type.js";

describe("@bindforge/analysis lowering/conversion-type", () => {
  function buildEnv() {
    const library = new Library("Demo");
    const ids = {
      widget: library.add({ kind: "class", name: "Widget", final: false }),
      buildable: library.add({ kind: "interface", name: "Buildable" }),
      mode: library.add({ kind: "enumeration", name: "Mode" }),
      flags: library.add({ kind: "bitfield", name: "Flags" }),
      rect: library.add({ kind: "record", name: "Rect", inline: false }),
      point: library.add({ kind: "record", name: "Point", inline: true }),
      value: library.add({ kind: "union", name: "Value" }),
      func: library.add({ kind: "callback", name: "Func" }),
      custom: library.add({ kind: "custom", name: "Opaque" }),
      quark: library.add({ kind: "alias", name: "Quark", cIdentifier: "GQuark", target: library.fundamental("uint32") }),
      count: library.add({ kind: "alias", name: "Count", cIdentifier: "DemoCount", target: library.fundamental("int") }),
      list: library.add({ kind: "list", element: library.fundamental("utf8") }),
      table: library.add({ kind: "hash_table", key: library.fundamental("utf8"), value: library.fundamental("int") }),
    };
    return { env: createEnv(library), library, ids };
  }

  it("classifies fundamentals", () => {
    const { env, library } = buildEnv();
    expect(conversionType(env, library.fundamental("boolean"))).to.equal("scalar");
    expect(conversionType(env, library.fundamental("gtype"))).to.equal("scalar");
    expect(conversionType(env, library.fundamental("int"))).to.equal("direct");
    expect(conversionType(env, library.fundamental("double"))).to.equal("direct");
    expect(conversionType(env, library.fundamental("unichar"))).to.equal("direct");
    expect(conversionType(env, library.fundamental("utf8"))).to.equal("pointer");
    expect(conversionType(env, library.fundamental("filename"))).to.equal("pointer");
    expect(conversionType(env, library.fundamental("pointer"))).to.equal("pointer");
    expect(conversionType(env, library.fundamental("varargs"))).to.equal("unknown");
    expect(conversionType(env, library.fundamental("unsupported"))).to.equal("unknown");
  });

  it("classifies named and container types", () => {
    const { env, ids } = buildEnv();
    expect(conversionType(env, ids.widget)).to.equal("pointer");
    expect(conversionType(env, ids.buildable)).to.equal("pointer");
    expect(conversionType(env, ids.mode)).to.equal("scalar");
    expect(conversionType(env, ids.flags)).to.equal("scalar");
    expect(conversionType(env, ids.rect)).to.equal("pointer");
    expect(conversionType(env, ids.point)).to.equal("borrow");
    expect(conversionType(env, ids.value)).to.equal("direct");
    expect(conversionType(env, ids.func)).to.equal("direct");
    expect(conversionType(env, ids.custom)).to.equal("unknown");
    expect(conversionType(env, ids.list)).to.equal("pointer");
    expect(conversionType(env, ids.table)).to.equal("pointer");
  });

  it("classifies aliases through their target, with GQuark as scalar", () => {
    const { env, ids } = buildEnv();
    expect(conversionType(env, ids.quark)).to.equal("scalar");
    expect(conversionType(env, ids.count)).to.equal("direct");
  });

  it("degrades unknown ids and alias cycles to unknown", () => {
    const { env, library } = buildEnv();
    const loop = library.add({ kind: "alias", name: "Loop", cIdentifier: "DemoLoop", target: 0 });
    library.define(loop, { kind: "alias", name: "Loop", cIdentifier: "DemoLoop", target: loop });
    expect(conversionType(env, loop)).to.equal("unknown");
    expect(conversionType(env, 10_000)).to.equal("unknown");
  });

  it("is stable across repeated classification", () => {
    const { env, ids } = buildEnv();
    for (const id of Object.values(ids)) {
      expect(conversionType(env, id)).to.equal(conversionType(env, id));
    }
  });

  it("treats only direct and scalar as value conversions", () => {
    expect(isValueConversion("direct")).to.equal(true);
    expect(isValueConversion("scalar")).to.equal(true);
    expect(isValueConversion("pointer")).to.equal(false);
    expect(isValueConversion("borrow")).to.equal(false);
    expect(isValueConversion("unknown")).to.equal(false);
  });
});
