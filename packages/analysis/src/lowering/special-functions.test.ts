import { expect } from "chai";

import type { Env } from "../env.js";
import { createEnv } from "../env.js";
import { parseLibrary } from "../library/load.js";
import type { FunctionDescriptor } from "../library/types.js";
import { specialFunctionType } from "./special-functions.js";

describe("@bindforge/analysis lowering/special-functions", () => {
  const { library } = parseLibrary(
    {
      schema: 1,
      namespace: "Demo",
      types: [
        { kind: "enumeration", name: "Mode" },
        { kind: "bitfield", name: "Flags" },
        { kind: "record", name: "Rect" },
        { kind: "class", name: "Widget" },
      ],
      functions: [
        { name: "to_string", cIdentifier: "demo_mode_to_string", owner: "Mode", parameters: [{ name: "mode", type: "Mode" }], returnValue: { type: "utf8" } },
        { name: "to_string", cIdentifier: "demo_flags_to_string", owner: "Flags", parameters: [{ name: "flags", type: "Flags" }], returnValue: { type: "utf8", transfer: "full" } },
        { name: "to_string", cIdentifier: "demo_widget_to_string", owner: "Widget", parameters: [{ name: "self", type: "Widget", instance: true }], returnValue: { type: "utf8", transfer: "full" } },
        { name: "to_string", cIdentifier: "demo_rect_to_string", owner: "Rect", parameters: [{ name: "self", type: "Rect", instance: true }], returnValue: { type: "int" } },
        { name: "copy", cIdentifier: "demo_rect_copy", owner: "Rect", parameters: [{ name: "self", type: "Rect", instance: true }], returnValue: { type: "Rect" } },
        { name: "destroy", cIdentifier: "demo_rect_destroy", owner: "Rect", parameters: [{ name: "self", type: "Rect", instance: true }] },
        { name: "hash", cIdentifier: "demo_rect_hash", owner: "Rect", parameters: [{ name: "self", type: "Rect", instance: true }], returnValue: { type: "uint" } },
        { name: "resize", cIdentifier: "demo_rect_resize", owner: "Rect", parameters: [{ name: "self", type: "Rect", instance: true }] },
        { name: "copy", cIdentifier: "demo_copy" },
      ],
    },
    "demo.json"
  );
  const env: Env = createEnv(library);

  function fn(cIdentifier: string): FunctionDescriptor {
    const found = library.functions.find((f) => f.cIdentifier === cIdentifier);
    if (!found) throw new Error(`Expected function ${cIdentifier} in fixture.`);
    return found;
  }

  it("makes enumeration stringifiers static", () => {
    expect(specialFunctionType(env, fn("demo_mode_to_string"))).to.equal("static_stringify");
  });

  it("uses Display for other string-returning to_string methods", () => {
    expect(specialFunctionType(env, fn("demo_flags_to_string"))).to.equal("display");
    expect(specialFunctionType(env, fn("demo_widget_to_string"))).to.equal("display");
    expect(specialFunctionType(env, fn("demo_rect_to_string"))).to.equal(undefined);
  });

  it("maps well-known method names", () => {
    expect(specialFunctionType(env, fn("demo_rect_copy"))).to.equal("copy");
    expect(specialFunctionType(env, fn("demo_rect_destroy"))).to.equal("free");
    expect(specialFunctionType(env, fn("demo_rect_hash"))).to.equal("hash");
    expect(specialFunctionType(env, fn("demo_rect_resize"))).to.equal(undefined);
  });

  it("ignores free functions", () => {
    expect(specialFunctionType(env, fn("demo_copy"))).to.equal(undefined);
  });
});
