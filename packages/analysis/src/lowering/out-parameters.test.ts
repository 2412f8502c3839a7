import { expect } from "chai";

import { createEnv } from "../env.js";
import { Library } from "../library/library.js";
import type { ParameterDescriptor, TypeId } from "../library/types.js";
import { canAsReturn } from "./out-parameters.js";

describe("@bindforge/analysis lowering/out-parameters", () => {
  const library = new Library("Demo");
  const env = createEnv(library);
  const ints = library.add({ kind: "c_array", element: library.fundamental("int") });
  const point = library.add({ kind: "record", name: "Point", inline: true });
  const widget = library.add({ kind: "class", name: "Widget", final: true });

  function out(typ: TypeId, extra: Partial<ParameterDescriptor> = {}): ParameterDescriptor {
    return {
      name: "result",
      typ,
      cType: "",
      instanceParameter: false,
      direction: "out",
      nullable: false,
      allowNone: false,
      transfer: "full",
      callerAllocates: false,
      scope: "call",
      isError: false,
      ...extra,
    };
  }

  it("returns value types", () => {
    expect(canAsReturn(env, out(library.fundamental("double")))).to.equal(true);
    expect(canAsReturn(env, out(library.fundamental("boolean")))).to.equal(true);
  });

  it("returns pointers unless they are C arrays of values without a length", () => {
    expect(canAsReturn(env, out(widget))).to.equal(true);
    expect(canAsReturn(env, out(library.fundamental("utf8")))).to.equal(true);
    expect(canAsReturn(env, out(ints))).to.equal(false);
    expect(canAsReturn(env, out(ints, { arrayLength: 1 }))).to.equal(true);
  });

  it("keeps borrowed and unknown shapes as arguments", () => {
    expect(canAsReturn(env, out(point))).to.equal(false);
    expect(canAsReturn(env, out(library.fundamental("varargs")))).to.equal(false);
  });
});
