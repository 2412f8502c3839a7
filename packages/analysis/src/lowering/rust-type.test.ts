import { expect } from "chai";

import { createEnv } from "../env.js";
import { Library } from "../library/library.js";
import { rustType } from "./rust-type.js";

describe("@bindforge/analysis lowering/rust-type", () => {
  const library = new Library("Demo");
  const env = createEnv(library);

  it("renders fundamentals as Rust primitives", () => {
    expect(rustType(env, library.fundamental("uint"))).to.equal("u32");
    expect(rustType(env, library.fundamental("int"))).to.equal("i32");
    expect(rustType(env, library.fundamental("size"))).to.equal("usize");
    expect(rustType(env, library.fundamental("ssize"))).to.equal("isize");
    expect(rustType(env, library.fundamental("boolean"))).to.equal("bool");
    expect(rustType(env, library.fundamental("utf8"))).to.equal("GString");
    expect(rustType(env, library.fundamental("pointer"))).to.equal("glib::ffi::gpointer");
  });

  it("renders named types and containers", () => {
    const widget = library.add({ kind: "class", name: "Widget", final: true });
    const list = library.add({ kind: "list", element: widget });
    const table = library.add({ kind: "hash_table", key: library.fundamental("utf8"), value: list });
    expect(rustType(env, widget)).to.equal("Widget");
    expect(rustType(env, list)).to.equal("Vec<Widget>");
    expect(rustType(env, table)).to.equal("HashMap<GString, Vec<Widget>>");
  });

  it("marks shapes it cannot render", () => {
    const custom = library.add({ kind: "custom", name: "Opaque" });
    expect(rustType(env, custom)).to.equal("/*Unimplemented*/Opaque");
    expect(rustType(env, library.fundamental("varargs"))).to.equal("/*Unimplemented*/varargs");
    expect(rustType(env, 9_999)).to.equal("/*Unimplemented*/#9999");
  });
});
