import { describe, expect, it } from "vitest";
import { VerilogLexer } from "../language/verilog_rules";

function actions(text: string): string[] {
  return Array.from(VerilogLexer.run(text), (t) => t.action);
}

describe("Verilog rule table", () => {
  it("tokenizes an ANSI header", () => {
    const tokens = Array.from(VerilogLexer.run("module m(input a, output [3:0] y); endmodule"));
    expect(tokens.map((t) => t.action)).toEqual([
      "module_open",
      "port_group_open",
      "port_item",
      "port_group_open",
      "port_item",
      "module_close",
    ]);
    expect(tokens[0].groups).toEqual(["m"]);
    expect(tokens[3].groups).toEqual(["output", undefined, undefined, "[3:0]"]);
    expect(tokens[4].groups).toEqual(["y"]);
  });

  it("captures net type, signedness and range of a port group", () => {
    const [, group] = Array.from(VerilogLexer.run("module m(output reg signed [7:0] q); endmodule"));
    expect(group.action).toBe("port_group_open");
    expect(group.groups).toEqual(["output", "reg", "signed", "[7:0]"]);
  });

  it("does not mistake statements for instantiations", () => {
    const text = [
      "module m;",
      "  always @(posedge clk) if (a) b <= c; else if (d) b <= e;",
      "endmodule",
    ].join("\n");
    expect(actions(text)).toEqual(["module_open", "module_close"]);
  });

  it("skips function and task bodies", () => {
    const text = "module m(input a); function f; input x; f = x; endfunction task t; output y; endtask endmodule";
    expect(actions(text)).toEqual(["module_open", "port_group_open", "port_item", "module_close"]);
  });

  it("keeps comment markers inside strings literal", () => {
    expect(actions('module m; initial $display("/* not a comment"); endmodule')).toEqual([
      "module_open",
      "module_close",
    ]);
  });

  it("reads plain comments as metacomments outside module bodies only", () => {
    const text = "// head\nmodule m;\n  // body\n  //# doc\nendmodule\n";
    const tokens = Array.from(VerilogLexer.run(text));
    expect(tokens.map((t) => [t.action, t.groups[0]])).toEqual([
      ["metacomment", "head"],
      ["module_open", "m"],
      ["body_metacomment", "doc"],
      ["module_close", undefined],
    ]);
  });

  it("reads variable port types as the storage class", () => {
    const [, group] = Array.from(VerilogLexer.run("module m(output integer count); endmodule"));
    expect(group.groups).toEqual(["output", "integer", undefined, undefined]);
  });

  it("skips attribute instances inside lists", () => {
    const text = 'module m(input a, (* keep *) output q); cell u (.a(a), (* x *) .q(q)); endmodule';
    expect(actions(text)).toEqual([
      "module_open",
      "port_group_open",
      "port_item",
      "port_group_open",
      "port_item",
      "submodule_open",
      "submodule_connection",
      "submodule_connection",
      "submodule_close",
      "module_close",
    ]);
  });

  it("emits section markers with their label", () => {
    const tokens = Array.from(VerilogLexer.run("module m(\n  //# {{clocks}} and resets\n  input clk\n);\nendmodule"));
    expect(tokens[1].action).toBe("section_marker");
    expect(tokens[1].groups).toEqual(["clocks"]);
  });

  it("tokenizes parameter overrides and connections", () => {
    const text = "module t; fifo #(.DEPTH(16), 8) u_f (.clk(clk), d); endmodule";
    const tokens = Array.from(VerilogLexer.run(text));
    expect(tokens.map((t) => [t.action, ...t.groups])).toEqual([
      ["module_open", "t"],
      ["submodule_with_params_open", "fifo"],
      ["submodule_connection", "DEPTH", "16"],
      ["submodule_positional", "8"],
      ["submodule_params_close", "u_f"],
      ["submodule_connection", "clk", "clk"],
      ["submodule_positional", "d"],
      ["submodule_close"],
      ["module_close"],
    ]);
  });

  it("ignores compiler directives and macro uses", () => {
    const text = "`timescale 1ns/1ps\n`define W 8\nmodule m(input [`W-1:0] a);\nendmodule\n";
    const tokens = Array.from(VerilogLexer.run(text));
    expect(tokens.map((t) => t.action)).toEqual(["module_open", "port_group_open", "port_item", "module_close"]);
    expect(tokens[1].groups[3]).toBe("[`W-1:0]");
  });
});
