// language/verilog_builder.ts

import { BuilderError, StructuralError, locate } from "../core/errors";
import { LexToken, TokenStream } from "../core/mini_lexer";
import {
  PortDirection,
  VerilogModule,
  VerilogParameter,
  VerilogPort,
  VerilogSubModule,
} from "../types/hdl";
import { VerilogAction, VerilogState } from "./verilog_rules";

export const DEFAULT_DATA_TYPE = "wire";
export const DEFAULT_PORT_MODE: PortDirection = "input";

// Mutable drafts; they never leave the builder.
interface PortDraft {
  name: string;
  mode: PortDirection;
  dataType: string;
  desc?: string;
}

interface ParameterDraft {
  name: string;
  dataType: string;
  defaultValue?: string;
  desc?: string;
}

interface SubModuleDraft {
  moduleType: string;
  instanceName?: string;
  desc?: string;
  connections: Record<string, string>;
  positional: number;
}

interface SectionBreak {
  index: number;
  label: string;
}

/** Everything that belongs to the module currently being built. */
interface ModuleContext {
  name: string;
  openedAt: number;
  ports: Map<string, PortDraft>;
  parameters: ParameterDraft[];
  breaks: SectionBreak[];
  submodules: VerilogSubModule[];
  submodule?: SubModuleDraft;
  lastItem?: PortDraft | ParameterDraft;
}

/**
 * composeType(storage, qualifier, range):
 *   Assemble a composite type string: storage class (defaulting to "wire"), then the
 *   signedness keyword and the bit range when present, separated by single spaces.
 */
export function composeType(storage?: string, qualifier?: string, range?: string): string {
  return [storage ?? DEFAULT_DATA_TYPE, qualifier, range?.trim()]
    .filter((part): part is string => part !== undefined && part !== "")
    .join(" ");
}

/**
 * resolveSections(portNames, breaks):
 *   Turn recorded break-points into contiguous named slices of the port list.
 *   A break at index i claims the ports from i up to the next break (or the end).
 *   Breaks at or beyond the number of ports are dropped; a repeated label extends
 *   its earlier slice.
 */
export function resolveSections(
  portNames: readonly string[],
  breaks: readonly SectionBreak[]
): Record<string, string[]> {
  const sections: Record<string, string[]> = {};
  breaks.forEach((brk, i) => {
    if (brk.index >= portNames.length) return;
    const next = i + 1 < breaks.length ? breaks[i + 1].index : portNames.length;
    const slice = portNames.slice(brk.index, Math.max(brk.index, next));
    sections[brk.label] = [...(sections[brk.label] ?? []), ...slice];
  });
  return sections;
}

/**
 * VerilogModuleBuilder: the single-pass interpreter of the Verilog token stream.
 *
 * The builder owns every draft while a module is open. At `module_close` the context is
 * turned into a frozen VerilogModule and dropped, so nothing handed out is ever touched
 * again.
 */
export class VerilogModuleBuilder {
  private readonly modules: VerilogModule[] = [];
  private pendingDesc: string[] = [];
  // doc comments from a module body, held until the next action shows what they precede
  private heldComments: string[] = [];
  private current?: ModuleContext;
  private mode: PortDirection = DEFAULT_PORT_MODE;
  private dataType = DEFAULT_DATA_TYPE;

  constructor(private readonly text: string) {}

  /**
   * build(stream):
   *   Consume the whole stream and return the finalized modules in source order.
   *   Throws a StructuralError when the input ends inside a comment, module or
   *   instantiation.
   */
  static build(stream: TokenStream<VerilogState, VerilogAction>): VerilogModule[] {
    const builder = new VerilogModuleBuilder(stream.text);
    for (const token of stream) {
      builder.apply(token);
    }
    builder.finish(stream.states);
    return builder.modules;
  }

  apply(token: LexToken<VerilogAction>): void {
    const { action } = token;
    if (action !== "body_metacomment" && action !== "submodule_open" && action !== "submodule_with_params_open") {
      this.releaseHeldComments();
    }
    switch (action) {
      case "module_open":
        return this.openModule(token);
      case "module_close":
        return this.closeModule(token);
      case "parameter_group_open":
        this.requireModule(token);
        this.dataType = composeType(token.groups[0], undefined, token.groups[1]);
        return;
      case "parameter_item_with_default":
        return this.addParameter(token, this.group(token, 1).trim());
      case "parameter_item":
        return this.addParameter(token);
      case "port_group_open":
        this.requireModule(token);
        this.mode = toDirection(this.group(token, 0), token);
        this.dataType = composeType(token.groups[1], token.groups[2], token.groups[3]);
        return;
      case "port_item":
        return this.addPort(token);
      case "section_marker": {
        const ctx = this.requireModule(token);
        ctx.breaks.push({ index: ctx.ports.size, label: this.group(token, 0).trim() });
        return;
      }
      case "submodule_with_params_open":
        return this.openSubModule(token, this.group(token, 0));
      case "submodule_open":
        return this.openSubModule(token, this.group(token, 0), this.group(token, 1));
      case "submodule_params_close": {
        const sub = this.requireSubModule(token);
        sub.instanceName = this.group(token, 0);
        sub.positional = 0;
        return;
      }
      case "submodule_connection": {
        const sub = this.requireSubModule(token);
        const formal = this.group(token, 0);
        // ".clk" alone connects the signal of the same name
        sub.connections[formal] = token.groups[1] ?? formal;
        return;
      }
      case "submodule_positional": {
        const sub = this.requireSubModule(token);
        const key = sub.instanceName === undefined ? `#${sub.positional}` : String(sub.positional);
        sub.connections[key] = this.group(token, 0).trim();
        sub.positional++;
        return;
      }
      case "submodule_close":
        return this.closeSubModule(token);
      case "metacomment":
        return this.addMetacomment(this.group(token, 0));
      case "body_metacomment":
        this.requireModule(token);
        this.heldComments.push(this.group(token, 0));
        return;
      default: {
        const unknown: never = action;
        throw this.fail(`Unknown action "${String(unknown)}"`, token);
      }
    }
  }

  /**
   * finish(states):
   *   Called once the stream is exhausted. Any lexer state still pushed, or a module
   *   left open, means the input was cut short.
   */
  finish(states: readonly string[]): void {
    const end = this.text.length;
    if (states.length > 1) {
      const open = states.slice(1);
      throw new StructuralError(
        `Unexpected end of input inside ${open[open.length - 1]} (open: ${open.join(" > ")})`,
        open,
        end,
        locate(this.text, end)
      );
    }
    if (this.current) {
      throw new StructuralError(
        `Module "${this.current.name}" is never closed`,
        ["module"],
        this.current.openedAt,
        locate(this.text, this.current.openedAt)
      );
    }
  }

  // ---------- modules ----------

  private openModule(token: LexToken<VerilogAction>): void {
    if (this.current) {
      throw this.fail(`Module "${this.group(token, 0)}" opened inside "${this.current.name}"`, token);
    }
    this.current = {
      name: this.group(token, 0),
      openedAt: token.offset,
      ports: new Map(),
      parameters: [],
      breaks: [],
      submodules: [],
    };
    this.mode = DEFAULT_PORT_MODE;
    this.dataType = DEFAULT_DATA_TYPE;
  }

  private closeModule(token: LexToken<VerilogAction>): void {
    const ctx = this.requireModule(token);
    if (ctx.submodule) {
      throw this.fail(`endmodule reached inside instantiation of "${ctx.submodule.moduleType}"`, token);
    }

    const ports = Array.from(ctx.ports.values(), freezePort);
    const sections = resolveSections(
      ports.map((p) => p.name),
      ctx.breaks
    );
    const module: VerilogModule = {
      kind: "module",
      name: ctx.name,
      ports: Object.freeze(ports),
      parameters: Object.freeze(ctx.parameters.map(freezeParameter)),
      sections: freezeSections(sections),
      submodules: Object.freeze(ctx.submodules),
      ...(this.pendingDesc.length > 0 ? { desc: this.pendingDesc.join("\n") } : {}),
    };
    this.modules.push(Object.freeze(module));

    this.current = undefined;
    this.pendingDesc = [];
    this.mode = DEFAULT_PORT_MODE;
    this.dataType = DEFAULT_DATA_TYPE;
  }

  // ---------- interface items ----------

  private addParameter(token: LexToken<VerilogAction>, defaultValue?: string): void {
    const ctx = this.requireModule(token);
    const name = this.group(token, 0).trim();
    if (defaultValue === undefined && ctx.parameters.some((p) => p.name === name)) {
      return;
    }
    const param: ParameterDraft = { name, dataType: this.dataType };
    if (defaultValue !== undefined) param.defaultValue = defaultValue;
    ctx.parameters.push(param);
    ctx.lastItem = param;
  }

  private addPort(token: LexToken<VerilogAction>): void {
    const ctx = this.requireModule(token);
    const name = this.group(token, 0);
    const port: PortDraft = { name, mode: this.mode, dataType: this.dataType };
    // a later declaration of the same name (non-ANSI style) keeps the first position
    ctx.ports.set(name, port);
    ctx.lastItem = port;
  }

  /** Held body comments that do not precede an instantiation are ordinary metacomments. */
  private releaseHeldComments(): void {
    for (const text of this.heldComments) this.addMetacomment(text);
    this.heldComments = [];
  }

  private addMetacomment(text: string): void {
    const last = this.current?.lastItem;
    if (last) {
      last.desc = text;
    } else {
      this.pendingDesc.push(text);
    }
  }

  // ---------- instantiations ----------

  private openSubModule(token: LexToken<VerilogAction>, moduleType: string, instanceName?: string): void {
    const ctx = this.requireModule(token);
    if (ctx.submodule) {
      throw this.fail(`Instantiation of "${moduleType}" starts inside "${ctx.submodule.moduleType}"`, token);
    }
    ctx.submodule = { moduleType, instanceName, connections: {}, positional: 0 };
    if (this.heldComments.length > 0) {
      ctx.submodule.desc = this.heldComments.join("\n");
      this.heldComments = [];
    }
  }

  private closeSubModule(token: LexToken<VerilogAction>): void {
    const ctx = this.requireModule(token);
    const sub = this.requireSubModule(token);
    if (sub.instanceName === undefined) {
      throw this.fail(`Instantiation of "${sub.moduleType}" has no instance name`, token);
    }
    ctx.submodules.push(
      Object.freeze({
        moduleType: sub.moduleType,
        instanceName: sub.instanceName,
        portConnections: Object.freeze({ ...sub.connections }),
        ...(sub.desc !== undefined ? { desc: sub.desc } : {}),
      })
    );
    ctx.submodule = undefined;
  }

  // ---------- guards ----------

  private requireModule(token: LexToken<VerilogAction>): ModuleContext {
    if (!this.current) {
      throw this.fail(`"${token.action}" outside of any module`, token);
    }
    return this.current;
  }

  private requireSubModule(token: LexToken<VerilogAction>): SubModuleDraft {
    const sub = this.requireModule(token).submodule;
    if (!sub) {
      throw this.fail(`"${token.action}" without an instantiation in progress`, token);
    }
    return sub;
  }

  private group(token: LexToken<VerilogAction>, index: number): string {
    const value = token.groups[index];
    if (value === undefined) {
      throw this.fail(`"${token.action}" is missing capture group ${index + 1}`, token);
    }
    return value;
  }

  private fail(reason: string, token: LexToken<VerilogAction>): BuilderError {
    return new BuilderError(reason, token.action, token.offset, locate(this.text, token.offset));
  }
}

function toDirection(value: string, token: LexToken<VerilogAction>): PortDirection {
  switch (value) {
    case "input":
    case "output":
    case "inout":
      return value;
    default:
      throw new BuilderError(`Unknown port direction "${value}"`, token.action, token.offset);
  }
}

function freezePort(draft: PortDraft): VerilogPort {
  const port: VerilogPort = {
    name: draft.name,
    mode: draft.mode,
    dataType: draft.dataType,
    ...(draft.desc !== undefined ? { desc: draft.desc } : {}),
  };
  return Object.freeze(port);
}

function freezeParameter(draft: ParameterDraft): VerilogParameter {
  const param: VerilogParameter = {
    name: draft.name,
    mode: "in",
    dataType: draft.dataType,
    ...(draft.defaultValue !== undefined ? { defaultValue: draft.defaultValue } : {}),
    ...(draft.desc !== undefined ? { desc: draft.desc } : {}),
  };
  return Object.freeze(param);
}

function freezeSections(sections: Record<string, string[]>): Readonly<Record<string, readonly string[]>> {
  for (const label of Object.keys(sections)) {
    Object.freeze(sections[label]);
  }
  return Object.freeze(sections);
}
