// report/module_report.ts

import { LexToken } from "../core/mini_lexer";
import { VerilogModule, VerilogParameter, VerilogPort, VerilogSubModule } from "../types/hdl";

/** "clk : input wire" */
export function describePort(port: VerilogPort): string {
  return `${port.name} : ${port.mode} ${port.dataType}`;
}

/** "WIDTH : wire := 8", or "WIDTH : wire" without a default. */
export function describeParameter(param: VerilogParameter): string {
  const decl = `${param.name} : ${param.dataType}`;
  return param.defaultValue !== undefined ? `${decl} := ${param.defaultValue}` : decl;
}

/** "u_fifo (sync_fifo)" */
export function describeSubModule(sub: VerilogSubModule): string {
  return `${sub.instanceName} (${sub.moduleType})`;
}

/**
 * formatModule(module):
 *   Multi-line, human-readable report of one module: description, parameters, ports,
 *   submodules with their connections, and sections.
 */
export function formatModule(module: VerilogModule): string {
  const lines: string[] = [`=== Module: ${module.name} ===`];

  if (module.desc) {
    lines.push("", "Description:", ...module.desc.split("\n").map((l) => `  ${l}`));
  }

  lines.push("", "Parameters:");
  if (module.parameters.length === 0) lines.push("  None");
  for (const param of module.parameters) {
    lines.push(`  ${describeParameter(param)}`);
    if (param.desc) lines.push(`    ${param.desc}`);
  }

  lines.push("", "Ports:");
  if (module.ports.length === 0) lines.push("  None");
  for (const port of module.ports) {
    lines.push(`  ${describePort(port)}`);
    if (port.desc) lines.push(`    ${port.desc}`);
  }

  lines.push("", "Submodules:");
  if (module.submodules.length === 0) lines.push("  None");
  for (const sub of module.submodules) {
    lines.push(`  ${describeSubModule(sub)}`);
    if (sub.desc) lines.push(`    ${sub.desc}`);
    for (const [formal, actual] of Object.entries(sub.portConnections)) {
      lines.push(`    ${formal} => ${actual}`);
    }
  }

  const sections = Object.entries(module.sections);
  if (sections.length > 0) {
    lines.push("", "Sections:");
    for (const [label, ports] of sections) {
      lines.push(`  ${label}: ${ports.join(", ")}`);
    }
  }

  return lines.join("\n");
}

/** "42: port_item [\"clk\"]" (groups that did not match print as null) */
export function formatToken<A extends string>(token: LexToken<A>): string {
  return `${token.offset}: ${token.action} ${JSON.stringify(token.groups)}`;
}

/** formatToken() over a whole stream; consumes the iterable. */
export function formatTokens<A extends string>(tokens: Iterable<LexToken<A>>): string[] {
  return Array.from(tokens, (token) => formatToken(token));
}

/**
 * errorContext(text, offset, radius):
 *   The text around an offset with ">>>>" marking the offset itself.
 */
export function errorContext(text: string, offset: number, radius = 50): string {
  const before = text.slice(Math.max(0, offset - radius), offset);
  const after = text.slice(offset, offset + radius);
  return `${before}>>>>${after}`;
}
