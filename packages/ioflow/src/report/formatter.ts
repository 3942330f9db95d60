/**
 * Report formatter for human-readable text output
 */

import type { BitDescriptor, ModuleReport } from "./report.js";

export class Formatter {
  private indent = 0;
  private output: string[] = [];

  format(reports: readonly ModuleReport[]): string {
    this.output = [];
    this.indent = 0;

    reports.forEach((report, index) => {
      if (index > 0) {
        this.line("");
      }
      this.formatReport(report);
    });

    return this.output.join("\n");
  }

  private formatReport(report: ModuleReport): void {
    const kind = report.isSequential ? "sequential" : "combinational";
    this.line(`module ${report.module} (${kind}) {`);
    this.indent++;

    this.line(`inputs: ${this.formatBits(report.inputs)}`);
    this.line(`outputs: ${this.formatBits(report.outputs)}`);

    if (!report.dependencies) {
      this.line("dependencies: skipped");
    } else {
      this.line("dependencies {");
      this.indent++;
      for (const [output, inputs] of Object.entries(report.dependencies)) {
        this.line(`${output} <- ${this.formatBits(inputs)}`);
      }
      this.indent--;
      this.line("}");
    }

    this.indent--;
    this.line("}");
  }

  private formatBits(bits: readonly BitDescriptor[]): string {
    if (bits.length === 0) {
      return "(none)";
    }
    return bits.map(({ name, offset }) => `${name}[${offset}]`).join(", ");
  }

  private line(text: string): void {
    this.output.push(text.length > 0 ? "  ".repeat(this.indent) + text : "");
  }
}

export function formatText(reports: readonly ModuleReport[]): string {
  return new Formatter().format(reports);
}
