/* eslint-disable no-console */

/**
 * The analyze command: load a netlist, analyze its modules, print reports
 */

import { promises as fs } from "fs";

import { analyzeSource } from "../analyzer/index.js";
import {
  loadConfig,
  type AnalysisOptions,
  type ConfigError,
} from "../config/index.js";
import { Result } from "../result.js";
import { CliBase } from "./cli-base.js";
import {
  analysisOptions,
  commonOptions,
  parseInputFormat,
  parseOutputFormat,
  parsePrimitives,
} from "./options.js";
import { formatReports } from "./formatters.js";
import { displayErrors, displayMessages, writeOutput } from "./output.js";

export class AnalyzeCli extends CliBase {
  constructor() {
    super({
      name: "ioflow",
      description:
        "Report which primary inputs each output bit of a combinational module depends on",
      options: { ...commonOptions, ...analysisOptions },
      allowPositionals: true,
      positionals: "<netlist>",
      examples: [
        "ioflow adder.yaml",
        "ioflow -f text -m half_adder adder.yaml",
        "ioflow --input-format yosys -o report.json synth.json",
        "ioflow --primitive NAND --primitive NOT nand.yaml",
      ],
    });
  }

  protected shouldShowHelp(): boolean {
    return this.positionals.length === 0;
  }

  protected validateArgs(): void {
    if (this.positionals.length > 1) {
      throw new Error(
        `Expected one netlist file, got ${this.positionals.length}`,
      );
    }
    parseOutputFormat(this.string("format"));
    parseInputFormat(this.string("input-format"));
    parsePrimitives(this.strings("primitive"));
  }

  protected async execute(): Promise<number> {
    const [path] = this.positionals;
    const verbose = this.flag("verbose");

    const options = await this.resolveAnalysisOptions();
    if (!options.success) {
      displayErrors(Result.errors(options));
      return 1;
    }

    const source = await fs.readFile(path, "utf-8");
    const result = await analyzeSource(source, {
      format: parseInputFormat(this.string("input-format")),
      modules: this.strings("module"),
      options: options.value,
    });

    if (!result.success) {
      displayErrors(Result.errors(result));
      return 1;
    }

    const { reports, failures, messages } = result.value;
    displayMessages(messages, verbose);
    for (const failure of failures) {
      displayErrors(failure.errors);
    }

    await writeOutput(
      formatReports(reports, parseOutputFormat(this.string("format"))),
      this.string("output"),
    );

    return failures.length > 0 ? 1 : 0;
  }

  /**
   * Configuration file settings, overridden by command-line flags
   */
  private async resolveAnalysisOptions(): Promise<
    Result<Partial<AnalysisOptions>, ConfigError>
  > {
    const configPath = this.string("config");
    const loaded = configPath
      ? await loadConfig(configPath)
      : Result.ok<Partial<AnalysisOptions>>({});
    if (!loaded.success) {
      return loaded;
    }

    const options: Partial<AnalysisOptions> = { ...loaded.value };
    const markers = this.strings("seq-marker");
    if (markers.length > 0) {
      options.sequentialMarkers = markers;
    }
    const primitives = this.strings("primitive");
    if (primitives.length > 0) {
      options.primitives = parsePrimitives(primitives);
    }
    return Result.ok(options);
  }
}

export async function handleAnalyzeCommand(
  args: string[] = process.argv.slice(2),
): Promise<number> {
  return new AnalyzeCli().run(args);
}
