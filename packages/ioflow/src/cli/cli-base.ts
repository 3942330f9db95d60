/* eslint-disable no-console */

import { parseArgs, type ParseArgsConfig } from "util";

// Extended option config that includes our custom properties
export interface ExtendedOptionConfig {
  type: "string" | "boolean";
  multiple?: boolean;
  short?: string;
  default?: string | boolean | string[] | boolean[];
  description?: string;
  /** Placeholder shown in help, e.g. `<file>` */
  argument?: string;
}

export interface CliConfig {
  name: string;
  description: string;
  options: Record<string, ExtendedOptionConfig>;
  allowPositionals?: boolean;
  /** Help text for the positional arguments */
  positionals?: string;
  examples?: string[];
}

type ParsedValue = string | boolean | (string | boolean)[] | undefined;

export abstract class CliBase {
  protected values: Record<string, ParsedValue> = {};
  protected positionals: string[] = [];

  constructor(protected config: CliConfig) {}

  protected abstract shouldShowHelp(): boolean;
  protected abstract validateArgs(): void;
  /** Runs the command and returns the process exit code */
  protected abstract execute(): Promise<number>;

  protected parse(args: string[]): void {
    // Strip out custom properties before passing to parseArgs
    const parseOptions: NonNullable<ParseArgsConfig["options"]> = {};
    for (const [key, value] of Object.entries(this.config.options)) {
      const { type, multiple, short, default: defaultValue } = value;
      const option: NonNullable<ParseArgsConfig["options"]>[string] = {
        type,
      };
      if (multiple !== undefined) option.multiple = multiple;
      if (short !== undefined) option.short = short;
      if (defaultValue !== undefined) option.default = defaultValue;
      parseOptions[key] = option;
    }

    const parsed = parseArgs({
      args,
      allowPositionals: this.config.allowPositionals ?? false,
      options: {
        help: {
          type: "boolean",
          short: "h",
        },
        ...parseOptions,
      },
    });

    this.values = parsed.values;
    this.positionals = parsed.positionals;
  }

  protected string(name: string): string | undefined {
    const value = this.values[name];
    return typeof value === "string" ? value : undefined;
  }

  protected strings(name: string): string[] {
    const value = this.values[name];
    if (!Array.isArray(value)) {
      return typeof value === "string" ? [value] : [];
    }
    return value.filter((item): item is string => typeof item === "string");
  }

  protected flag(name: string): boolean {
    return this.values[name] === true;
  }

  protected showHelp(): void {
    const positionals = this.config.positionals
      ? ` ${this.config.positionals}`
      : "";
    console.log(`${this.config.description}\n`);
    console.log(`Usage: ${this.config.name} [options]${positionals}`);

    console.log("\nOptions:");
    console.log(`  -h, --help                  Show this help message`);
    for (const [name, opt] of Object.entries(this.config.options)) {
      const shortFlag = opt.short ? `-${opt.short}, ` : "    ";
      const argument = opt.argument ? ` ${opt.argument}` : "";
      const defaultVal =
        opt.default !== undefined ? ` (default: ${opt.default})` : "";
      const desc = opt.description || "";

      console.log(
        `  ${shortFlag}--${`${name}${argument}`.padEnd(22)} ${desc}${defaultVal}`,
      );
    }

    if (this.config.examples && this.config.examples.length > 0) {
      console.log("\nExamples:");
      this.config.examples.forEach((example) => console.log(`  ${example}`));
    }
  }

  async run(args: string[] = process.argv.slice(2)): Promise<number> {
    try {
      this.parse(args);

      if (this.flag("help") || this.shouldShowHelp()) {
        this.showHelp();
        return 0;
      }

      this.validateArgs();
      return await this.execute();
    } catch (error) {
      console.error("Error:", error instanceof Error ? error.message : error);
      return 1;
    }
  }
}
