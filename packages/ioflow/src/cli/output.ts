/* eslint-disable no-console */

import { promises as fs } from "fs";

import type { FlowError } from "../errors.js";
import { Severity } from "../result.js";
import { formatError, formatWarning } from "./error-formatter.js";

export function displayErrors(errors: readonly FlowError[]): void {
  for (const error of errors) {
    console.error(formatError(error));
  }
}

export function displayWarnings(warnings: readonly FlowError[]): void {
  for (const warning of warnings) {
    console.error(formatWarning(warning));
  }
}

/**
 * Info messages are progress notes and print without decoration
 */
export function displayInfos(infos: readonly FlowError[]): void {
  for (const info of infos) {
    console.error(info.message);
  }
}

/**
 * Print messages of any severity in the order they were produced; info
 * messages only when verbose
 */
export function displayMessages(
  messages: readonly FlowError[],
  verbose: boolean,
): void {
  for (const message of messages) {
    switch (message.severity) {
      case Severity.Error:
        displayErrors([message]);
        break;
      case Severity.Warning:
        displayWarnings([message]);
        break;
      case Severity.Info:
        if (verbose) {
          displayInfos([message]);
        }
        break;
    }
  }
}

export async function writeOutput(
  content: string,
  path?: string,
): Promise<void> {
  if (path) {
    await fs.writeFile(path, content.endsWith("\n") ? content : `${content}\n`);
  } else {
    console.log(content);
  }
}
