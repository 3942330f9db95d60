/**
 * Configuration errors
 */

import { FlowError } from "../errors.js";

export enum ConfigErrorCode {
  CONFIG_INVALID = "CONFIG001",
  CONFIG_UNREADABLE = "CONFIG002",
}

export const ConfigErrorMessages = {
  [ConfigErrorCode.CONFIG_INVALID]: "Invalid configuration",
  [ConfigErrorCode.CONFIG_UNREADABLE]: "Cannot read configuration",
};

export class ConfigError extends FlowError {
  constructor(code: ConfigErrorCode, message?: string) {
    const baseMessage = ConfigErrorMessages[code];
    const fullMessage = message ? `${baseMessage}: ${message}` : baseMessage;
    super(fullMessage, code);
  }
}
