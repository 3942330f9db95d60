/**
 * Custom matchers for analysis results
 *
 *   expect(result).toHaveMessage({
 *     severity: Severity.Warning,
 *     code: "GRAPH101",
 *     message: "driven by",
 *   });
 *
 * `message` matches as a substring.
 */

import { expect } from "vitest";

import type { FlowError } from "../src/errors.js";
import { Result, Severity } from "../src/result.js";

export interface MessageExpectation {
  severity?: Severity;
  code?: string;
  message?: string;
}

function isResult(value: unknown): value is Result<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "success" in value &&
    "messages" in value
  );
}

function describeMessage(message: FlowError): string {
  return `${message.severity}[${message.code}]: ${message.message}`;
}

expect.extend({
  toHaveMessage(received: unknown, expected: MessageExpectation) {
    if (!isResult(received)) {
      return {
        pass: false,
        message: () => "expected an analysis Result",
      };
    }

    const messages = Result.messages(received);
    const pass = messages.some(
      (message) =>
        (expected.severity === undefined ||
          message.severity === expected.severity) &&
        (expected.code === undefined || message.code === expected.code) &&
        (expected.message === undefined ||
          message.message.includes(expected.message)),
    );

    const listed =
      messages.length > 0
        ? messages.map(describeMessage).join("\n  ")
        : "(no messages)";

    return {
      pass,
      message: () =>
        pass
          ? `expected result not to have message ${JSON.stringify(expected)}`
          : `expected result to have message ${JSON.stringify(expected)}, got:\n  ${listed}`,
    };
  },
});

interface CustomMatchers<R = unknown> {
  toHaveMessage(expected: MessageExpectation): R;
}

declare module "vitest" {
  // eslint-disable-next-line @typescript-eslint/no-empty-object-type
  interface Assertion<T> extends CustomMatchers<T> {}
  // eslint-disable-next-line @typescript-eslint/no-empty-object-type
  interface AsymmetricMatchersContaining extends CustomMatchers {}
}
