import type { FlowError, Locus } from "../errors.js";

function formatLocus(locus: Locus | undefined): string {
  if (!locus) {
    return "";
  }
  const parts: string[] = [];
  if (locus.module) parts.push(`module ${locus.module}`);
  if (locus.cell) parts.push(`cell ${locus.cell}`);
  if (locus.wire) parts.push(`wire ${locus.wire}`);
  return parts.length > 0 ? ` (${parts.join(", ")})` : "";
}

/**
 * `error[GRAPH002] (module top, cell g1): message`
 */
export function formatError(error: FlowError): string {
  return `error[${error.code}]${formatLocus(error.locus)}: ${error.message}`;
}

export function formatWarning(warning: FlowError): string {
  return `warning[${warning.code}]${formatLocus(warning.locus)}: ${warning.message}`;
}
