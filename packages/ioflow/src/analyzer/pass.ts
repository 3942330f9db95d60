import type { Result } from "../result.js";
import type { FlowError } from "../errors.js";

export type PassConfig = {
  needs: unknown;
  adds: unknown;
  error: FlowError;
};

export type Needs<C extends PassConfig> = C["needs"];
export type Adds<C extends PassConfig> = C["adds"];
export type PassError<C extends PassConfig> = C["error"];

export interface Pass<C extends PassConfig = PassConfig> {
  run: Run<C>;
}

/**
 * An analysis pass is a pure function that transforms input to output
 * and may produce messages (errors/warnings/info)
 */
export type Run<C extends PassConfig> = (
  input: Needs<C>,
) => Promise<Result<Adds<C>, PassError<C>>>;
