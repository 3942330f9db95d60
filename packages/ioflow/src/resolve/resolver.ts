/**
 * Input dependency resolution
 *
 * Computes, for a bit of a module, the set of primary-input bits reachable
 * backward through the fan-in graph. Results are memoized per bit for the
 * lifetime of the resolver, so shared fan-in cones are expanded once.
 */

import { Module, SigBit, Wire } from "../netlist/index.js";
import type { FanIn } from "../graph/index.js";
import { Result } from "../result.js";
import { ResolveError } from "./errors.js";

export type Dependencies = readonly SigBit.OfWire[];

export interface OutputDependency {
  bit: SigBit.OfWire;
  /** Primary-input bits, sorted by wire name then offset */
  dependencies: Dependencies;
}

interface Frame {
  bit: SigBit;
  key: string;
  drivers: readonly SigBit[];
  next: number;
}

export class DependencyResolver {
  private readonly memo = new Map<string, Dependencies>();

  constructor(
    private readonly module: Module,
    private readonly fanIn: FanIn,
  ) {}

  /**
   * Resolved bits so far, keyed by `SigBit.key`
   */
  get resolved(): ReadonlyMap<string, Dependencies> {
    return this.memo;
  }

  resolve(bit: SigBit): Result<Dependencies, ResolveError> {
    const rootKey = SigBit.key(bit);
    const known = this.lookup(bit, rootKey);
    if (known) {
      return Result.ok(known);
    }

    // Post-order walk over the drivers; a frame is finished once every
    // driver has an entry in the memo
    const stack: Frame[] = [];
    const active = new Set<string>();
    const enter = (bit: SigBit, key: string): void => {
      stack.push({ bit, key, drivers: this.fanIn.drivers(bit), next: 0 });
      active.add(key);
    };

    enter(bit, rootKey);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];

      if (frame.next < frame.drivers.length) {
        const driver = frame.drivers[frame.next++];
        const key = SigBit.key(driver);

        if (active.has(key)) {
          return Result.err(this.cycle(stack, key, driver));
        }
        if (!this.lookup(driver, key)) {
          enter(driver, key);
        }
        continue;
      }

      stack.pop();
      active.delete(frame.key);
      this.memo.set(frame.key, this.union(frame.drivers));
    }

    return Result.ok(this.memo.get(rootKey) ?? []);
  }

  /**
   * Memo entry of a bit, filling it in first for the base cases
   */
  private lookup(bit: SigBit, key: string): Dependencies | undefined {
    const cached = this.memo.get(key);
    if (cached) {
      return cached;
    }

    let base: Dependencies | undefined;
    if (!SigBit.isWire(bit) || !this.module.wires.has(bit.wire.name)) {
      base = [];
    } else if (this.module.wires.get(bit.wire.name)?.input) {
      // Input-ness takes precedence over any recorded drivers
      base = [bit];
    } else if (!this.fanIn.has(bit)) {
      base = [];
    }

    if (base) {
      this.memo.set(key, base);
    }
    return base;
  }

  private union(drivers: readonly SigBit[]): Dependencies {
    const bits = new Map<string, SigBit.OfWire>();
    for (const driver of drivers) {
      for (const dependency of this.memo.get(SigBit.key(driver)) ?? []) {
        bits.set(SigBit.key(dependency), dependency);
      }
    }
    return [...bits.values()].sort(SigBit.compare);
  }

  private cycle(stack: Frame[], key: string, driver: SigBit): ResolveError {
    const start = stack.findIndex((frame) => frame.key === key);
    const path = stack.slice(start).map((frame) => SigBit.label(frame.bit));
    path.push(SigBit.label(driver));
    return new ResolveError(path, { module: this.module.name });
  }
}

/**
 * Resolve every output-port bit of a module with one shared memo, in port
 * order and LSB first
 */
export function resolveOutputs(
  module: Module,
  fanIn: FanIn,
): Result<OutputDependency[], ResolveError> {
  const resolver = new DependencyResolver(module, fanIn);
  const outputs: OutputDependency[] = [];

  for (const bit of Module.portWires(module, "output").flatMap(Wire.bits)) {
    const result = resolver.resolve(bit);
    if (!result.success) {
      return result;
    }
    outputs.push({ bit, dependencies: result.value });
  }

  return Result.ok(outputs);
}
