/**
 * Recognized primitive gate kinds and their port role contracts
 */

export const Primitives = [
  "BUF",
  "NOT",
  "AND",
  "NAND",
  "OR",
  "NOR",
  "XOR",
  "XNOR",
  "ANDNOT",
  "ORNOT",
  "MUX",
  "NMUX",
  "AOI3",
  "OAI3",
  "AOI4",
  "OAI4",
] as const;

export type Primitive = (typeof Primitives)[number];

export interface RoleContract {
  /** Single-bit input roles */
  inputs: readonly string[];
  /** Single-bit output role */
  output: string;
}

const UNARY: RoleContract = { inputs: ["A"], output: "Y" };
const BINARY: RoleContract = { inputs: ["A", "B"], output: "Y" };
const SELECT: RoleContract = { inputs: ["A", "B", "S"], output: "Y" };
const TERNARY: RoleContract = { inputs: ["A", "B", "C"], output: "Y" };
const QUATERNARY: RoleContract = { inputs: ["A", "B", "C", "D"], output: "Y" };

export const RoleContracts: Record<Primitive, RoleContract> = {
  BUF: UNARY,
  NOT: UNARY,
  AND: BINARY,
  NAND: BINARY,
  OR: BINARY,
  NOR: BINARY,
  XOR: BINARY,
  XNOR: BINARY,
  ANDNOT: BINARY,
  ORNOT: BINARY,
  MUX: SELECT,
  NMUX: SELECT,
  AOI3: TERNARY,
  OAI3: TERNARY,
  AOI4: QUATERNARY,
  OAI4: QUATERNARY,
};

/**
 * Primitive set recognized unless configured otherwise
 */
export const defaultPrimitives: readonly Primitive[] = [
  "NOT",
  "AND",
  "OR",
  "XOR",
  "MUX",
];

export function isPrimitive(name: string): name is Primitive {
  return Primitives.some((primitive) => primitive === name);
}

/**
 * Gate kind named by a cell type such as `$_AND_`
 */
export function primitiveOf(cellType: string): Primitive | undefined {
  const name = cellType.match(/^\$_([A-Z0-9]+)_$/)?.[1];
  if (name === undefined || !isPrimitive(name)) {
    return undefined;
  }
  return name;
}

export function cellTypeOf(primitive: Primitive): string {
  return `$_${primitive}_`;
}
