/**
 * Textual signal expressions
 *
 * Grammar:
 *
 *   spec   := concat | const | ref
 *   concat := "{" spec ("," spec)* "}"      most significant part first
 *   const  := WIDTH? "'b" [01xz]+           most significant digit first
 *   ref    := NAME ("[" INT (":" INT)? "]")?
 *
 * Slices are written `[msb:lsb]`. The resulting SigSpec is LSB first.
 */

import { SigBit, type SigSpec, type Wire } from "./spec/index.js";
import { Error, ErrorCode } from "./errors.js";

export type WireLookup = (name: string) => Wire | undefined;

type Token =
  | { kind: "name"; text: string }
  | { kind: "int"; value: number }
  | { kind: "const"; width?: number; digits: string }
  | { kind: "punct"; text: "{" | "}" | "[" | "]" | ":" | "," };

const NAME = /^[A-Za-z_$\\][^\s[\]{},:']*/;
const CONST = /^(\d+)?'[bB]([01xzXZ_]+)/;
const INT = /^\d+/;

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let rest = source.trim();

  while (rest.length > 0) {
    const head = rest[0];
    let match: RegExpMatchArray | null;

    if (
      head === "{" ||
      head === "}" ||
      head === "[" ||
      head === "]" ||
      head === ":" ||
      head === ","
    ) {
      tokens.push({ kind: "punct", text: head });
      rest = rest.slice(1);
    } else if ((match = rest.match(CONST))) {
      tokens.push({
        kind: "const",
        width: match[1] === undefined ? undefined : Number(match[1]),
        digits: match[2].replace(/_/g, "").toLowerCase(),
      });
      rest = rest.slice(match[0].length);
    } else if ((match = rest.match(INT))) {
      tokens.push({ kind: "int", value: Number(match[0]) });
      rest = rest.slice(match[0].length);
    } else if ((match = rest.match(NAME))) {
      tokens.push({ kind: "name", text: match[0] });
      rest = rest.slice(match[0].length);
    } else {
      throw new Error(
        ErrorCode.SIGSPEC_SYNTAX,
        `unexpected '${head}' in "${source}"`,
      );
    }

    rest = rest.trimStart();
  }

  return tokens;
}

class SigSpecParser {
  private position = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: Token[],
    private readonly lookup: WireLookup,
  ) {}

  parse(): SigSpec {
    const spec = this.spec();
    if (this.position < this.tokens.length) {
      this.fail("unexpected trailing input");
    }
    return spec;
  }

  private spec(): SigSpec {
    const token = this.next();

    switch (token.kind) {
      case "punct":
        if (token.text === "{") {
          return this.concat();
        }
        return this.fail(`unexpected '${token.text}'`);
      case "const":
        return this.constant(token.digits, token.width);
      case "name":
        return this.ref(token.text);
      case "int":
        return this.fail(`unexpected number ${token.value}`);
    }
  }

  private concat(): SigSpec {
    const parts: SigSpec[] = [this.spec()];
    while (this.accept(",")) {
      parts.push(this.spec());
    }
    this.expect("}");

    // Parts are written MSB first; the result is LSB first
    return parts.reverse().flat();
  }

  private constant(digits: string, width = digits.length): SigSpec {
    const bits: SigSpec = [];
    for (let i = digits.length - 1; i >= 0 && bits.length < width; i--) {
      const value = digits[i];
      if (!SigBit.isState(value)) {
        return this.fail(`invalid constant digit '${value}'`);
      }
      bits.push(SigBit.constant(value));
    }
    // An x or z in the top digit extends, anything else pads with 0
    const top = digits[0];
    const fill = top === "x" || top === "z" ? top : "0";
    while (bits.length < width) {
      bits.push(SigBit.constant(fill));
    }
    return bits;
  }

  private ref(name: string): SigSpec {
    const wire = this.lookup(name);
    if (!wire) {
      throw new Error(ErrorCode.UNKNOWN_WIRE, name, { wire: name });
    }

    if (!this.accept("[")) {
      return Array.from({ length: wire.width }, (_, offset) =>
        SigBit.of(wire, offset),
      );
    }

    const msb = this.integer();
    const lsb = this.accept(":") ? this.integer() : msb;
    this.expect("]");

    if (lsb > msb) {
      return this.fail(`slice ${name}[${msb}:${lsb}] must be written [msb:lsb]`);
    }
    if (msb >= wire.width) {
      return this.fail(
        `bit ${msb} out of range for ${name} of width ${wire.width}`,
      );
    }

    const bits: SigSpec = [];
    for (let offset = lsb; offset <= msb; offset++) {
      bits.push(SigBit.of(wire, offset));
    }
    return bits;
  }

  private integer(): number {
    const token = this.next();
    if (token.kind !== "int") {
      return this.fail("expected bit index");
    }
    return token.value;
  }

  private accept(text: string): boolean {
    const token = this.tokens[this.position];
    if (token?.kind === "punct" && token.text === text) {
      this.position++;
      return true;
    }
    return false;
  }

  private expect(text: string): void {
    if (!this.accept(text)) {
      this.fail(`expected '${text}'`);
    }
  }

  private next(): Token {
    const token = this.tokens[this.position];
    if (!token) {
      return this.fail("unexpected end of expression");
    }
    this.position++;
    return token;
  }

  private fail(reason: string): never {
    throw new Error(ErrorCode.SIGSPEC_SYNTAX, `${reason} in "${this.source}"`);
  }
}

/**
 * Parse a signal expression against the wires of a module
 */
export function parseSigSpec(source: string, lookup: WireLookup): SigSpec {
  return new SigSpecParser(source, tokenize(source), lookup).parse();
}
