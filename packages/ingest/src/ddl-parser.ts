import { AppError, ErrorCode } from "@colframe/shared";

import {
  arrayType,
  binaryType,
  booleanType,
  byteType,
  type DataType,
  dateType,
  dayTimeIntervalType,
  decimalType,
  doubleType,
  floatType,
  intType,
  longType,
  mapType,
  MAX_DECIMAL_PRECISION,
  nullType,
  shortType,
  stringType,
  type StructField,
  structField,
  structType,
  timestampNtzType,
  timestampType,
} from "./types";

type TokenKind = "ident" | "quoted" | "number" | "string" | "symbol" | "end";

interface Token {
  kind: TokenKind;
  text: string;
  position: number;
}

const PRIMITIVES: Record<string, DataType> = {
  boolean: booleanType,
  bool: booleanType,
  tinyint: byteType,
  byte: byteType,
  smallint: shortType,
  short: shortType,
  int: intType,
  integer: intType,
  bigint: longType,
  long: longType,
  float: floatType,
  real: floatType,
  double: doubleType,
  string: stringType,
  text: stringType,
  binary: binaryType,
  date: dateType,
  timestamp: timestampType,
  timestamp_ltz: timestampType,
  timestamp_ntz: timestampNtzType,
  void: nullType,
  null: nullType,
};

const DECIMAL_NAMES = new Set(["decimal", "dec", "numeric"]);
const SIZED_STRING_NAMES = new Set(["char", "varchar"]);
const SYMBOLS = new Set(["<", ">", "(", ")", ",", ":"]);

class ParseFailure extends Error {
  constructor(readonly position: number) {
    super(`Unexpected input at position ${position}`);
  }
}

function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < input.length) {
    const ch = input.charAt(i);

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (SYMBOLS.has(ch)) {
      tokens.push({ kind: "symbol", text: ch, position: i });
      i++;
      continue;
    }

    if (ch === "`") {
      const start = i;
      let text = "";
      i++;
      for (;;) {
        if (i >= input.length) {
          throw new ParseFailure(start);
        }
        const c = input.charAt(i);
        if (c === "`") {
          if (input.charAt(i + 1) === "`") {
            text += "`";
            i += 2;
            continue;
          }
          i++;
          break;
        }
        text += c;
        i++;
      }
      tokens.push({ kind: "quoted", text, position: start });
      continue;
    }

    if (ch === "'" || ch === '"') {
      const start = i;
      const end = input.indexOf(ch, i + 1);
      if (end < 0) {
        throw new ParseFailure(start);
      }
      tokens.push({ kind: "string", text: input.slice(i + 1, end), position: start });
      i = end + 1;
      continue;
    }

    const word = /^[A-Za-z_][A-Za-z0-9_]*/.exec(input.slice(i));
    if (word) {
      tokens.push({ kind: "ident", text: word[0], position: i });
      i += word[0].length;
      continue;
    }

    const number = /^\d+/.exec(input.slice(i));
    if (number) {
      tokens.push({ kind: "number", text: number[0], position: i });
      i += number[0].length;
      continue;
    }

    throw new ParseFailure(i);
  }

  tokens.push({ kind: "end", text: "", position: input.length });
  return tokens;
}

class DdlParser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  private peek(): Token {
    const token = this.tokens[this.index];
    if (!token) {
      throw new ParseFailure(this.tokens.at(-1)?.position ?? 0);
    }
    return token;
  }

  private next(): Token {
    const token = this.peek();
    this.index++;
    return token;
  }

  private isSymbol(symbol: string): boolean {
    const token = this.peek();
    return token.kind === "symbol" && token.text === symbol;
  }

  private isKeyword(keyword: string): boolean {
    const token = this.peek();
    return token.kind === "ident" && token.text.toLowerCase() === keyword;
  }

  private expectSymbol(symbol: string): void {
    const token = this.next();
    if (token.kind !== "symbol" || token.text !== symbol) {
      throw new ParseFailure(token.position);
    }
  }

  private expectKeyword(keyword: string): void {
    const token = this.next();
    if (token.kind !== "ident" || token.text.toLowerCase() !== keyword) {
      throw new ParseFailure(token.position);
    }
  }

  private expectNumber(): number {
    const token = this.next();
    if (token.kind !== "number") {
      throw new ParseFailure(token.position);
    }
    return Number.parseInt(token.text, 10);
  }

  expectEnd(): void {
    const token = this.peek();
    if (token.kind !== "end") {
      throw new ParseFailure(token.position);
    }
  }

  parseFieldList(): StructField[] {
    const fields = [this.parseField()];
    while (this.isSymbol(",")) {
      this.next();
      fields.push(this.parseField());
    }
    return fields;
  }

  private parseField(): StructField {
    const nameToken = this.next();
    if (nameToken.kind !== "ident" && nameToken.kind !== "quoted") {
      throw new ParseFailure(nameToken.position);
    }
    if (this.isSymbol(":")) {
      this.next();
    }
    const type = this.parseType();

    let nullable = true;
    if (this.isKeyword("not")) {
      this.next();
      this.expectKeyword("null");
      nullable = false;
    }
    if (this.isKeyword("comment")) {
      this.next();
      const comment = this.next();
      if (comment.kind !== "string") {
        throw new ParseFailure(comment.position);
      }
    }
    return structField(nameToken.text, type, nullable);
  }

  parseType(): DataType {
    const token = this.next();
    if (token.kind !== "ident") {
      throw new ParseFailure(token.position);
    }
    const name = token.text.toLowerCase();

    if (name === "array") {
      this.expectSymbol("<");
      const element = this.parseType();
      this.expectSymbol(">");
      return arrayType(element);
    }

    if (name === "map") {
      this.expectSymbol("<");
      const key = this.parseType();
      this.expectSymbol(",");
      const value = this.parseType();
      this.expectSymbol(">");
      return mapType(key, value);
    }

    if (name === "struct") {
      this.expectSymbol("<");
      if (this.isSymbol(">")) {
        this.next();
        return structType();
      }
      const fields = this.parseFieldList();
      this.expectSymbol(">");
      return structType(fields);
    }

    if (DECIMAL_NAMES.has(name)) {
      if (!this.isSymbol("(")) {
        return decimalType(10, 0);
      }
      this.next();
      const precision = this.expectNumber();
      let scale = 0;
      if (this.isSymbol(",")) {
        this.next();
        scale = this.expectNumber();
      }
      this.expectSymbol(")");
      if (precision < 1 || precision > MAX_DECIMAL_PRECISION || scale > precision) {
        throw new ParseFailure(token.position);
      }
      return decimalType(precision, scale);
    }

    if (SIZED_STRING_NAMES.has(name)) {
      this.expectSymbol("(");
      this.expectNumber();
      this.expectSymbol(")");
      return stringType;
    }

    if (name === "interval") {
      this.expectKeyword("day");
      this.expectKeyword("to");
      this.expectKeyword("second");
      return dayTimeIntervalType;
    }

    const primitive = PRIMITIVES[name];
    if (!primitive) {
      throw new ParseFailure(token.position);
    }
    return primitive;
  }
}

/**
 * Parses a schema string into a type.
 *
 * Accepts a column list (`a INT, b STRING NOT NULL`, optionally `a: int`),
 * which yields a struct, or a single type (`bigint`, `array<int>`,
 * `struct<a:int,b:string>`).
 *
 * @throws AppError INVALID_SCHEMA_DDL
 */
export function parseDdl(ddl: string): DataType {
  let tokens: Token[];
  try {
    tokens = tokenize(ddl);
  } catch (error) {
    throw toDdlError(error);
  }

  try {
    const parser = new DdlParser(tokens);
    const fields = parser.parseFieldList();
    parser.expectEnd();
    return structType(fields);
  } catch (fieldListError) {
    if (!(fieldListError instanceof ParseFailure)) {
      throw fieldListError;
    }
    try {
      const parser = new DdlParser(tokens);
      const type = parser.parseType();
      parser.expectEnd();
      return type;
    } catch (typeError) {
      // Report whichever attempt got further into the input.
      const furthest =
        typeError instanceof ParseFailure &&
        typeError.position > fieldListError.position
          ? typeError
          : fieldListError;
      throw toDdlError(typeError instanceof ParseFailure ? furthest : typeError);
    }
  }
}

function toDdlError(error: unknown): unknown {
  if (!(error instanceof ParseFailure)) {
    return error;
  }
  return new AppError(
    ErrorCode.INVALID_SCHEMA_DDL,
    error,
    { operation: "parseDdl" },
    { position: error.position },
  );
}
