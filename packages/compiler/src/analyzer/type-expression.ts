const MODULE_PREFIX = 'module:';
const IDENTIFIER = /[A-Za-z_][A-Za-z0-9_]*/y;
const INTEGER = /\d+/y;

/**
 * Type token as written in a field expression. Offsets are relative to the parsed text.
 */
export interface TypeExpression {
  readonly name: string;
  readonly moduleAlias?: string;
  readonly nullable: boolean;
  readonly dimension?: number;
  readonly generics: readonly TypeExpression[];
  readonly start: number;
  readonly end: number;
}

export interface TypeExpressionError {
  readonly message: string;
  readonly start: number;
  readonly end: number;
}

export type TypeExpressionResult =
  | { readonly ok: true; readonly expression: TypeExpression }
  | { readonly ok: false; readonly error: TypeExpressionError };

class TypeExpressionSyntaxError extends Error {
  constructor(
    message: string,
    readonly start: number,
    readonly end: number,
  ) {
    super(message);
    this.name = 'TypeExpressionSyntaxError';
  }
}

/**
 * Parses `['module:' alias ':'] Name ['(' Int ')'] ['<' type (',' type)* '>'] ['?']`.
 *
 * @param text - Type text.
 * @returns The parsed expression or the first syntax error.
 */
export function parseTypeExpression(text: string): TypeExpressionResult {
  const parser = new TypeExpressionParser(text);
  try {
    const expression = parser.parseType();
    parser.skipWhitespace();
    if (!parser.atEnd()) {
      throw new TypeExpressionSyntaxError(
        `Unexpected "${text.slice(parser.position)}" after type "${text.slice(expression.start, expression.end)}".`,
        parser.position,
        text.length,
      );
    }
    return { ok: true, expression };
  } catch (error) {
    if (error instanceof TypeExpressionSyntaxError) {
      return { ok: false, error: { message: error.message, start: error.start, end: error.end } };
    }
    throw error;
  }
}

class TypeExpressionParser {
  position = 0;

  constructor(private readonly text: string) {}

  atEnd(): boolean {
    return this.position >= this.text.length;
  }

  skipWhitespace(): void {
    while (!this.atEnd() && /\s/.test(this.text.charAt(this.position))) {
      this.position++;
    }
  }

  parseType(): TypeExpression {
    this.skipWhitespace();
    const start = this.position;
    const moduleAlias = this.parseModulePrefix();
    const name = this.expect(IDENTIFIER, 'Expected a type name.');
    let end = this.position;

    this.skipWhitespace();
    let dimension: number | undefined;
    if (this.peek('(')) {
      this.position++;
      this.skipWhitespace();
      dimension = Number.parseInt(this.expect(INTEGER, `Expected a dimension for "${name}".`), 10);
      this.skipWhitespace();
      this.consume(')', `Expected ")" to close the dimension of "${name}".`);
      end = this.position;
      this.skipWhitespace();
    }

    const generics: TypeExpression[] = [];
    if (this.peek('<')) {
      this.position++;
      generics.push(this.parseType());
      this.skipWhitespace();
      while (this.peek(',')) {
        this.position++;
        generics.push(this.parseType());
        this.skipWhitespace();
      }
      this.consume('>', `Expected ">" to close the generic arguments of "${name}".`);
      end = this.position;
      this.skipWhitespace();
    }

    const nullable = this.peek('?');
    if (nullable) {
      this.position++;
      end = this.position;
    }

    return {
      name,
      nullable,
      generics,
      start,
      end,
      ...(moduleAlias === undefined ? {} : { moduleAlias }),
      ...(dimension === undefined ? {} : { dimension }),
    };
  }

  private parseModulePrefix(): string | undefined {
    if (!this.text.startsWith(MODULE_PREFIX, this.position)) {
      return undefined;
    }
    this.position += MODULE_PREFIX.length;
    const alias = this.expect(IDENTIFIER, 'Expected a module alias after "module:".');
    this.consume(':', `Expected ":" after the module alias "${alias}".`);
    return alias;
  }

  private peek(character: string): boolean {
    return this.text.charAt(this.position) === character;
  }

  private consume(character: string, message: string): void {
    if (!this.peek(character)) {
      throw this.errorHere(message);
    }
    this.position++;
  }

  private expect(pattern: RegExp, message: string): string {
    pattern.lastIndex = this.position;
    const match = pattern.exec(this.text);
    if (!match) {
      throw this.errorHere(message);
    }
    this.position += match[0].length;
    return match[0];
  }

  private errorHere(message: string): TypeExpressionSyntaxError {
    return new TypeExpressionSyntaxError(
      message,
      this.position,
      Math.min(this.text.length, this.position + 1),
    );
  }
}
