/**
 * Constructor of a generated model class.
 */
export type ModelConstructor<T = unknown> = abstract new (...args: never[]) => T;

/**
 * Requested type: a type expression such as `'List<Example?>'`, or a model constructor.
 */
export type TypeToken = string | ModelConstructor;

export interface ParsedTypeToken {
  readonly name: string;
  readonly nullable: boolean;
  readonly generics: readonly ParsedTypeToken[];
}

const NAME = /[A-Za-z_][A-Za-z0-9_.:]*/y;

/**
 * Parses `Name[<T, ...>][?]`, ignoring whitespace.
 *
 * @param text - Type expression.
 * @returns The parsed token, or `undefined` when the text is not a type expression.
 */
export function parseTypeToken(text: string): ParsedTypeToken | undefined {
  const source = text.replace(/\s+/g, '');
  let position = 0;

  const parse = (): ParsedTypeToken | undefined => {
    NAME.lastIndex = position;
    const match = NAME.exec(source);
    if (!match) {
      return undefined;
    }
    position += match[0].length;

    const generics: ParsedTypeToken[] = [];
    if (source.charAt(position) === '<') {
      do {
        position++;
        const generic = parse();
        if (!generic) {
          return undefined;
        }
        generics.push(generic);
      } while (source.charAt(position) === ',');
      if (source.charAt(position) !== '>') {
        return undefined;
      }
      position++;
    }

    const nullable = source.charAt(position) === '?';
    if (nullable) {
      position++;
    }
    return { name: match[0], nullable, generics };
  };

  const token = parse();
  return token && position === source.length ? token : undefined;
}

export function formatTypeToken(token: ParsedTypeToken): string {
  const generics =
    token.generics.length > 0 ? `<${token.generics.map((generic) => formatTypeToken(generic)).join(',')}>` : '';
  return `${token.name}${generics}${token.nullable ? '?' : ''}`;
}

export function describeTypeToken(token: TypeToken): string {
  return typeof token === 'string' ? token : token.name;
}
