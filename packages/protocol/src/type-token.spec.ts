import { describe, expect, it } from 'vitest';

import { describeTypeToken, formatTypeToken, parseTypeToken } from './type-token.js';

describe('parseTypeToken', () => {
  it('parses nested generics and nullability', () => {
    expect(parseTypeToken('Map<String, List<Example?>>?')).toEqual({
      name: 'Map',
      nullable: true,
      generics: [
        { name: 'String', nullable: false, generics: [] },
        {
          name: 'List',
          nullable: false,
          generics: [{ name: 'Example', nullable: true, generics: [] }],
        },
      ],
    });
  });

  it('rejects malformed expressions', () => {
    expect(parseTypeToken('List<')).toBeUndefined();
    expect(parseTypeToken('List<String')).toBeUndefined();
    expect(parseTypeToken('String??')).toBeUndefined();
    expect(parseTypeToken('')).toBeUndefined();
  });

  it('formats tokens without whitespace', () => {
    const token = parseTypeToken('Map< String , int >');

    expect(token && formatTypeToken(token)).toBe('Map<String,int>');
  });
});

describe('describeTypeToken', () => {
  it('names constructors by their class name', () => {
    class Example {}

    expect(describeTypeToken(Example)).toBe('Example');
    expect(describeTypeToken('List<Example>')).toBe('List<Example>');
  });
});
