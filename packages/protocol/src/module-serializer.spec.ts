import { describe, expect, it } from 'vitest';

import { createModuleSerializer, defineModel } from './module-serializer.js';

class Note {
  constructor(readonly text: string) {}
}

const serializer = createModuleSerializer({
  moduleName: 'notes',
  models: [
    defineModel({
      className: 'Note',
      type: Note,
      table: 'note',
      fromJson: (data) => new Note(String(data)),
      toJson: (value) => value.text,
    }),
  ],
});

describe('createModuleSerializer', () => {
  it('decodes its own classes and containers of them', () => {
    expect(serializer.deserialize('a', 'Note')).toEqual({ kind: 'found', value: new Note('a') });
    expect(serializer.deserialize(null, 'List<Note>?')).toEqual({ kind: 'found', value: null });
    expect(serializer.deserialize(['a', null], 'List<Note?>')).toEqual({
      kind: 'found',
      value: [new Note('a'), null],
    });
    expect(serializer.deserialize({ x: 'b' }, 'Map<String, Note>')).toEqual({
      kind: 'found',
      value: new Map([['x', new Note('b')]]),
    });
  });

  it('answers not-mine for foreign types', () => {
    expect(serializer.deserialize('a', 'Other')).toEqual({ kind: 'not-mine' });
    expect(serializer.deserialize(['a'], 'List<Other>')).toEqual({ kind: 'not-mine' });
    expect(serializer.deserialize('a', 'String')).toEqual({ kind: 'not-mine' });
    expect(serializer.deserializeByClassName({ className: 'Other', data: 'a' })).toEqual({ kind: 'not-mine' });
    expect(serializer.encode('plain')).toEqual({ kind: 'not-mine' });
  });

  it('throws when a recognized container receives the wrong shape', () => {
    expect(() => serializer.deserialize('not a list', 'List<Note>')).toThrow(
      'Expected a list of "Note" in module "notes".',
    );
  });

  it('returns no table when its definition was not supplied', () => {
    expect(serializer.tableForType(Note)).toBeUndefined();
  });

  it('names and encodes instances of its classes', () => {
    expect(serializer.classNameForObject(new Note('c'))).toBe('Note');
    expect(serializer.encode(new Note('c'))).toEqual({ kind: 'found', value: 'c' });
  });
});
