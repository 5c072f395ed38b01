import { describe, expect, it } from 'vitest';

import { schemaDocument } from '../testing/schema-documents.js';
import { compileSchema } from './compile-schema.js';
import { columnTypeOf, createTableDefinitions } from './table-definitions.js';

const author = schemaDocument('author', ['class: Author', 'table: author', 'fields:', '  name: String']);

const status = (serialized?: string) =>
  schemaDocument('status', [
    'enum: Status',
    ...(serialized ? [`serialized: ${serialized}`] : []),
    'values:',
    '  - draft',
    '  - published',
  ]);

const article = schemaDocument('article', [
  'class: Article',
  'table: article',
  'fields:',
  `  title: String, default='Untitled'`,
  '  status: Status, default=published',
  '  timeout: Duration, default=2h',
  '  createdAt: DateTime, default=now',
  '  token: UuidValue, default=random',
  '  score: double?',
  '  author: Author?, relation(onDelete=Cascade)',
  'indexes:',
  '  title_idx:',
  '    fields: title',
]);

describe('columnTypeOf', () => {
  it('maps scalars, vectors and enums to column types', () => {
    expect(columnTypeOf({ name: 'int', nullable: false, generics: [], category: 'scalar' })).toBe('bigint');
    expect(columnTypeOf({ name: 'ByteData', nullable: true, generics: [], category: 'scalar' })).toBe('bytea');
    expect(columnTypeOf({ name: 'HalfVector', nullable: false, generics: [], category: 'vector', dimension: 16 })).toBe(
      'halfvec(16)',
    );
    expect(
      columnTypeOf({
        name: 'Status',
        nullable: false,
        generics: [],
        category: 'entity',
        entityKind: 'enum',
        enumSerialization: 'byName',
      }),
    ).toBe('text');
    expect(
      columnTypeOf({
        name: 'List',
        nullable: false,
        generics: [{ name: 'int', nullable: false, generics: [], category: 'scalar' }],
        category: 'container',
      }),
    ).toBe('json');
  });
});

describe('createTableDefinitions', () => {
  it('projects persisted fields, foreign keys and indexes', () => {
    const result = compileSchema({ project: { name: 'app', documents: [article, author, status()] } });

    expect(result.diagnostics).toEqual([]);
    const [articleTable, authorTable] = createTableDefinitions(result.project);

    expect(articleTable).toEqual({
      name: 'article',
      module: 'app',
      managed: true,
      columns: [
        {
          name: 'id',
          columnType: 'bigint',
          isNullable: false,
          columnDefault: "nextval('article_id_seq'::regclass)",
        },
        { name: 'title', columnType: 'text', isNullable: false, columnDefault: "'Untitled'::text" },
        { name: 'status', columnType: 'bigint', isNullable: false, columnDefault: '1' },
        { name: 'timeout', columnType: 'bigint', isNullable: false, columnDefault: '7200000' },
        {
          name: 'createdAt',
          columnType: 'timestamp without time zone',
          isNullable: false,
          columnDefault: 'CURRENT_TIMESTAMP',
        },
        { name: 'token', columnType: 'uuid', isNullable: false, columnDefault: 'gen_random_uuid()' },
        { name: 'score', columnType: 'double precision', isNullable: true },
        { name: 'authorId', columnType: 'bigint', isNullable: false },
      ],
      foreignKeys: [
        {
          constraintName: 'article_fk_0',
          columns: ['authorId'],
          referenceTable: 'author',
          referenceColumns: ['id'],
          onDelete: 'Cascade',
          onUpdate: 'NoAction',
        },
      ],
      indexes: [
        { indexName: 'article_pkey', elements: ['id'], type: 'btree', isUnique: true, isPrimary: true },
        { indexName: 'title_idx', elements: ['title'], type: 'btree', isUnique: false, isPrimary: false },
      ],
    });
    expect(authorTable?.name).toBe('author');
  });

  it('skips classes without a table and enums', () => {
    const result = compileSchema({
      project: {
        name: 'app',
        documents: [author, status(), schemaDocument('note', ['class: Note', 'fields:', '  text: String'])],
      },
    });

    expect(createTableDefinitions(result.project).map((table) => table.name)).toEqual(['author']);
  });

  it('stores enums serialized by name as text', () => {
    const result = compileSchema({ project: { name: 'app', documents: [article, author, status('byName')] } });
    const [articleTable] = createTableDefinitions(result.project);

    expect(articleTable?.columns.find((column) => column.name === 'status')).toEqual({
      name: 'status',
      columnType: 'text',
      isNullable: false,
      columnDefault: "'published'::text",
    });
  });
});
