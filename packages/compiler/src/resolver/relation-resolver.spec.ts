import { describe, expect, it } from 'vitest';

import type { ClassDefinition } from '../definitions/model-definitions.js';
import { compileSchema } from '../pipeline/compile-schema.js';
import { schemaDocument } from '../testing/schema-documents.js';

const compile = (...documents: ReturnType<typeof schemaDocument>[]) =>
  compileSchema({ project: { name: 'app', documents } });

const classNamed = (result: ReturnType<typeof compile>, className: string): ClassDefinition | undefined => {
  const model = result.project.models.find((candidate) => candidate.className === className);
  return model?.kind === 'class' ? model : undefined;
};

const fieldOf = (result: ReturnType<typeof compile>, className: string, fieldName: string) =>
  classNamed(result, className)?.fields.find((field) => field.name === fieldName);

const messages = (result: ReturnType<typeof compile>) => result.diagnostics.map((event) => event.message);

const author = schemaDocument('author', ['class: Author', 'table: author', 'fields:', '  name: String']);

describe('resolveRelations', () => {
  it('synthesizes a foreign key after an object relation field', () => {
    const result = compile(
      author,
      schemaDocument('book', ['class: Book', 'table: book', 'fields:', '  author: Author?, relation']),
    );

    expect(messages(result)).toEqual([]);
    expect(classNamed(result, 'Book')?.fields.map((field) => field.name)).toEqual(['id', 'author', 'authorId']);
    expect(fieldOf(result, 'Book', 'author')).toMatchObject({
      shouldPersist: false,
      relation: {
        kind: 'object',
        targetClass: 'Author',
        targetModuleAlias: 'app',
        targetTable: 'author',
        foreignKeyField: 'authorId',
      },
    });
    expect(fieldOf(result, 'Book', 'authorId')).toEqual({
      name: 'authorId',
      type: { name: 'int', nullable: false, generics: [], category: 'scalar' },
      scope: 'all',
      shouldPersist: true,
      defaults: [],
      origin: 'synthesized',
      relation: {
        kind: 'foreignKey',
        parentTable: 'author',
        referencedField: 'id',
        onDelete: 'NoAction',
        onUpdate: 'NoAction',
        relationField: 'author',
        relationFieldOwner: 'Book',
      },
    });
  });

  it('makes the synthesized key nullable for optional relations', () => {
    const result = compile(
      author,
      schemaDocument('book', ['class: Book', 'table: book', 'fields:', '  author: Author?, relation(optional)']),
    );

    expect(fieldOf(result, 'Book', 'authorId')?.type.nullable).toBe(true);
  });

  it('attaches the foreign key to an explicitly named field', () => {
    const result = compile(
      author,
      schemaDocument('book', [
        'class: Book',
        'table: book',
        'fields:',
        '  authorId: int',
        '  author: Author?, relation(field=authorId, onDelete=Cascade)',
      ]),
    );

    expect(messages(result)).toEqual([]);
    expect(classNamed(result, 'Book')?.fields.map((field) => field.name)).toEqual(['id', 'authorId', 'author']);
    expect(fieldOf(result, 'Book', 'authorId')?.relation).toEqual({
      kind: 'foreignKey',
      parentTable: 'author',
      referencedField: 'id',
      onDelete: 'Cascade',
      onUpdate: 'NoAction',
      relationField: 'author',
      relationFieldOwner: 'Book',
    });
  });

  it('adds a hidden key to the element class of an unnamed list relation', () => {
    const result = compile(
      schemaDocument('company', ['class: Company', 'table: company', 'fields:', '  employees: List<Employee>?, relation']),
      schemaDocument('employee', ['class: Employee', 'table: employee', 'fields:', '  name: String']),
    );

    expect(messages(result)).toEqual([]);
    expect(fieldOf(result, 'Company', 'employees')?.relation).toEqual({
      kind: 'list',
      targetClass: 'Employee',
      targetModuleAlias: 'app',
      targetTable: 'employee',
      foreignKeyField: '_companyEmployeesCompanyId',
      implicitForeignKey: true,
    });
    expect(fieldOf(result, 'Employee', '_companyEmployeesCompanyId')).toEqual({
      name: '_companyEmployeesCompanyId',
      type: { name: 'int', nullable: true, generics: [], category: 'scalar' },
      scope: 'none',
      shouldPersist: true,
      defaults: [],
      origin: 'synthesized',
      relation: {
        kind: 'foreignKey',
        parentTable: 'company',
        referencedField: 'id',
        onDelete: 'NoAction',
        onUpdate: 'NoAction',
        relationField: 'employees',
        relationFieldOwner: 'Company',
      },
    });
  });

  it('pairs a named one-to-one relation with the side declaring the key', () => {
    const result = compile(
      schemaDocument('address', ['class: Address', 'table: address', 'fields:', '  user: User?, relation(name=user_address)']),
      schemaDocument('user', [
        'class: User',
        'table: app_user',
        'fields:',
        '  addressId: int?',
        '  address: Address?, relation(name=user_address, field=addressId)',
      ]),
    );

    expect(messages(result)).toEqual([]);
    expect(fieldOf(result, 'Address', 'user')).toMatchObject({
      shouldPersist: false,
      relation: {
        kind: 'object',
        name: 'user_address',
        targetClass: 'User',
        targetTable: 'app_user',
        targetForeignKeyField: 'addressId',
      },
    });
    expect(fieldOf(result, 'User', 'addressId')?.relation).toMatchObject({
      kind: 'foreignKey',
      parentTable: 'address',
      relationField: 'address',
      relationFieldOwner: 'User',
    });
    expect(classNamed(result, 'Address')?.fields.map((field) => field.name)).toEqual(['id', 'user']);
  });

  it('records parent table relations on id fields', () => {
    const result = compile(
      schemaDocument('comment', [
        'class: Comment',
        'table: comment',
        'fields:',
        '  postId: int, relation(parent=post, onDelete=Cascade)',
      ]),
      schemaDocument('post', ['class: Post', 'table: post', 'fields:', '  title: String']),
    );

    expect(messages(result)).toEqual([]);
    expect(fieldOf(result, 'Comment', 'postId')?.relation).toEqual({
      kind: 'foreignKey',
      parentTable: 'post',
      referencedField: 'id',
      onDelete: 'Cascade',
      onUpdate: 'NoAction',
    });
  });

  it('requires a nullable key for SetNull', () => {
    const result = compile(
      schemaDocument('customer', ['class: Customer', 'table: customer']),
      schemaDocument('order', [
        'class: Order',
        'table: purchase',
        'fields:',
        '  customerId: int, relation(parent=customer, onDelete=SetNull)',
      ]),
    );

    expect(messages(result)).toEqual([
      'The "onDelete" value "SetNull" requires the field "customerId" to be nullable.',
    ]);
    expect(fieldOf(result, 'Order', 'customerId')?.relation).toBeUndefined();
  });

  it('requires nullable relation fields', () => {
    const result = compile(
      author,
      schemaDocument('book', ['class: Book', 'table: book', 'fields:', '  author: Author, relation']),
    );

    expect(result.diagnostics).toMatchObject([
      {
        message: 'The relation field "author" must be nullable.',
        code: 'relation.invalid',
        category: 'schema.relation',
        pointer: '/fields/author',
      },
    ]);
  });

  it('requires relation targets with a table', () => {
    const result = compile(
      schemaDocument('book', ['class: Book', 'table: book', 'fields:', '  note: Note?, relation']),
      schemaDocument('note', ['class: Note', 'fields:', '  text: String']),
    );

    expect(messages(result)).toEqual(['The relation target "Note" must be a class with a "table".']);
  });

  it('reports named relations without a counterpart', () => {
    const result = compile(
      author,
      schemaDocument('book', ['class: Book', 'table: book', 'fields:', '  author: Author?, relation(name=missing)']),
    );

    expect(result.diagnostics).toMatchObject([
      {
        message: 'No counterpart for the named relation "missing" was found on "Author".',
        code: 'relation.missing-counterpart',
      },
    ]);
    expect(classNamed(result, 'Book')?.fields.map((field) => field.name)).toEqual(['id', 'author']);
  });

  it('reports unknown parent tables', () => {
    const result = compile(
      schemaDocument('comment', ['class: Comment', 'table: comment', 'fields:', '  postId: int, relation(parent=nowhere)']),
    );

    expect(messages(result)).toEqual(['The parent table "nowhere" was not found.']);
  });
});
