import { describe, expect, it, vi, type Mock } from 'vitest';

import { createDispatchRegistry } from './dispatch-registry.js';
import { DeserializationTypeNotFoundError, SerializationTypeNotFoundError } from './errors.js';
import { found, notMine, type LookupResult } from './lookup-result.js';
import { createModuleSerializer, defineModel, type ModuleSerializer } from './module-serializer.js';
import type { TableDefinition } from './table-definition.js';
import type { TypeToken } from './type-token.js';

class Example {
  constructor(readonly name: string) {}
}

class UserInfo {
  constructor(
    readonly id: number,
    readonly email: string,
  ) {}
}

class Session {
  constructor(readonly token: string) {}
}

const table = (name: string, module: string): TableDefinition => ({
  name,
  module,
  managed: true,
  columns: [{ name: 'id', columnType: 'bigint', isNullable: false }],
  foreignKeys: [],
  indexes: [],
});

const readName = (data: unknown): string => {
  if (typeof data === 'object' && data !== null && 'name' in data && typeof data.name === 'string') {
    return data.name;
  }
  throw new TypeError('name missing');
};

const appModule = createModuleSerializer({
  moduleName: 'app',
  models: [
    defineModel({
      className: 'Example',
      type: Example,
      table: 'example',
      fromJson: (data) => new Example(readName(data)),
      toJson: (value) => ({ name: value.name }),
    }),
  ],
  tableDefinitions: [table('example', 'app')],
});

const authModule = createModuleSerializer({
  moduleName: 'auth',
  models: [
    defineModel({
      className: 'UserInfo',
      type: UserInfo,
      table: 'auth_user',
      fromJson: (data) => {
        if (typeof data === 'object' && data !== null && 'id' in data && 'email' in data) {
          return new UserInfo(Number(data.id), String(data.email));
        }
        throw new TypeError('user info expected');
      },
      toJson: (value) => ({ id: value.id, email: value.email }),
    }),
  ],
  tableDefinitions: [table('auth_user', 'auth')],
});

const authSessionModule = createModuleSerializer({
  moduleName: 'auth.session',
  models: [
    defineModel({
      className: 'Session',
      type: Session,
      fromJson: (data) => new Session(String(data)),
      toJson: (value) => value.token,
    }),
  ],
});

type StubModule = ModuleSerializer & { deserialize: Mock<(data: unknown, type: TypeToken) => LookupResult> };

const stubModule = (moduleName: string, owns: string): StubModule => ({
  moduleName,
  tableDefinitions: [],
  deserialize: vi.fn<(data: unknown, type: TypeToken) => LookupResult>((data, type) =>
    type === owns ? found({ moduleName, data }) : notMine,
  ),
  deserializeByClassName: () => notMine,
  classNameForObject: () => undefined,
  encode: () => notMine,
  tableForType: () => undefined,
});

describe('createDispatchRegistry', () => {
  const registry = createDispatchRegistry({ root: appModule, modules: [authModule, authSessionModule] });

  it('round-trips root values through bare class names', () => {
    const record = registry.encodeWithClassName(new Example('root'));

    expect(record).toEqual({ className: 'Example', data: { name: 'root' } });
    expect(registry.classNameForObject(new Example('root'))).toBe('Example');
    expect(registry.deserializeByClassName(record)).toEqual(new Example('root'));
  });

  it('round-trips module values through namespaced class names', () => {
    const user = new UserInfo(7, 'user@example.test');
    const record = registry.encodeWithClassName(user);

    expect(registry.classNameForObject(user)).toBe('auth.UserInfo');
    expect(record).toEqual({ className: 'auth.UserInfo', data: { id: 7, email: 'user@example.test' } });
    expect(registry.deserializeByClassName(record)).toEqual(user);
  });

  it('strips the longest matching module prefix', () => {
    const value = registry.deserializeByClassName({ className: 'auth.session.Session', data: 'test-token' });

    expect(value).toEqual(new Session('test-token'));
    expect(registry.classNameForObject(new Session('x'))).toBe('auth.session.Session');
  });

  it('does not mutate the record it dispatches', () => {
    const record = { className: 'auth.UserInfo', data: { id: 1, email: 'a@example.test' } };

    registry.deserializeByClassName(record);

    expect(record.className).toBe('auth.UserInfo');
  });

  it('fails for a prefixed class name its module does not declare', () => {
    expect(() => registry.deserializeByClassName({ className: 'auth.Missing', data: {} })).toThrow(
      DeserializationTypeNotFoundError,
    );
  });

  it('treats unprefixed class names as root classes, then built-in scalars', () => {
    expect(registry.deserializeByClassName({ className: 'int', data: 3 })).toBe(3);
    expect(registry.deserializeByClassName({ className: 'DateTime', data: '2024-01-02T03:04:05.000Z' })).toEqual(
      new Date('2024-01-02T03:04:05.000Z'),
    );
    expect(() => registry.deserializeByClassName({ className: 'Nope', data: null })).toThrow(
      'No deserialization found for type "Nope".',
    );
  });

  it('deserializes by expected type across modules and built-in containers', () => {
    expect(registry.deserialize({ name: 'a' }, 'Example')).toEqual(new Example('a'));
    expect(registry.deserialize({ id: 2, email: 'b@example.test' }, UserInfo)).toEqual(
      new UserInfo(2, 'b@example.test'),
    );
    expect(registry.deserialize([{ name: 'a' }, null], 'List<Example?>')).toEqual([new Example('a'), null]);
    expect(registry.deserialize(null, 'Example?')).toBeNull();
    expect(registry.deserialize([[{ name: 'a' }]], 'List<List<Example>>')).toEqual([[new Example('a')]]);
    expect(registry.deserialize({ first: 1 }, 'Map<String, int>')).toEqual(new Map([['first', 1]]));
    expect(registry.deserialize([{ k: 1, v: 'one' }], 'Map<int, String>')).toEqual(new Map([[1, 'one']]));
    expect(registry.deserialize('12345678901234567890', 'BigInt')).toBe(12345678901234567890n);
  });

  it('decodes sets of scalars without consulting any module', () => {
    const root = stubModule('root', 'Never');
    const module = stubModule('first', 'Never');
    const local = createDispatchRegistry({ root, modules: [module] });

    expect(local.deserialize(['a', 'b', 'a'], 'Set<String>')).toEqual(new Set(['a', 'b']));
    expect(module.deserialize).not.toHaveBeenCalled();
    expect(root.deserialize).not.toHaveBeenCalled();
  });

  it('stops at the first module recognizing the type', () => {
    const modules = ['one', 'two', 'three', 'four', 'five'].map((name) =>
      stubModule(name, name === 'three' ? 'Target' : 'Never'),
    );
    const root = stubModule('root', 'Never');
    const local = createDispatchRegistry({ root, modules });

    const value = local.deserialize('payload', 'Target');

    expect(value).toEqual({ moduleName: 'three', data: 'payload' });
    expect(root.deserialize).toHaveBeenCalledTimes(1);
    expect(modules.map((module) => module.deserialize.mock.calls.length)).toEqual([1, 1, 1, 0, 0]);
  });

  it('asks the root before the modules for bare type names', () => {
    const modules = ['one', 'two'].map((name) => stubModule(name, 'Target'));
    const root = stubModule('root', 'Target');
    const local = createDispatchRegistry({ root, modules });

    expect(local.deserialize('payload', 'Target')).toEqual({ moduleName: 'root', data: 'payload' });
    expect(modules.map((module) => module.deserialize.mock.calls.length)).toEqual([0, 0]);
  });

  it('sends prefixed type names only to the named module', () => {
    const modules = [stubModule('one', 'Target'), stubModule('two', 'Target')];
    const root = stubModule('root', 'Target');
    const local = createDispatchRegistry({ root, modules });

    expect(local.deserialize('payload', 'two.Target')).toEqual({ moduleName: 'two', data: 'payload' });
    expect(modules[1]?.deserialize).toHaveBeenCalledWith('payload', 'Target');
    expect(modules[0]?.deserialize).not.toHaveBeenCalled();
    expect(root.deserialize).not.toHaveBeenCalled();
  });

  it('fails with DeserializationTypeNotFoundError when no module owns the type', () => {
    const modules = ['one', 'two', 'three'].map((name) => stubModule(name, 'Owned'));
    const root = stubModule('root', 'Owned');
    const local = createDispatchRegistry({ root, modules });

    expect(() => local.deserialize({}, 'Unknown')).toThrow(DeserializationTypeNotFoundError);
    for (const module of [...modules, root]) {
      expect(module.deserialize).toHaveBeenCalledTimes(1);
    }
  });

  it('propagates other module failures without trying later modules', () => {
    const failing: ModuleSerializer = {
      ...stubModule('failing', 'Never'),
      deserialize: () => {
        throw new RangeError('corrupt payload');
      },
    };
    const later = stubModule('later', 'Target');
    const local = createDispatchRegistry({ root: stubModule('root', 'Never'), modules: [failing, later] });

    expect(() => local.deserialize({}, 'Target')).toThrow(RangeError);
    expect(later.deserialize).not.toHaveBeenCalled();
  });

  describe('when the root and a module declare the same class name', () => {
    class AuthExample {
      constructor(readonly label: string) {}
    }

    const authWithExample = createModuleSerializer({
      moduleName: 'auth',
      models: [
        defineModel({
          className: 'Example',
          type: AuthExample,
          table: 'auth_example',
          fromJson: (data) => new AuthExample(String(data)),
          toJson: (value) => value.label,
        }),
      ],
      tableDefinitions: [table('auth_example', 'auth')],
    });
    const shadowed = createDispatchRegistry({ root: appModule, modules: [authWithExample] });

    it('resolves the bare name to the root class', () => {
      expect(shadowed.deserialize({ name: 'root' }, 'Example')).toEqual(new Example('root'));
      expect(shadowed.deserialize([{ name: 'root' }], 'List<Example>')).toEqual([new Example('root')]);
      expect(shadowed.tableForType('Example')?.name).toBe('example');
    });

    it('resolves the prefixed name to the module class, inside generics too', () => {
      expect(shadowed.deserialize('one', 'auth.Example')).toEqual(new AuthExample('one'));
      expect(shadowed.deserialize(null, 'auth.Example?')).toBeNull();
      expect(shadowed.deserialize(['a', 'b'], 'List<auth.Example>')).toEqual([
        new AuthExample('a'),
        new AuthExample('b'),
      ]);
      expect(shadowed.deserialize({ key: 'c' }, 'Map<String, auth.Example>')).toEqual(
        new Map([['key', new AuthExample('c')]]),
      );
      expect(shadowed.tableForType('auth.Example')?.name).toBe('auth_example');
    });

    it('fails for a prefixed name the module does not declare', () => {
      expect(() => shadowed.deserialize({}, 'auth.Missing')).toThrow(
        'No deserialization found for type "auth.Missing".',
      );
    });
  });

  it('looks tables up in module order and concatenates every table definition', () => {
    expect(registry.tableForType(UserInfo)?.name).toBe('auth_user');
    expect(registry.tableForType('Example')?.name).toBe('example');
    expect(registry.tableForType(Session)).toBeUndefined();
    expect(registry.allTableDefinitions().map((definition) => definition.name)).toEqual(['auth_user', 'example']);
  });

  it('names built-in scalars without a prefix', () => {
    expect(registry.classNameForObject('text')).toBe('String');
    expect(registry.classNameForObject(1.5)).toBe('double');
    expect(registry.classNameForObject({})).toBeUndefined();
    expect(registry.encodeWithClassName(10n)).toEqual({ className: 'BigInt', data: '10' });
  });

  it('refuses to encode values no module owns', () => {
    expect(() => registry.encodeWithClassName(new Map())).toThrow(SerializationTypeNotFoundError);
  });

  it('returns typed models from deserializeModel', () => {
    const example: Example = registry.deserializeModel({ name: 'typed' }, Example);

    expect(example.name).toBe('typed');
  });

  it('rejects duplicate module names', () => {
    expect(() => createDispatchRegistry({ root: appModule, modules: [authModule, authModule] })).toThrow(
      'The module "auth" is registered more than once.',
    );
  });

  it('is frozen', () => {
    expect(Object.isFrozen(registry)).toBe(true);
  });
});
