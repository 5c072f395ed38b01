import { classifyBuiltin } from '../definitions/type-catalog.js';
import type { TypeDefinition } from '../definitions/type-definition.js';
import type { TypeExpression } from './type-expression.js';

export type TypeProblemReporter = (message: string, expression: TypeExpression) => void;

/**
 * Classifies a parsed type token against the built-in catalog. Names outside the catalog stay
 * `unresolved`, keeping any `module:` alias as the requested module.
 *
 * @param expression - Parsed type token.
 * @param report - Receives every structural problem with the offending sub-expression.
 * @returns The type, or `undefined` when any part of it is malformed.
 */
export function buildTypeDefinition(
  expression: TypeExpression,
  report: TypeProblemReporter,
): TypeDefinition | undefined {
  const generics: TypeDefinition[] = [];
  let valid = true;
  for (const generic of expression.generics) {
    const built = buildTypeDefinition(generic, report);
    if (built) {
      generics.push(built);
    } else {
      valid = false;
    }
  }

  const builtin = classifyBuiltin(expression.name);
  const base = { name: expression.name, nullable: expression.nullable, generics };

  if (builtin && expression.moduleAlias !== undefined) {
    report(`The built-in type "${expression.name}" cannot be prefixed with a module.`, expression);
    return undefined;
  }

  if (!builtin) {
    if (expression.generics.length > 0) {
      report(`The type "${expression.name}" does not take generic arguments.`, expression);
      return undefined;
    }
    if (expression.dimension !== undefined) {
      report(`The type "${expression.name}" does not take a dimension.`, expression);
      return undefined;
    }
    return valid
      ? {
          ...base,
          category: 'unresolved',
          ...(expression.moduleAlias === undefined ? {} : { moduleAlias: expression.moduleAlias }),
        }
      : undefined;
  }

  switch (builtin.category) {
    case 'scalar': {
      if (expression.generics.length > 0) {
        report(`The type "${expression.name}" does not take generic arguments.`, expression);
        return undefined;
      }
      if (expression.dimension !== undefined) {
        report(`The type "${expression.name}" does not take a dimension.`, expression);
        return undefined;
      }
      return { ...base, category: 'scalar' };
    }
    case 'vector': {
      if (expression.generics.length > 0) {
        report(`The type "${expression.name}" does not take generic arguments.`, expression);
        return undefined;
      }
      if (expression.dimension === undefined || expression.dimension <= 0) {
        report(
          `The type "${expression.name}" requires a positive dimension, e.g. "${expression.name}(512)".`,
          expression,
        );
        return undefined;
      }
      return { ...base, category: 'vector', dimension: expression.dimension };
    }
    case 'container': {
      if (expression.dimension !== undefined) {
        report(`The type "${expression.name}" does not take a dimension.`, expression);
        return undefined;
      }
      if (expression.generics.length !== builtin.arity) {
        const noun = builtin.arity === 1 ? 'argument' : 'arguments';
        report(
          `The type "${expression.name}" requires exactly ${builtin.arity} generic ${noun}.`,
          expression,
        );
        return undefined;
      }
      return valid ? { ...base, category: 'container' } : undefined;
    }
  }
}
