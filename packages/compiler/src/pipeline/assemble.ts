import { isAnalyzedClass, type AnalyzedEntity, type FieldDraft } from '../analyzer/analyzed-entity.js';
import type {
  DefaultValueDefinition,
  SerializableModelDefinition,
  SerializableModelFieldDefinition,
} from '../definitions/model-definitions.js';

/**
 * Builds the final definition of an entity from its drafts.
 *
 * @param entity - Entity carried through the pipeline.
 * @returns The model definition consumed by generators.
 */
export function assembleDefinition(entity: AnalyzedEntity): SerializableModelDefinition {
  if (isAnalyzedClass(entity)) {
    return {
      ...entity.definition,
      fields: entity.fields.map((field) => toFieldDefinition(field)),
      indexes: [...(entity.resolvedIndexes ?? [])],
    };
  }
  const definition = entity.definition;
  if (definition.kind === 'exception') {
    return { ...definition, fields: entity.fields.map((field) => toFieldDefinition(field)) };
  }
  return definition;
}

export function toFieldDefinition(draft: FieldDraft): SerializableModelFieldDefinition {
  const defaults: DefaultValueDefinition[] = [];
  if (draft.defaultModel) {
    defaults.push({ origin: 'model', value: draft.defaultModel.value });
  }
  if (draft.defaultPersist) {
    defaults.push({ origin: 'persist', value: draft.defaultPersist.value });
  }

  return {
    name: draft.name,
    type: draft.type,
    scope: draft.hidden ? 'none' : draft.scope,
    shouldPersist: draft.shouldPersist,
    defaults,
    origin: draft.origin,
    ...(draft.relation ? { relation: draft.relation } : {}),
    ...(draft.documentation ? { documentation: draft.documentation } : {}),
  };
}
