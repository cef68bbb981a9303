import { ModelDefinitionError } from "../errors/model-definition.error";
import { ListField } from "../fields/list-field";
import { ReferenceField } from "../fields/reference-field";
import type { ModelDefinition } from "./model-definition";
import type { ModelClassLike } from "./types";

/**
 * What happens to the documents referencing a deleted document.
 *
 * - `doNothing`: leave the dangling reference
 * - `nullify`: unset the referencing field
 * - `cascade`: delete the referencing documents too
 * - `deny`: refuse the delete while referencing documents exist
 * - `pull`: remove the reference from the referencing list
 */
export const DeleteRule = {
  DoNothing: "doNothing",
  Nullify: "nullify",
  Cascade: "cascade",
  Deny: "deny",
  Pull: "pull",
} as const;

export type DeleteRule = (typeof DeleteRule)[keyof typeof DeleteRule];

export type DeleteRuleEntry = {
  /** Model holding the reference. */
  related: ModelDefinition;
  /** Name of the field holding the reference on the related model. */
  fieldName: string;
  rule: DeleteRule;
};

const deleteRules = new WeakMap<ModelDefinition, Map<string, DeleteRuleEntry>>();

function toDefinition(model: ModelClassLike | ModelDefinition): ModelDefinition {
  return "definition" in model ? model.definition : model;
}

/**
 * Declare what deleting a `referenced` document does to the `related`
 * documents pointing at it through `fieldName`.
 *
 * Registering the same pair and field again replaces the rule.
 *
 * @throws {ModelDefinitionError} when the field is not a reference field,
 * or when `pull` targets a field that is not a list
 */
export function registerDeleteRule(
  referenced: ModelClassLike | ModelDefinition,
  related: ModelClassLike | ModelDefinition,
  fieldName: string,
  rule: DeleteRule,
): void {
  const referencedDefinition = toDefinition(referenced);
  const relatedDefinition = toDefinition(related);
  const field = relatedDefinition.fields.get(fieldName);

  if (!field) {
    throw new ModelDefinitionError(
      `${relatedDefinition.name} has no field named "${fieldName}".`,
      relatedDefinition.name,
    );
  }

  const referenceField = field instanceof ListField ? field.inner : field;

  if (!(referenceField instanceof ReferenceField)) {
    throw new ModelDefinitionError(
      `${relatedDefinition.name}.${fieldName} is not a reference field.`,
      relatedDefinition.name,
    );
  }

  if (rule === DeleteRule.Pull && !(field instanceof ListField)) {
    throw new ModelDefinitionError(
      `Cannot use the pull delete rule on ${relatedDefinition.name}.${fieldName}: it is not a list.`,
      relatedDefinition.name,
    );
  }

  let rules = deleteRules.get(referencedDefinition);

  if (!rules) {
    rules = new Map();
    deleteRules.set(referencedDefinition, rules);
  }

  rules.set(`${relatedDefinition.name}.${fieldName}`, {
    related: relatedDefinition,
    fieldName,
    rule,
  });
}

/**
 * Delete rules applying when documents of the given model are deleted,
 * `doNothing` rules excluded.
 */
export function getDeleteRules(definition: ModelDefinition): DeleteRuleEntry[] {
  const rules = deleteRules.get(definition);

  if (!rules) return [];

  return Array.from(rules.values()).filter(entry => entry.rule !== DeleteRule.DoNothing);
}
