import { ModelDefinitionError } from "../errors/model-definition.error";
import type { ModelDefinition } from "./model-definition";
import type { ModelReference } from "./types";

/**
 * Global model registry that maps model names to their definitions.
 * This allows string-based model references, so models can point at models
 * defined later (or at themselves).
 *
 * The registry has two phases: definitions are registered while models load,
 * then `sealModelRegistry()` turns it read only.
 */
const modelsRegistry = new Map<string, ModelDefinition>();

let sealed = false;

/**
 * Register a model definition under its name.
 *
 * @throws {ModelDefinitionError} if the name is taken or the registry is sealed
 */
export function registerModel(definition: ModelDefinition): void {
  if (sealed) {
    throw new ModelDefinitionError(
      `Cannot register model "${definition.name}": the model registry is sealed.`,
      definition.name,
    );
  }

  if (modelsRegistry.has(definition.name)) {
    throw new ModelDefinitionError(
      `Model "${definition.name}" is already registered.`,
      definition.name,
    );
  }

  modelsRegistry.set(definition.name, definition);
}

/**
 * Get a model definition by its name from the global registry.
 *
 * @example
 * ```typescript
 * const definition = getModelDefinition("User");
 * if (definition) {
 *   console.log(definition.collectionName);
 * }
 * ```
 */
export function getModelDefinition(name: string): ModelDefinition | undefined {
  return modelsRegistry.get(name);
}

/**
 * Get all registered model definitions.
 */
export function getAllModelDefinitions(): Map<string, ModelDefinition> {
  return new Map(modelsRegistry);
}

/**
 * Close the registration phase.
 */
export function sealModelRegistry(): void {
  sealed = true;
}

/**
 * Clean up all models from the registry and reopen it
 */
export function cleanupModelsRegistry(): void {
  modelsRegistry.clear();
  sealed = false;
}

export function removeModelFromRegistry(name: string): void {
  modelsRegistry.delete(name);
}

/**
 * Resolve a model given by class or by registered name.
 *
 * @throws {ModelDefinitionError} when the name is not registered
 */
export function resolveModelDefinition(model: ModelReference): ModelDefinition {
  if (typeof model !== "string") return model.definition;

  const definition = modelsRegistry.get(model);

  if (!definition) {
    throw new ModelDefinitionError(`Model "${model}" is not registered.`, model);
  }

  return definition;
}
