import type { BrokenReferencePolicy, DatabaseConfigurations, UnknownFieldsPolicy } from "./types";

let configurations: DatabaseConfigurations = {};

export function setDatabaseConfigurations(databaseConfigurations: DatabaseConfigurations) {
  configurations = {
    ...configurations,
    ...databaseConfigurations,
  };
}

export function getDatabaseConfigurations(): DatabaseConfigurations {
  return configurations;
}

export function getDatabaseConfig<Key extends keyof DatabaseConfigurations>(
  key: Key,
): DatabaseConfigurations[Key] {
  return configurations[key];
}

/**
 * Restore the defaults, mostly useful between tests
 */
export function resetDatabaseConfigurations() {
  configurations = {};
}

export function getUnknownFieldsPolicy(): UnknownFieldsPolicy {
  return configurations.unknownFields || "drop";
}

export function getBrokenReferencePolicy(): BrokenReferencePolicy {
  return configurations.brokenReferences || "sentinel";
}
