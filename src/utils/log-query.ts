import { colors } from "@mongez/copper";
import { log } from "@warlock.js/logger";
import { getDatabaseConfig } from "../config";

/**
 * Log a storage round trip when `logQueries` is enabled.
 */
export function logQuery(operation: string, collectionName: string, details?: unknown): void {
  if (!getDatabaseConfig("logQueries")) return;

  const suffix = details === undefined ? "" : ` ${colors.gray(JSON.stringify(details))}`;

  log.info("database.query", operation, `${colors.yellowBright(collectionName)}${suffix}`);
}
