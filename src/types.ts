/**
 * What the codec does with stored fields the schema does not declare.
 *
 * - `drop`: discard them on decode
 * - `preserve`: keep them on `model.unknownFields` and write them back on encode
 */
export type UnknownFieldsPolicy = "drop" | "preserve";

/**
 * What dereferencing does when a referenced document no longer exists.
 *
 * - `sentinel`: put a `BrokenReference` in the field and log a warning
 * - `strict`: throw `BrokenReferenceError` before touching any field
 */
export type BrokenReferencePolicy = "sentinel" | "strict";

export type DatabaseConfigurations = {
  /**
   * Default unknown fields policy for models that do not declare one
   * @default `drop`
   */
  unknownFields?: UnknownFieldsPolicy;
  /**
   * Default broken reference policy for dereferencing
   * @default `sentinel`
   */
  brokenReferences?: BrokenReferencePolicy;
  /**
   * Log every storage round trip through the logger
   * @default false
   */
  logQueries?: boolean;
};
