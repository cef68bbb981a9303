export * from "./boolean-field";
export * from "./char-field";
export * from "./datetime-field";
export * from "./dict-field";
export * from "./email-field";
export * from "./embedded-document-field";
export * from "./embedded-document-list-field";
export * from "./field";
export * from "./list-field";
export * from "./numeric-fields";
export * from "./object-id-field";
export * from "./reference-field";
