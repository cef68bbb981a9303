export * from "./collection-handle.contract";
export * from "./database-driver.contract";
