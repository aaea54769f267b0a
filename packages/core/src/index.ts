export * from "./types.js";
export * from "./constants.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./delimited.js";
export * from "./extractors/index.js";
export * from "./extractors/collect.js";
export * from "./keystore.js";
export * from "./zotero/tree.js";
export * from "./zotero/types.js";
export * from "./zotero/client.js";
export * from "./reconcile.js";
export * from "./formatters/index.js";
export * from "./config.js";
export * from "./detect.js";
export * from "./resolve.js";
