// @workdeck/core: Foundation
export * from "./errors.js";
export * from "./result.js";
export { NodeFileSystem, MemoryFileSystem } from "./fs.js";
export type { FileSystem, FileOperation } from "./fs.js";

// Observability
export * from "./observability/index.js";
