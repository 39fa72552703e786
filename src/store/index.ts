export type { Store } from "./types.js";
export { MemoryStore } from "./memory-store.js";
export { FileStore } from "./file-store.js";
export { serializeRecord, deserializeRecord } from "./serialization.js";
