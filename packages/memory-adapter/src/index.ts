export { type MemoryAdapter, type MemoryAdapterOptions, memoryAdapter } from "./adapter.js";
