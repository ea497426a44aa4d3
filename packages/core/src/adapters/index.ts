// packages/core/src/adapters/index.ts

export {
  StorageAdapter,
  type StorageAdapterService,
} from "./storage";

export {
  RuntimeAdapter,
  type RuntimeAdapterService,
  type RuntimeLayer,
} from "./runtime";

export { createMemoryRuntime, type MemoryRuntimeOptions } from "./memory/runtime";
