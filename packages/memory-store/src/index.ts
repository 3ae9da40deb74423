export { createMemoryAccountStore, type MemoryAccountStore } from "./store.js";
