export { MemorySessionStore, createMemorySessionStore, defaultSessionStore } from "./memory-session-store.js";
