export { ConsoleStore, createConsoleStore } from './console'
export { MemoryStore, createMemoryStore } from './memory'
