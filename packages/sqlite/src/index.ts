export { SqliteQuerySource } from './SqliteQuerySource.js';
export type { SqliteQuerySourceOptions } from './SqliteQuerySource.js';
