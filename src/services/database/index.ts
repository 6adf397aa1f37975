export { openDatabase, initializeDatabase, closeDatabase } from './db';
export { SqliteEntityStore, type EntityStore } from './entity-store';
export { getDashboardSummary } from './expense-queries';
