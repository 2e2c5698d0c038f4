/**
 * Course Graph Database Client
 * Exports the Neo4j-backed GraphStore, its configuration and seeding helpers
 */

export { CourseGraphClient, MAX_TRAVERSAL_DEPTH, toStoreError } from './neo4j';
export { loadGraphConfig, type GraphConfig } from './config';
export { readCatalogFile, seedCatalog, type SeedSummary } from './seed';
