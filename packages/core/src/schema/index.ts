export { buildSchemaIndex, CREATE_TABLE_PATTERN } from './schema-indexer.js';
