export { defineRecord, schemaAt } from './RecordType.js';
export type {
  RecordDefinition,
  RecordLoadContext,
  RecordLoader,
  RecordType,
} from './RecordType.js';
