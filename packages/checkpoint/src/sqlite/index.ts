export { createCheckpointStore, tableNameFor, EPOCH } from './store';
