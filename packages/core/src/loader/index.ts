export { loadRecords, resolveColumns } from './load.js';
