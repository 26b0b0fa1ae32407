export { readTabular, tabularSourceFromBuffer, tabularSourceFromRows } from './tabular.js';
