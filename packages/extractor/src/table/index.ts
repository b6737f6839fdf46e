export { locateTable } from './locate';
export { inferHeaders, tableRows, cellTexts } from './headers';
export { normalizeRow, normalizeRows } from './rows';
export { parseTable } from './parse';
export type { HeaderInference } from './headers';
export type { TableParseResult, TableParseStatus } from './parse';
