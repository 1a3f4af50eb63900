export { SequelizeWriter } from './SequelizeWriter.js';
export type { SequelizeWriterOptions } from './SequelizeWriter.js';
export { tableNameFor, columnsFor, TAG_COLUMN } from './models/RecordTableModel.js';
export type { ColumnMapping, RecordTableModel } from './models/RecordTableModel.js';
export { toRow } from './mappers/RowMapper.js';
export type { RecordRow, ColumnValue } from './mappers/RowMapper.js';
