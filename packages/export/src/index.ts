// Ports
export type { RecordWriter } from './domain/ports/RecordWriter.js';

// Writers
export { CsvWriter } from './infrastructure/writers/CsvWriter.js';
export type { CsvWriterOptions } from './infrastructure/writers/CsvWriter.js';
export { TextWriter } from './infrastructure/writers/TextWriter.js';
export type { TextWriterOptions, TextStyle } from './infrastructure/writers/TextWriter.js';
export type { TextOutputOptions } from './infrastructure/writers/TextOutput.js';
