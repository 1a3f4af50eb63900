export { parseLayoutXml, loadLayout } from './infrastructure/parsers/XmlLayoutParser.js';
export type { XmlLayoutOptions } from './infrastructure/parsers/XmlLayoutParser.js';
