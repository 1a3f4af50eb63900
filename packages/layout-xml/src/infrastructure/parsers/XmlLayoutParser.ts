import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import { Layout, RecordFileError, logger, type LayoutDefinition } from '@fixedrec/core';

const REPEATED_TAGS = new Set(['fieldtype', 'record', 'field']);

// An element with neither attributes nor children parses to ''.
function element<T extends z.ZodRawShape>(shape: T) {
  return z.preprocess((node) => (node === '' ? {} : node), z.object(shape));
}

const FieldTypeNode = element({
  '@_name': z.string().min(1),
  '@_type': z.string(),
  '@_format': z.string().optional(),
});

const FieldNode = element({
  '@_name': z.string().min(1),
  '@_description': z.string().default(''),
  '@_type': z.string().min(1),
  '@_length': z
    .string()
    .regex(/^\s*\d+\s*$/, 'length must be a non-negative integer')
    .transform((length) => Number.parseInt(length, 10)),
});

const RecordNode = element({
  '@_name': z.string().min(1),
  '@_description': z.string().default(''),
  field: z.array(FieldNode).default([]),
});

const MetaNode = z.preprocess((node) => (node === '' ? {} : node), z.record(z.string()));

const LayoutDocument = z.object({
  rbfile: element({
    meta: MetaNode.optional(),
    fieldtype: z.array(FieldTypeNode).default([]),
    record: z.array(RecordNode).default([]),
  }),
});

export interface XmlLayoutOptions {
  /** Layout name. `loadLayout()` uses the file name. Default: `''`. */
  readonly name?: string;
}

/**
 * Parse an XML layout document into a `LayoutDefinition`.
 *
 * ```xml
 * <rbfile>
 *   <meta version="1.0" description="Continents and countries"/>
 *   <fieldtype name="A/N" type="string"/>
 *   <fieldtype name="D" type="date" format="YYYYMMDD"/>
 *   <record name="CONT" description="Continent">
 *     <field name="ID" description="Record ID" length="4" type="A/N"/>
 *   </record>
 * </rbfile>
 * ```
 *
 * Every `<meta>` attribute lands in `meta`; its `description` also becomes the
 * layout description. Field types and record names are resolved later, by
 * `Layout.build()`.
 */
export function parseLayoutXml(xml: string, options?: XmlLayoutOptions): LayoutDefinition {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new RecordFileError('INVALID_LAYOUT', `Malformed layout XML at line ${String(line)}, column ${String(col)}: ${msg}`, {
      metadata: { line, col },
    });
  }

  const parser = new XMLParser({
    ignoreAttributes: false,
    ignoreDeclaration: true,
    parseAttributeValue: false,
    isArray: (tagName) => REPEATED_TAGS.has(tagName),
  });
  const tree: unknown = parser.parse(xml);

  const result = LayoutDocument.safeParse(tree);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new RecordFileError('INVALID_LAYOUT', `Invalid layout document: ${issues.join('; ')}`, {
      metadata: { issues },
    });
  }

  const { meta: rawMeta = {}, fieldtype, record } = result.data.rbfile;
  const meta: { [key: string]: string } = {};
  for (const [key, value] of Object.entries(rawMeta)) {
    meta[key.replace(/^@_/, '')] = value;
  }

  return {
    name: options?.name ?? '',
    description: meta.description ?? '',
    meta,
    fieldTypes: fieldtype.map((ft) => ({ name: ft['@_name'], description: ft['@_type'], format: ft['@_format'] })),
    records: record.map((rec) => ({
      name: rec['@_name'],
      description: rec['@_description'],
      fields: rec.field.map((f) => ({
        name: f['@_name'],
        description: f['@_description'],
        type: f['@_type'],
        length: f['@_length'],
      })),
    })),
  };
}

/** Read an XML layout file and build its `Layout`. The layout is named after the file. */
export async function loadLayout(path: string): Promise<Layout> {
  let xml: string;
  try {
    xml = await readFile(path, 'utf-8');
  } catch (err) {
    throw new RecordFileError('SOURCE_UNAVAILABLE', `Layout file '${path}' cannot be read`, {
      cause: err,
      metadata: { path },
    });
  }

  const layout = Layout.build(parseLayoutXml(xml, { name: basename(path) }));
  logger.debug({ path, records: layout.size }, 'layout loaded');
  return layout;
}
