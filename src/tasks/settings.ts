import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import { SettingsError } from '../errors';

export type SettingValue = string | number | boolean;
export type TaskSettings = Record<string, SettingValue>;

/** Settings of the tasks that read or write one file. */
export const FileTaskSettingsSchema = z.object({
  Filename: z.string().default(''),
});

const builder = new XMLBuilder({
  format: true,
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  suppressEmptyNode: false,
});

const TEXT_NODE = '#text';

// Values keep their whitespace; a file name may start or end with spaces
const parser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  parseTagValue: false,
  trimValues: false,
  textNodeName: TEXT_NODE,
});

/** Serialize settings as an XML document whose root element is `rootName`. */
export function settingsToXml(rootName: string, settings: TaskSettings): string {
  return builder.build({
    '?xml': { '@_version': '1.0', '@_encoding': 'utf-8' },
    [rootName]: settings,
  });
}

/**
 * Read back the settings written by `settingsToXml`. Values come back as
 * strings; the task's schema coerces them.
 */
export function settingsFromXml(xml: string, rootName: string): Record<string, unknown> {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new SettingsError(`Malformed settings XML at line ${validation.err.line}: ${validation.err.msg}`);
  }

  const document: unknown = parser.parse(xml);
  if (!isRecord(document) || !(rootName in document)) {
    throw new SettingsError(`Settings document has no <${rootName}> root element`);
  }

  const root = document[rootName];
  // An empty root element parses as '', or as its indentation
  if (typeof root === 'string' && root.trim() === '') return {};
  if (!isRecord(root)) {
    throw new SettingsError(`<${rootName}> does not contain settings`);
  }

  const settings: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(root)) {
    if (name === TEXT_NODE) {
      if (typeof value === 'string' && value.trim() === '') continue;
      throw new SettingsError(`<${rootName}> has text outside its setting elements`);
    }
    settings[name] = value;
  }
  return settings;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
