/**
 * Minimal XML writer for provider responses.
 *
 * Mappings become child elements, sequences become repeated list-item
 * elements (`item` for EC2, `member` for the query protocol), scalars become
 * escaped text. Null members are omitted.
 */

import { isSequence, isValueMap, scalarToString, ValueTree } from '../domain/value-tree';

export interface XmlStyle {
  listItemName: string;
  /** Applied to every mapping key before it becomes an element name. */
  elementName: (key: string) => string;
}

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => XML_ESCAPES[ch]);
}

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

/** Serialize `value` as the content of an element named `name`. */
export function element(name: string, value: ValueTree, style: XmlStyle): string {
  if (value === null) return '';
  const inner = content(value, style);
  return inner === '' ? `<${name}/>` : `<${name}>${inner}</${name}>`;
}

/** Serialize the children of a value without a surrounding element. */
export function content(value: ValueTree, style: XmlStyle): string {
  if (isSequence(value)) {
    return value.map((item) => element(style.listItemName, item, style)).join('');
  }
  if (isValueMap(value)) {
    return Object.entries(value)
      .map(([key, child]) => element(style.elementName(key), child, style))
      .join('');
  }
  return escapeXml(scalarToString(value));
}
