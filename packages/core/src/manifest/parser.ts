import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { ManifestParseError } from '../errors.js';
import type { Component, Manifest } from './manifest-types.js';

export const MANIFEST_NAMESPACE = 'http://soap.sforce.com/2006/04/metadata';
export const MANIFEST_ROOT = 'Package';

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';
const ATTRIBUTE_PREFIX = '@_';

// preserveOrder keeps siblings in document order; members may precede or follow name.
// htmlEntities turns on decimal and hexadecimal character references.
const xmlParser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_KEY,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  htmlEntities: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
});

type XmlNode = Record<string, unknown>;

interface TypeBlockAccumulator {
  members: string[];
  names: string[];
}

function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNodeList(value: unknown): XmlNode[] {
  return Array.isArray(value) ? value.filter(isXmlNode) : [];
}

function tagOf(node: XmlNode): string | undefined {
  return Object.keys(node).find((key) => key !== ATTRIBUTES_KEY);
}

function localName(tag: string): string {
  const idx = tag.indexOf(':');
  return idx === -1 ? tag : tag.slice(idx + 1);
}

function prefixOf(tag: string): string | undefined {
  const idx = tag.indexOf(':');
  return idx === -1 ? undefined : tag.slice(0, idx);
}

function textOf(node: XmlNode, tag: string): string {
  return toNodeList(node[tag])
    .map((child) => {
      const text = child[TEXT_KEY];
      if (typeof text === 'string') return text;
      if (typeof text === 'number' || typeof text === 'boolean') return String(text);
      return '';
    })
    .join('')
    .trim();
}

function namespaceOf(root: XmlNode, rootTag: string): string | undefined {
  const attributes = root[ATTRIBUTES_KEY];
  if (!isXmlNode(attributes)) return undefined;
  const prefix = prefixOf(rootTag);
  const declared = attributes[`${ATTRIBUTE_PREFIX}xmlns${prefix ? `:${prefix}` : ''}`];
  return typeof declared === 'string' ? declared : undefined;
}

function readDocument(xml: string): XmlNode[] {
  if (xml.trim() === '') {
    throw ManifestParseError.malformedXml('document is empty', 1, 1);
  }
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw ManifestParseError.malformedXml(msg, line, col);
  }
  try {
    return toNodeList(xmlParser.parse(xml));
  } catch (error) {
    throw ManifestParseError.malformedXml(error instanceof Error ? error.message : String(error));
  }
}

function collectTypeBlock(children: XmlNode[]): TypeBlockAccumulator {
  const block: TypeBlockAccumulator = { members: [], names: [] };
  for (const child of children) {
    const tag = tagOf(child);
    if (tag === undefined) continue;
    switch (localName(tag)) {
      case 'members':
        block.members.push(textOf(child, tag));
        break;
      case 'name':
        block.names.push(textOf(child, tag));
        break;
    }
  }
  return block;
}

function resolveTypeBlock(block: TypeBlockAccumulator, blockIndex: number): Component[] {
  if (block.names.length > 1) {
    throw ManifestParseError.duplicateTypeName(blockIndex);
  }
  const typeName = block.names[0];
  if (!typeName) {
    throw ManifestParseError.missingTypeName(blockIndex);
  }
  return block.members.map((memberName) => ({ typeName, memberName }));
}

/**
 * Parse `package.xml` text into its components, in document order.
 *
 * The root name and namespace are only checked advisorily: a mismatch is reported in
 * `warnings` rather than rejected.
 */
export function parseManifest(xml: string): Manifest {
  const roots = readDocument(xml).filter((node) => {
    const tag = tagOf(node);
    return tag !== undefined && tag !== TEXT_KEY;
  });
  const root = roots[0];
  const rootTag = root ? tagOf(root) : undefined;
  if (!root || rootTag === undefined || roots.length > 1) {
    throw ManifestParseError.malformedXml('expected exactly one root element');
  }

  const warnings: string[] = [];
  if (localName(rootTag) !== MANIFEST_ROOT) {
    warnings.push(`Root element is <${rootTag}>, expected <${MANIFEST_ROOT}>`);
  }
  const namespace = namespaceOf(root, rootTag);
  if (namespace === undefined) {
    warnings.push(`Root element declares no namespace, expected ${MANIFEST_NAMESPACE}`);
  } else if (namespace !== MANIFEST_NAMESPACE) {
    warnings.push(`Root element namespace is ${namespace}, expected ${MANIFEST_NAMESPACE}`);
  }

  const components: Component[] = [];
  let version: string | undefined;
  let blockIndex = 0;
  for (const child of toNodeList(root[rootTag])) {
    const tag = tagOf(child);
    if (tag === undefined) continue;
    const name = localName(tag);
    if (name === 'types') {
      const block = collectTypeBlock(toNodeList(child[tag]));
      components.push(...resolveTypeBlock(block, blockIndex));
      blockIndex++;
    } else if (name === 'version') {
      version = textOf(child, tag);
    }
  }

  return { components, version, namespace, warnings };
}
