/**
 * Namespace-aware XML document tree backed by fast-xml-parser
 *
 * fast-xml-parser keeps namespace prefixes as part of tag names and does not
 * resolve them. The tree built here resolves every element's namespace URI
 * using XML scoping rules so path queries can match on URI, not prefix.
 */

import { XMLParser } from 'fast-xml-parser';

/**
 * Element node
 */
export interface XmlElement {
  /** Qualified name as written, e.g. `ns3:TPX` */
  name: string;
  /** Name without prefix */
  localName: string;
  /** Namespace URI in scope for the element; undefined when in no namespace */
  namespaceUri?: string;
  /** Namespace declarations made on this element, keyed by prefix ('' for the default) */
  declarations: Record<string, string>;
  /** Attributes other than namespace declarations */
  attributes: Record<string, string>;
  children: XmlElement[];
  /** Direct text content, trimmed */
  text: string;
}

/**
 * Prefix -> namespace URI map used to evaluate queries
 */
export type NamespaceMap = Record<string, string>;

export interface QueryOptions {
  /** Namespace assumed for elements that are in no namespace */
  unqualifiedNamespace?: string;
}

/**
 * Raised when text cannot be parsed as an XML document
 */
export class XmlDocumentError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'XmlDocumentError';
  }
}

const ATTRIBUTE_PREFIX = '@_';
const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return undefined;
}

function splitName(name: string): { prefix: string; localName: string } {
  const index = name.indexOf(':');
  if (index === -1) {
    return { prefix: '', localName: name };
  }
  return { prefix: name.slice(0, index), localName: name.slice(index + 1) };
}

/**
 * Separate `xmlns` declarations from ordinary attributes
 */
function readAttributes(raw: unknown): Pick<XmlElement, 'declarations' | 'attributes'> {
  const declarations: Record<string, string> = {};
  const attributes: Record<string, string> = {};

  if (!isRecord(raw)) {
    return { declarations, attributes };
  }

  for (const [key, value] of Object.entries(raw)) {
    const text = toText(value);
    if (text === undefined || !key.startsWith(ATTRIBUTE_PREFIX)) {
      continue;
    }

    const name = key.slice(ATTRIBUTE_PREFIX.length);
    if (name === 'xmlns') {
      declarations[''] = text;
    } else if (name.startsWith('xmlns:')) {
      declarations[name.slice('xmlns:'.length)] = text;
    } else {
      attributes[name] = text;
    }
  }

  return { declarations, attributes };
}

/**
 * Convert fast-xml-parser's ordered output into elements
 */
function buildElements(nodes: unknown, scope: NamespaceMap): XmlElement[] {
  if (!Array.isArray(nodes)) {
    return [];
  }

  const elements: XmlElement[] = [];

  for (const node of nodes) {
    if (!isRecord(node)) {
      continue;
    }

    const name = Object.keys(node).find((key) => key !== ATTRIBUTES_KEY && key !== TEXT_KEY);
    if (!name || name.startsWith('?') || name.startsWith('!')) {
      continue;
    }

    const { declarations, attributes } = readAttributes(node[ATTRIBUTES_KEY]);
    const elementScope = { ...scope, ...declarations };
    const { prefix, localName } = splitName(name);
    // An empty URI (xmlns="") means no namespace
    const namespaceUri = elementScope[prefix] || undefined;

    const content = node[name];
    const textParts: string[] = [];
    if (Array.isArray(content)) {
      for (const child of content) {
        const text = isRecord(child) ? toText(child[TEXT_KEY]) : undefined;
        if (text !== undefined) {
          textParts.push(text);
        }
      }
    }

    elements.push({
      name,
      localName,
      namespaceUri,
      declarations,
      attributes,
      children: buildElements(content, elementScope),
      text: textParts.join('').trim(),
    });
  }

  return elements;
}

/**
 * Parse XML text into its root element
 * @throws XmlDocumentError for malformed XML or a document without a root element
 */
export function parseXmlDocument(xml: string): XmlElement {
  let parsed: unknown;
  try {
    parsed = parser.parse(xml, true);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new XmlDocumentError(`XML parse error: ${message}`, { cause: error });
  }

  const [root] = buildElements(parsed, {});
  if (!root) {
    throw new XmlDocumentError('XML document has no root element');
  }
  return root;
}

interface QueryStep {
  prefix: string;
  localName: string;
}

function parseQuery(expression: string): { descendant: boolean; steps: QueryStep[] } {
  let descendant: boolean;
  let path: string;

  if (expression.startsWith('//')) {
    descendant = true;
    path = expression.slice(2);
  } else if (expression.startsWith('./')) {
    descendant = false;
    path = expression.slice(2);
  } else {
    throw new Error(`Unsupported query: ${expression}`);
  }

  const steps = path.split('/').map((step) => splitName(step));
  if (steps.some((step) => step.localName.length === 0)) {
    throw new Error(`Unsupported query: ${expression}`);
  }
  return { descendant, steps };
}

function matches(element: XmlElement, step: QueryStep, namespaces: NamespaceMap, options: QueryOptions): boolean {
  if (element.localName !== step.localName) {
    return false;
  }

  const elementUri = element.namespaceUri ?? options.unqualifiedNamespace;
  if (step.prefix === '') {
    return elementUri === undefined;
  }

  const stepUri = namespaces[step.prefix];
  if (stepUri === undefined) {
    throw new Error(`Undefined namespace prefix: ${step.prefix}`);
  }
  return elementUri === stepUri;
}

function descendantsOrSelf(element: XmlElement): XmlElement[] {
  const found: XmlElement[] = [element];
  for (const child of element.children) {
    found.push(...descendantsOrSelf(child));
  }
  return found;
}

/**
 * Evaluate a path query
 *
 * Supported forms:
 * - `//p:Name` (descendant-or-self of the context, then child steps)
 * - `./p:A/p:B` (child steps from the context)
 *
 * Unprefixed steps match elements in no namespace.
 *
 * @returns Matching elements in document order
 */
export function selectNodes(
  context: XmlElement,
  expression: string,
  namespaces: NamespaceMap,
  options: QueryOptions = {}
): XmlElement[] {
  const { descendant, steps } = parseQuery(expression);
  const [first, ...rest] = steps;

  let current: XmlElement[] = descendant
    ? descendantsOrSelf(context).filter((element) => matches(element, first, namespaces, options))
    : context.children.filter((element) => matches(element, first, namespaces, options));

  for (const step of rest) {
    current = current.flatMap((element) =>
      element.children.filter((child) => matches(child, step, namespaces, options))
    );
  }

  return current;
}

/**
 * Text of the first element a query selects
 *
 * @returns undefined when nothing matches
 */
export function selectFirstText(
  context: XmlElement,
  expression: string,
  namespaces: NamespaceMap,
  options: QueryOptions = {}
): string | undefined {
  const [first] = selectNodes(context, expression, namespaces, options);
  return first?.text;
}
