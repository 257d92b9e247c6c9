import { JSDOM } from 'jsdom';
import { GpxFormatError } from './errors';

const XMLNS_NAMESPACE = 'http://www.w3.org/2000/xmlns/';

/** A parsed GPX file and the default namespace its elements live in */
export interface GpxDocument {
  document: Document;
  root: Element;
  namespace: string;
}

export interface ElementContent {
  attributes?: Array<[string, string]>;
  text?: string;
}

/**
 * Parse GPX XML content into a document.
 *
 * The root must be a <gpx> element with a namespace. Every later lookup
 * is done in that namespace, the way GPX 1.0 and 1.1 files declare it.
 */
export function parseGpxDocument(xml: string): GpxDocument {
  const { window } = new JSDOM('');
  const parser = new window.DOMParser();
  const document = parser.parseFromString(xml, 'text/xml');

  // Check for parse errors
  const parseError = document.getElementsByTagName('parsererror').item(0);
  if (parseError) {
    throw new GpxFormatError('Invalid GPX XML: ' + (parseError.textContent ?? '').trim());
  }

  const root = document.documentElement;
  if (root.localName !== 'gpx') {
    throw new GpxFormatError(`Invalid GPX XML: root element is <${root.localName}>, expected <gpx>`);
  }

  const namespace = root.namespaceURI;
  if (!namespace) {
    throw new GpxFormatError('Invalid GPX XML: <gpx> has no default namespace');
  }

  return { document, root, namespace };
}

/**
 * Direct children of an element with the given namespace and local name
 */
export function childElements(parent: Element, namespace: string, localName: string): Element[] {
  return Array.from(parent.children).filter(
    el => el.namespaceURI === namespace && el.localName === localName
  );
}

/**
 * Trimmed text of the first matching child, null when missing or blank
 */
export function childText(parent: Element, namespace: string, localName: string): string | null {
  const [child] = childElements(parent, namespace, localName);
  const text = child?.textContent?.trim();
  return text ? text : null;
}

/**
 * Trimmed attribute value, null when missing or blank
 */
export function attributeText(element: Element, name: string): string | null {
  const value = element.getAttribute(name)?.trim();
  return value ? value : null;
}

/**
 * Create an empty document with a <gpx> root in the given namespace.
 * Attributes are written in the order given, followed by xmlns.
 */
export function createGpxDocument(namespace: string, attributes: Array<[string, string]>): Document {
  const { window } = new JSDOM('');
  const document = window.document.implementation.createDocument(namespace, 'gpx', null);
  const root = document.documentElement;

  for (const [name, value] of attributes) {
    root.setAttribute(name, value);
  }
  root.setAttributeNS(XMLNS_NAMESPACE, 'xmlns', namespace);

  return document;
}

/**
 * Append a new child element in the parent's namespace
 */
export function appendElement(parent: Element, localName: string, content: ElementContent = {}): Element {
  const element = parent.ownerDocument.createElementNS(parent.namespaceURI, localName);

  for (const [name, value] of content.attributes ?? []) {
    element.setAttribute(name, value);
  }
  if (content.text !== undefined) {
    element.textContent = content.text;
  }

  parent.appendChild(element);
  return element;
}

/**
 * Escape XML special characters
 */
function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function serializeElement(element: Element, depth: number): string {
  const indent = '  '.repeat(depth);
  const tag = element.tagName;
  const attrs = Array.from(element.attributes)
    .map(attr => ` ${attr.name}="${escapeXml(attr.value)}"`)
    .join('');

  const children = Array.from(element.children);
  if (children.length > 0) {
    const inner = children.map(child => serializeElement(child, depth + 1)).join('\n');
    return `${indent}<${tag}${attrs}>\n${inner}\n${indent}</${tag}>`;
  }

  const text = element.textContent ?? '';
  if (text === '') {
    return `${indent}<${tag}${attrs}/>`;
  }
  return `${indent}<${tag}${attrs}>${escapeXml(text)}</${tag}>`;
}

/**
 * Generate pretty-printed GPX XML from a document.
 * Text mixed in between child elements is not written.
 */
export function serializeGpx(document: Document): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
${serializeElement(document.documentElement, 0)}
`;
}
