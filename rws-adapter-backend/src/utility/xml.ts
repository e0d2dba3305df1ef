import { XMLParser } from "fast-xml-parser";
import logger from "./logger";

// Shared parser for Robot Web Services XHTML representations. Values stay
// strings (versions like "6.10" must not turn into numbers) and <li>/<span>
// always come back as arrays so single and repeated elements look the same.
const parser = new XMLParser({
  ignoreDeclaration: true,
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  allowBooleanAttributes: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (tagName) => tagName === "li" || tagName === "span",
});

export type XmlNode = Record<string, unknown>;

function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse an XML string safely, returning the root object or null on failure.
 * Logs errors but never throws.
 */
export function safeParseXml(xml: string): XmlNode | null {
  try {
    if (!xml || xml.trim() === "") return null;
    const parsed: unknown = parser.parse(xml);
    return isXmlNode(parsed) ? parsed : null;
  } catch (err) {
    logger.error(`XML parse error: ${err}`);
    return null;
  }
}

export function attribute(node: XmlNode, name: string): string | undefined {
  const value = node[`@_${name}`];
  return typeof value === "string" ? value : undefined;
}

function hasClass(node: XmlNode, className: string): boolean {
  const classes = attribute(node, "class");
  return classes !== undefined && classes.split(/\s+/).includes(className);
}

/**
 * Collects every <li class="className"> in the document, depth first, keeping
 * the order of the controller's list.
 */
export function findListItems(root: unknown, className: string): XmlNode[] {
  const found: XmlNode[] = [];
  const visit = (value: unknown): void => {
    if (Array.isArray(value)) {
      value.forEach(visit);
      return;
    }
    if (!isXmlNode(value)) return;
    for (const [key, child] of Object.entries(value)) {
      if (key.startsWith("@_") || key === "#text") continue;
      if (key === "li" && Array.isArray(child)) {
        for (const item of child) {
          if (isXmlNode(item) && hasClass(item, className)) found.push(item);
        }
      }
      visit(child);
    }
  };
  visit(root);
  return found;
}

/**
 * Text of the first <span class="className"> directly inside `item`, or
 * undefined when there is no such span. An empty span yields "".
 */
export function spanText(item: XmlNode, className: string): string | undefined {
  const spans = item.span;
  if (!Array.isArray(spans)) return undefined;
  for (const span of spans) {
    if (isXmlNode(span) && hasClass(span, className)) {
      const text = span["#text"];
      return typeof text === "string" ? text : "";
    }
  }
  return undefined;
}
