import { IncompleteResponseError, MalformedResponseError } from "../dataset/errors";
import { XmlNode, findListItems, safeParseXml } from "../utility/xml";

export function parseDocument(xml: string, resource: string): XmlNode {
  const root = safeParseXml(xml);
  if (!root) {
    throw new MalformedResponseError(resource);
  }
  return root;
}

/** The single list item an entity is read from; absent means incomplete. */
export function requireListItem(
  root: XmlNode,
  className: string,
  entity: string
): XmlNode {
  const [item] = findListItems(root, className);
  if (!item) {
    throw new IncompleteResponseError(entity, className);
  }
  return item;
}
