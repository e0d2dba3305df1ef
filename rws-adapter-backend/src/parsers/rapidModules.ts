import { RAPIDModuleInfo, createRAPIDModuleInfo } from "../dataset/records";
import { findListItems, spanText } from "../utility/xml";
import { parseDocument } from "./document";

export function parseRapidModulesResponse(
  xml: string,
  resource: string
): RAPIDModuleInfo[] {
  const root = parseDocument(xml, resource);
  return findListItems(root, "rap-module-info-li").map((item) =>
    createRAPIDModuleInfo({
      name: spanText(item, "name"),
      type: spanText(item, "type"),
    })
  );
}
