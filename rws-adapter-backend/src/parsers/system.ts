import { SystemInfo, createSystemInfo } from "../dataset/records";
import { rwsResources } from "../dataset/resources";
import { findListItems, spanText } from "../utility/xml";
import { parseDocument, requireListItem } from "./document";

/**
 * Builds SystemInfo from the system resource (version, name, options) and the
 * controller identity resource (controller type, e.g. "Virtual").
 */
export function parseSystemInfoResponse(
  systemXml: string,
  identityXml: string
): SystemInfo {
  const system = parseDocument(systemXml, rwsResources.system);
  const identity = parseDocument(identityXml, rwsResources.controllerIdentity);

  const systemItem = requireListItem(system, "sys-system-li", "SystemInfo");
  const identityItem = requireListItem(
    identity,
    "ctrl-identity-info-li",
    "SystemInfo"
  );

  const options: string[] = [];
  for (const item of findListItems(system, "sys-option-li")) {
    const option = spanText(item, "option");
    if (option !== undefined) options.push(option);
  }

  return createSystemInfo({
    robotWareVersion:
      spanText(systemItem, "rwversionname") ?? spanText(systemItem, "rwversion"),
    systemName: spanText(systemItem, "name"),
    systemType: spanText(identityItem, "ctrl-type"),
    systemOptions: options,
  });
}
