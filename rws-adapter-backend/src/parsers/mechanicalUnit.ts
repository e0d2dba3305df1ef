import { DiagnosticSink, logDiagnostic } from "../dataset/diagnostics";
import {
  MechanicalUnitDynamicInfo,
  MechanicalUnitStaticInfo,
  createMechanicalUnitDynamicInfo,
  createMechanicalUnitStaticInfo,
} from "../dataset/records";
import { spanText } from "../utility/xml";
import { parseDocument, requireListItem } from "./document";

// Both resource variants describe the unit in one <li class="ms-mechunit">.

export function parseMechanicalUnitStaticResponse(
  xml: string,
  resource: string,
  sink: DiagnosticSink = logDiagnostic
): MechanicalUnitStaticInfo {
  const root = parseDocument(xml, resource);
  const item = requireListItem(root, "ms-mechunit", "MechanicalUnitStaticInfo");
  return createMechanicalUnitStaticInfo(
    {
      type: spanText(item, "type"),
      taskName: spanText(item, "task-name"),
      axes: spanText(item, "axes"),
      axesTotal: spanText(item, "axes-total"),
      isIntegratedUnit: spanText(item, "is-integrated-unit"),
      hasIntegratedUnit: spanText(item, "has-integrated-unit"),
    },
    sink
  );
}

export function parseMechanicalUnitDynamicResponse(
  xml: string,
  resource: string,
  sink: DiagnosticSink = logDiagnostic
): MechanicalUnitDynamicInfo {
  const root = parseDocument(xml, resource);
  const item = requireListItem(
    root,
    "ms-mechunit",
    "MechanicalUnitDynamicInfo"
  );
  return createMechanicalUnitDynamicInfo(
    {
      toolName: spanText(item, "tool-name"),
      wobjName: spanText(item, "wobj-name"),
      payloadName: spanText(item, "payload-name"),
      totalPayloadName: spanText(item, "total-payload-name"),
      status: spanText(item, "status"),
      mode: spanText(item, "mode"),
      jogMode: spanText(item, "jog-mode"),
      coordSystem: spanText(item, "coord-system"),
    },
    sink
  );
}
