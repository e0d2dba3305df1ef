import { DiagnosticSink, logDiagnostic } from "../dataset/diagnostics";
import { IncompleteResponseError } from "../dataset/errors";
import { rwsResources } from "../dataset/resources";
import {
  IOSignalInfo,
  RawSignalEntry,
  resolveSignalKind,
} from "../dataset/signals";
import { findListItems, spanText } from "../utility/xml";
import { parseDocument } from "./document";

/**
 * Parser for the signal list. The response is taken as the complete set of
 * signals it names.
 *
 * Expected structure:
 * <li class="ios-signal-li" title="Local/DRV_1/do1">
 *   <span class="name">do1</span>
 *   <span class="type">DO</span>
 *   <span class="lvalue">1</span>
 * </li>
 */
export function parseIOSignalsResponse(
  xml: string,
  sink: DiagnosticSink = logDiagnostic
): IOSignalInfo {
  const root = parseDocument(xml, rwsResources.ioSignals);
  const entries: RawSignalEntry[] = [];

  for (const item of findListItems(root, "ios-signal-li")) {
    const name = spanText(item, "name");
    if (name === undefined) {
      throw new IncompleteResponseError("IOSignalInfo", "name");
    }
    const signalType = spanText(item, "type");
    if (signalType === undefined) {
      throw new IncompleteResponseError("IOSignalInfo", `${name}.type`);
    }
    const kind = resolveSignalKind(signalType);
    if (!kind) {
      sink({ kind: "unsupported-signal-type", signal: name, signalType });
      continue;
    }
    entries.push({ name, kind, value: spanText(item, "lvalue") });
  }

  return IOSignalInfo.fromEntries(entries, sink);
}
