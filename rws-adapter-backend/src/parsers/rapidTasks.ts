import { DiagnosticSink, logDiagnostic } from "../dataset/diagnostics";
import { RAPIDTaskInfo, createRAPIDTaskInfo } from "../dataset/records";
import { rwsResources } from "../dataset/resources";
import { findListItems, spanText } from "../utility/xml";
import { parseDocument } from "./document";

/**
 * Parser for the RAPID task list.
 *
 * Expected structure:
 * <li class="rap-task-li" title="T_ROB1">
 *   <span class="name">T_ROB1</span>
 *   <span class="excstate">read</span>
 *   <span class="active">On</span>
 *   <span class="motiontask">TRUE</span>
 * </li>
 */
export function parseRapidTasksResponse(
  xml: string,
  sink: DiagnosticSink = logDiagnostic
): RAPIDTaskInfo[] {
  const root = parseDocument(xml, rwsResources.rapidTasks);
  return findListItems(root, "rap-task-li").map((item) =>
    createRAPIDTaskInfo(
      {
        name: spanText(item, "name"),
        isMotionTask: spanText(item, "motiontask"),
        isActive: spanText(item, "active"),
        executionState: spanText(item, "excstate"),
      },
      sink
    )
  );
}
