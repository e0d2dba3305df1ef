import {
  RobotWareOptionInfo,
  createRobotWareOptionInfo,
} from "../dataset/records";
import { rwsResources } from "../dataset/resources";
import { findListItems, spanText } from "../utility/xml";
import { parseDocument } from "./document";

export function parseRobotWareOptionsResponse(
  xml: string
): RobotWareOptionInfo[] {
  const root = parseDocument(xml, rwsResources.robotWareOptions);
  return findListItems(root, "sys-option-li").map((item) =>
    createRobotWareOptionInfo({
      name: spanText(item, "option"),
      description: spanText(item, "description"),
    })
  );
}
