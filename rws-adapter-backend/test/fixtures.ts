import { readFileSync } from "fs";
import path from "path";

export function fixture(name: string): string {
  return readFileSync(path.join(__dirname, "fixtures", name), "utf8");
}
