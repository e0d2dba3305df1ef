// src/dataset/diagnostics.ts

import logger from "../utility/logger";

/**
 * Anomalies seen while building the model from controller responses. None of
 * them stop construction; they are reported so the raw input is not lost.
 */
export type Diagnostic =
  | {
      kind: "unrecognized-enum-value";
      enumName: string;
      field: string;
      raw: string;
      fallback: string;
    }
  | { kind: "duplicate-signal"; signal: string }
  | { kind: "unsupported-signal-type"; signal: string; signalType: string };

export type DiagnosticSink = (diagnostic: Diagnostic) => void;

export function describeDiagnostic(diagnostic: Diagnostic): string {
  switch (diagnostic.kind) {
    case "unrecognized-enum-value":
      return `Unrecognized ${diagnostic.enumName} value "${diagnostic.raw}" in field '${diagnostic.field}', using "${diagnostic.fallback}"`;
    case "duplicate-signal":
      return `Signal '${diagnostic.signal}' reported more than once, keeping the last value`;
    case "unsupported-signal-type":
      return `Signal '${diagnostic.signal}' has unsupported type "${diagnostic.signalType}", skipped`;
  }
}

export const logDiagnostic: DiagnosticSink = (diagnostic) => {
  logger.warn(describeDiagnostic(diagnostic));
};

export function collectDiagnostics(): {
  sink: DiagnosticSink;
  diagnostics: Diagnostic[];
} {
  const diagnostics: Diagnostic[] = [];
  return { sink: (d) => diagnostics.push(d), diagnostics };
}
