// Rule Kernel - diagnostics channel (v1)
//
// Every diagnostic carries the declaration title. The kernel returns
// non-fatal diagnostics with each compile result and, when a sink is
// supplied, reports all of them (fatal ones included) as they happen.

/**
 * Frozen diagnostic codes.
 */
export type DiagnosticCodeV1 = "PRIORITY_DEPRECATED" | "INVALID_ADDRESSES_SKIPPED" | "ALL_ADDRESSES_INVALID";

export type DiagnosticLevelV1 = "notice" | "warning" | "error";

export interface DiagnosticV1 {
  level: DiagnosticLevelV1;
  code: DiagnosticCodeV1;

  // Declaration title the diagnostic refers to.
  title: string;

  message: string;

  // Address tokens involved, when the diagnostic is about addresses.
  tokens?: string[];
}

/**
 * Receiver for diagnostics, e.g. a logger adapter.
 */
export interface DiagnosticSinkV1 {
  report(diagnostic: DiagnosticV1): void;
}
