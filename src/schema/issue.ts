/** Where an issue was found: element path plus its tag and id attribute */
export interface NodeRef {
  path: string;
  tag: string;
  id?: string;
}

export type IssueKind =
  | "DimensionMismatch"
  | "Overflow"
  | "UnsupportedGradient"
  | "StyleOnTextElement"
  | "DuplicatePlaceholderId";

export type Edge = "left" | "right" | "top" | "bottom";

export interface DimensionMismatchIssue {
  kind: "DimensionMismatch";
  nodes: NodeRef[];
  detail: string;
  declared: { width: number; height: number };
  requested: { width: number; height: number };
}

export interface OverflowIssue {
  kind: "Overflow";
  nodes: NodeRef[];
  detail: string;
  edge: Edge;
  /** Target units past the canvas edge */
  amount: number;
}

export interface UnsupportedGradientIssue {
  kind: "UnsupportedGradient";
  nodes: NodeRef[];
  detail: string;
}

export interface StyleOnTextElementIssue {
  kind: "StyleOnTextElement";
  nodes: NodeRef[];
  detail: string;
  properties: string[];
}

export interface DuplicatePlaceholderIdIssue {
  kind: "DuplicatePlaceholderId";
  nodes: NodeRef[];
  detail: string;
  placeholderId: string;
}

export type ValidationIssue =
  | DimensionMismatchIssue
  | OverflowIssue
  | UnsupportedGradientIssue
  | StyleOnTextElementIssue
  | DuplicatePlaceholderIdIssue;

export type WarningKind = "ManualBulletSymbol";

/** Informational finding that never fails a run */
export interface ConversionWarning {
  kind: WarningKind;
  node: NodeRef;
  detail: string;
}
