import type { DuplicatePlaceholderIdIssue, NodeRef } from "../../schema/issue.js";
import type { MappedPrimitive } from "../../style/style-mapper.js";

/**
 * Detect placeholder identifiers used more than once.
 * Returns one issue per shared identifier, naming every node that uses it.
 */
export function detectDuplicatePlaceholders(
  mapped: MappedPrimitive[]
): DuplicatePlaceholderIdIssue[] {
  const byId = new Map<string, NodeRef[]>();
  for (const { primitive, ref } of mapped) {
    if (primitive.kind !== "placeholder") continue;
    const refs = byId.get(primitive.id);
    if (refs) refs.push(ref);
    else byId.set(primitive.id, [ref]);
  }

  const issues: DuplicatePlaceholderIdIssue[] = [];
  for (const [placeholderId, refs] of byId) {
    if (refs.length < 2) continue;
    issues.push({
      kind: "DuplicatePlaceholderId",
      nodes: refs,
      detail: `placeholder id "${placeholderId}" is used by ${refs.length} elements`,
      placeholderId,
    });
  }
  return issues;
}
