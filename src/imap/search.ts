import type { SearchObject } from "imapflow";
import type { FilterExpression, FilterField } from "../types/index.js";

function fieldMatch(field: FilterField, value: string): SearchObject {
  switch (field) {
    case "FROM":
      return { from: value };
    case "TO":
      return { to: value };
    case "CC":
      return { cc: value };
    case "SUBJECT":
      return { subject: value };
  }
}

function conjoin(left: SearchObject, right: SearchObject): SearchObject {
  const overlaps = Object.keys(right).some((key) => key in left);
  if (!overlaps) {
    return { ...left, ...right };
  }
  // a AND b == NOT (NOT a OR NOT b)
  return { not: { or: [{ not: left }, { not: right }] } };
}

/**
 * Translate a filter into imapflow's search object. `or` is nested pairwise
 * from the left so the server receives the same tree as `compileFilter`
 * prints. Children of `not` follow IMAP list semantics: the first key is
 * negated and the rest are AND-ed, as `(NOT a b)` is read by the server.
 */
export function toSearchObject(expression: FilterExpression): SearchObject {
  switch (expression.kind) {
    case "match":
      return fieldMatch(expression.field, expression.value);
    case "or":
      return expression.children
        .map(toSearchObject)
        .reduce((left, right) => ({ or: [left, right] }));
    case "and":
      return expression.children.map(toSearchObject).reduce(conjoin);
    case "not": {
      const [first, ...rest] = expression.children.map(toSearchObject);
      return rest.reduce(conjoin, { not: first });
    }
  }
}
