import type { FilterExpression, FilterField } from "../types/index.js";

/**
 * Composable IMAP SEARCH expressions.
 *
 *   match(anyOf(froms("boss@", "@workplace.edu")))
 *   match(allOf(froms("@example.com"), tos("inbox@")))
 *   match(allOf(froms("@example.com"), anyOf(tos("@example.com"), not(anyOf(tos("@"), ccs("@"))))))
 *
 * Field helpers return lists; combinators flatten their list arguments and
 * return a one-element list, so builders nest without wrapping.
 */

function fieldMatches(field: FilterField, values: string[]): FilterExpression[] {
  if (values.length === 0) {
    throw new Error(`${field} filter needs at least one value`);
  }
  return values.map((value) => ({ kind: "match", field, value }));
}

export const froms = (...values: string[]) => fieldMatches("FROM", values);
export const tos = (...values: string[]) => fieldMatches("TO", values);
export const ccs = (...values: string[]) => fieldMatches("CC", values);
export const subjects = (...values: string[]) => fieldMatches("SUBJECT", values);

function flatten(kind: string, groups: FilterExpression[][]): FilterExpression[] {
  const children = groups.flat();
  if (children.length === 0) {
    throw new Error(`${kind} needs at least one operand`);
  }
  return children;
}

/** Any operand must match. */
export function anyOf(...groups: FilterExpression[][]): FilterExpression[] {
  return [{ kind: "or", children: flatten("anyOf", groups) }];
}

/** All operands must match. */
export function allOf(...groups: FilterExpression[][]): FilterExpression[] {
  return [{ kind: "and", children: flatten("allOf", groups) }];
}

export function not(...groups: FilterExpression[][]): FilterExpression[] {
  return [{ kind: "not", children: flatten("not", groups) }];
}

/** Final expression of a builder list; several top-level entries are OR-ed. */
export function match(expressions: FilterExpression[]): FilterExpression {
  if (expressions.length === 0) {
    throw new Error("match needs at least one expression");
  }
  return expressions.length === 1
    ? expressions[0]
    : { kind: "or", children: expressions };
}

function quote(value: string): string {
  return `"${value.replace(/[\\"]/g, (c) => `\\${c}`)}"`;
}

/**
 * Compile to SEARCH criteria. OR and AND fold to the left one pair at a
 * time, `(OR (OR a b) c)`. The nesting is part of the wire format and must
 * not be flattened.
 */
export function compileFilter(expression: FilterExpression): string {
  switch (expression.kind) {
    case "match":
      return `(${expression.field} ${quote(expression.value)})`;
    case "or":
      return expression.children
        .map(compileFilter)
        .reduce((prev, next) => `(OR ${prev} ${next})`);
    case "and":
      return expression.children
        .map(compileFilter)
        .reduce((prev, next) => `(${prev} ${next})`);
    case "not":
      return `(NOT ${expression.children.map(compileFilter).join(" ")})`;
  }
}

const FIELD_KEYS = {
  from: "FROM",
  to: "TO",
  cc: "CC",
  subject: "SUBJECT",
} as const satisfies Record<string, FilterField>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toStrings(value: unknown, key: string): string[] {
  const list = Array.isArray(value) ? value : [value];
  return list.map((v) => {
    if (typeof v !== "string") {
      throw new Error(`"${key}" values must be strings`);
    }
    return v;
  });
}

/**
 * Parse the JSON form used on the command line, e.g.
 * `{"allOf":[{"from":"@example.com"},{"not":[{"to":"@"}]}]}`.
 */
export function parseJsonFilter(input: unknown): FilterExpression[] {
  if (Array.isArray(input)) {
    return input.flatMap(parseJsonFilter);
  }
  if (!isRecord(input)) {
    throw new Error("Filter must be an object or an array of objects");
  }
  const keys = Object.keys(input);
  if (keys.length !== 1) {
    throw new Error(`Filter objects take exactly one key, got: ${keys.join(", ") || "none"}`);
  }
  const key = keys[0];
  const value = input[key];
  switch (key) {
    case "from":
    case "to":
    case "cc":
    case "subject":
      return fieldMatches(FIELD_KEYS[key], toStrings(value, key));
    case "anyOf":
      return anyOf(parseJsonFilter(value));
    case "allOf":
      return allOf(parseJsonFilter(value));
    case "not":
      return not(parseJsonFilter(value));
    default:
      throw new Error(`Unknown filter key "${key}"`);
  }
}
