import { logger } from "../config/logger.js";
import type { DedupWindow } from "../dedup/index.js";
import { ProtocolError, SearchError } from "../errors/index.js";
import * as handlers from "../handlers/index.js";
import { compileFilter } from "../query/index.js";
import type {
  ContentHandler,
  HandlerContext,
  HandlerStep,
  MailboxReply,
  RuleTable,
  StepResult,
} from "../types/index.js";

export * from "./steps.js";

const DELETED = "\\Deleted";

function toResult(reply: MailboxReply, seen: Set<string>): StepResult {
  return { status: reply.status, data: reply.data, seen };
}

function runContentHandler(
  handler: ContentHandler,
  uids: readonly number[],
  seen: Set<string>,
  ctx: HandlerContext
): Promise<StepResult> {
  switch (handler.kind) {
    case "autoForwardReply":
      return handlers.autoForwardReply(handler.params, uids, seen, ctx);
    case "rejectAndDelete":
      return handlers.rejectAndDelete(handler.params, uids, seen, ctx);
    case "fetchProxy":
      return handlers.fetchProxy(handler.params, uids, seen, ctx);
  }
}

/** Run one step against the matched set. A status other than OK halts the rule. */
export async function runStep(
  step: HandlerStep,
  uids: readonly number[],
  seen: Set<string>,
  ctx: HandlerContext
): Promise<StepResult> {
  const { session } = ctx;

  switch (step.kind) {
    case "expunge":
      return toResult(await session.expunge(), seen);
    case "delete":
      return toResult(await session.storeFlags(uids, [DELETED]), seen);
    case "copy":
      return toResult(await session.copy(uids, step.folder), seen);
    case "move": {
      const copied = await session.copy(uids, step.folder);
      if (copied.status !== "OK") return toResult(copied, seen);
      return toResult(await session.storeFlags(uids, [DELETED]), seen);
    }
    case "setFlags":
      return toResult(await session.storeFlags(uids, step.flags), seen);
    case "setFlagsAndMove": {
      const flagged = await session.storeFlags(uids, step.flags);
      if (flagged.status !== "OK") return toResult(flagged, seen);
      return runStep({ kind: "move", folder: step.folder }, uids, seen, ctx);
    }
    case "content":
      return runContentHandler(step.handler, uids, seen, ctx);
  }
}

export interface PassResult {
  /** Rules whose search matched at least one message. */
  matched: string[];
  /** One entry per rule whose pipeline stopped at a failed step. */
  halted: ProtocolError[];
}

/**
 * One wake-up: rotate the dedup window, then search and run every rule in
 * table order. A refused search aborts the pass with `SearchError`; a failed
 * step only ends its own rule.
 */
export async function runRuleTable(
  rules: RuleTable,
  window: DedupWindow,
  ctx: HandlerContext,
  signal?: AbortSignal
): Promise<PassResult> {
  const result: PassResult = { matched: [], halted: [] };
  window.rotate();

  for (const rule of rules) {
    if (signal?.aborted) break;

    const found = await ctx.session.search({ text: compileFilter(rule.filter), filter: rule.filter });
    if (found.status !== "OK") {
      throw new SearchError(rule.name, found.status);
    }

    const uids = found.data;
    if (uids.length === 0) continue;

    result.matched.push(rule.name);
    logger.info({ rule: rule.name, count: uids.length }, "Rule matched");

    const seen = window.beginRule();
    try {
      for (const step of rule.steps) {
        if (signal?.aborted) break;
        const outcome = await runStep(step, uids, seen, ctx);
        if (outcome.status !== "OK") {
          const failure = new ProtocolError(rule.name, step.kind, outcome.status);
          logger.warn({ rule: rule.name, step: step.kind, status: outcome.status }, "Pipeline halted");
          result.halted.push(failure);
          break;
        }
      }
    } finally {
      window.endRule(seen);
    }
  }

  return result;
}
