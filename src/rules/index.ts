import type { Profile } from "../config/profile.js";
import {
  autoForwardReply,
  expunge,
  fetchProxy,
  moveTo,
  rejectAndDelete,
  setFlags,
} from "../pipeline/index.js";
import { allOf, anyOf, ccs, froms, match, not, tos } from "../query/index.js";
import type { HandlerStep, Rule, RuleTable } from "../types/index.js";

const SEEN = "\\Seen";

/**
 * Rule table for a profile. Order matters: earlier rules move their matches
 * out of the mailbox before later, broader rules search.
 */
export function buildRuleTable(profile: Profile): RuleTable {
  const { domain, folders, senders } = profile;

  const rules: Rule[] = [
    {
      name: "work",
      filter: match(anyOf(froms(...senders.work))),
      steps: [autoForwardReply(profile.autoReply), setFlags(SEEN), moveTo(folders.work), expunge()],
    },
    {
      name: "newsletters",
      filter: match(anyOf(tos(...senders.newsletters))),
      steps: [moveTo(folders.later), expunge()],
    },
    {
      name: "for-the-record",
      filter: match(anyOf(tos(...senders.forTheRecord))),
      steps: [setFlags(SEEN), moveTo(folders.read), expunge()],
    },
    {
      name: "rejected",
      filter: match(anyOf(froms(...senders.rejected))),
      steps: [rejectAndDelete(profile.reject)],
    },
    {
      name: "proxy",
      filter: match(allOf(froms(domain), tos(profile.proxyTo))),
      steps: [fetchProxy(profile.proxy), setFlags(SEEN), moveTo(folders.read), expunge()],
    },
    {
      name: "hints",
      filter: match(allOf(froms(domain), anyOf(tos(domain), not(anyOf(tos("@"), ccs("@")))))),
      steps: [setFlags(SEEN), moveTo(folders.hints), expunge()],
    },
    {
      name: "self",
      filter: match(anyOf(froms(domain))),
      steps: [setFlags(SEEN), moveTo(folders.read), expunge()],
    },
  ];

  return Object.freeze(rules.map((rule) => Object.freeze(rule)));
}

export function describeStep(step: HandlerStep): string {
  switch (step.kind) {
    case "expunge":
    case "delete":
      return step.kind;
    case "copy":
    case "move":
      return `${step.kind}(${step.folder})`;
    case "setFlags":
      return `setFlags(${step.flags.join(" ")})`;
    case "setFlagsAndMove":
      return `setFlagsAndMove(${step.flags.join(" ")}, ${step.folder})`;
    case "content":
      return step.handler.kind;
  }
}
