import { describe, it, expect } from "vitest";
import { DedupWindow } from "../../src/dedup/index.js";
import { ProtocolError, SearchError } from "../../src/errors/index.js";
import {
  copyTo,
  deleteMessages,
  expunge,
  moveTo,
  runRuleTable,
  runStep,
  setFlags,
  setFlagsAndMove,
} from "../../src/pipeline/index.js";
import { froms, match } from "../../src/query/index.js";
import type { Rule } from "../../src/types/index.js";
import { createContext, createRecordingSend } from "../helpers/doubles.js";
import { FakeMailbox } from "../helpers/fake-mailbox.js";

function setup() {
  const journal: string[] = [];
  const mailbox = new FakeMailbox(journal);
  const { send } = createRecordingSend(journal);
  return { journal, mailbox, ctx: createContext(mailbox, send) };
}

describe("runStep", () => {
  it("moves by copying, then flagging the originals deleted", async () => {
    const { journal, mailbox, ctx } = setup();
    const uid = mailbox.add({ from: "a@example.org", to: "me@example.com", subject: "s" });

    const result = await runStep(moveTo("INBOX.Read"), [uid], new Set(), ctx);

    expect(result.status).toBe("OK");
    expect(journal).toEqual([`COPY ${uid} INBOX.Read`, `STORE ${uid} \\Deleted`]);
  });

  it("does not delete when the copy of a move fails", async () => {
    const { journal, mailbox, ctx } = setup();
    const uid = mailbox.add({ from: "a@example.org", to: "me@example.com", subject: "s" });
    mailbox.failNext("copy");

    const result = await runStep(moveTo("INBOX.Read"), [uid], new Set(), ctx);

    expect(result.status).toBe("NO");
    expect(journal).toEqual([`COPY ${uid} INBOX.Read`]);
  });

  it("sets flags before moving and stops when flagging fails", async () => {
    const { journal, mailbox, ctx } = setup();
    const uid = mailbox.add({ from: "a@example.org", to: "me@example.com", subject: "s" });

    await runStep(setFlagsAndMove(["\\Seen"], "INBOX.Read"), [uid], new Set(), ctx);
    expect(journal).toEqual([
      `STORE ${uid} \\Seen`,
      `COPY ${uid} INBOX.Read`,
      `STORE ${uid} \\Deleted`,
    ]);

    journal.length = 0;
    mailbox.failNext("store", "BAD");
    const result = await runStep(setFlagsAndMove(["\\Seen"], "INBOX.Read"), [uid], new Set(), ctx);
    expect(result.status).toBe("BAD");
    expect(journal).toEqual([`STORE ${uid} \\Seen`]);
  });

  it("passes the seen set through primitive steps", async () => {
    const { mailbox, ctx } = setup();
    const uid = mailbox.add({ from: "a@example.org", to: "me@example.com", subject: "s" });
    const seen = new Set(["<x@example.org>"]);

    const result = await runStep(copyTo("INBOX.Copy"), [uid], seen, ctx);

    expect(result.seen).toBe(seen);
  });
});

describe("runRuleTable", () => {
  it("runs rules in order and halts only the failing pipeline", async () => {
    const { journal, mailbox, ctx } = setup();
    const first = mailbox.add({ from: "news@example.org", to: "me@example.com", subject: "n" });
    const second = mailbox.add({ from: "boss@example.org", to: "me@example.com", subject: "b" });
    mailbox.failNext("store");

    const rules: Rule[] = [
      { name: "news", filter: match(froms("news@")), steps: [setFlags("\\Seen"), expunge()] },
      { name: "boss", filter: match(froms("boss@")), steps: [deleteMessages(), expunge()] },
    ];

    const result = await runRuleTable(rules, new DedupWindow(), ctx);

    expect(result.matched).toEqual(["news", "boss"]);
    expect(result.halted).toHaveLength(1);
    expect(result.halted[0]).toBeInstanceOf(ProtocolError);
    expect(result.halted[0]).toMatchObject({ rule: "news", step: "setFlags", status: "NO" });
    expect(result.halted[0].message).toBe('Rule "news" halted: setFlags failed with NO');
    expect(journal).toEqual([
      'SEARCH (FROM "news@")',
      `STORE ${first} \\Seen`,
      'SEARCH (FROM "boss@")',
      `STORE ${second} \\Deleted`,
      "EXPUNGE",
    ]);
    expect(mailbox.messages.map((m) => m.uid)).toEqual([first]);
  });

  it("skips the pipeline when nothing matches", async () => {
    const { journal, ctx } = setup();
    const rules: Rule[] = [{ name: "none", filter: match(froms("x@")), steps: [expunge()] }];

    const result = await runRuleTable(rules, new DedupWindow(), ctx);

    expect(result.matched).toEqual([]);
    expect(journal).toEqual(['SEARCH (FROM "x@")']);
  });

  it("aborts the wake-up when a search is refused", async () => {
    const { journal, mailbox, ctx } = setup();
    mailbox.failNext("search");
    const rules: Rule[] = [
      { name: "first", filter: match(froms("a@")), steps: [expunge()] },
      { name: "second", filter: match(froms("b@")), steps: [expunge()] },
    ];

    await expect(runRuleTable(rules, new DedupWindow(), ctx)).rejects.toBeInstanceOf(SearchError);
    expect(journal).toEqual(['SEARCH (FROM "a@")']);
  });

  it("starts no rule after shutdown was requested", async () => {
    const { journal, ctx } = setup();
    const controller = new AbortController();
    controller.abort();

    await runRuleTable(
      [{ name: "any", filter: match(froms("a@")), steps: [expunge()] }],
      new DedupWindow(),
      ctx,
      controller.signal
    );

    expect(journal).toEqual([]);
  });
});
