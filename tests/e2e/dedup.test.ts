import { describe, it, expect } from "vitest";
import { loadDaemonConfig } from "../../src/config/daemon.js";
import { loadProfile } from "../../src/config/profile.js";
import { EventLoop } from "../../src/loop/index.js";
import { autoForwardReply } from "../../src/pipeline/index.js";
import { anyOf, froms, match } from "../../src/query/index.js";
import { buildRuleTable } from "../../src/rules/index.js";
import { run } from "../../src/supervisor/index.js";
import { HtmlTransformer } from "../../src/transform/index.js";
import { FakeFetcher, createRecordingSend, testCredentials } from "../helpers/doubles.js";
import { FakeMailbox } from "../helpers/fake-mailbox.js";

const profile = loadProfile("config/profile.json");

const BOSS_MAIL = {
  from: "boss@workplace.edu",
  to: "me@example.com",
  subject: "Budget",
  messageId: "<budget@workplace.edu>",
};

describe("repeated wake-ups", () => {
  it("answers a message left in place on every other wake-up", async () => {
    const controller = new AbortController();
    const journal: string[] = [];
    const mailbox = new FakeMailbox(journal, { onIdleDrained: () => controller.abort() });
    mailbox.add(BOSS_MAIL);
    mailbox.idleOutcomes.push(true, true);
    const { send } = createRecordingSend(journal);
    const fetcher = new FakeFetcher();

    const loop = new EventLoop({
      rules: [
        {
          name: "work",
          filter: match(anyOf(froms("boss@"))),
          steps: [autoForwardReply(profile.autoReply)],
        },
      ],
      credentials: testCredentials,
      send,
      fetcher,
      transformer: new HtmlTransformer(fetcher),
      idleTimeoutMs: 1000,
    });

    await loop.runSession(mailbox, { once: false, signal: controller.signal });

    expect(loop.completedPasses).toBe(3);
    const search = 'SEARCH (FROM "boss@")';
    const answered = ["FETCH 1", "SEND Work <user@workplace.edu>", "SEND boss@workplace.edu"];
    expect(journal).toEqual([search, ...answered, search, "FETCH 1", search, ...answered]);
  });
});

describe("run", () => {
  it("files work mail through the full rule table in a single pass", async () => {
    const journal: string[] = [];
    const mailbox = new FakeMailbox(journal);
    const uid = mailbox.add(BOSS_MAIL);
    const { send, sent } = createRecordingSend(journal);

    const result = await run({
      config: loadDaemonConfig(),
      rules: buildRuleTable(profile),
      userAgent: profile.proxy.userAgent,
      once: true,
      connect: async () => mailbox,
      send,
    });

    expect(result).toEqual({ matched: ["work"], halted: [] });
    expect(journal.filter((entry) => !entry.startsWith("SEARCH"))).toEqual([
      `FETCH ${uid}`,
      "SEND Work <user@workplace.edu>",
      "SEND boss@workplace.edu",
      `STORE ${uid} \\Seen`,
      `COPY ${uid} INBOX.Work`,
      `STORE ${uid} \\Deleted`,
      "EXPUNGE",
    ]);
    expect(journal.filter((entry) => entry.startsWith("SEARCH"))).toHaveLength(7);
    expect(mailbox.messages).toEqual([]);
    expect(mailbox.folders.get("INBOX.Work")).toHaveLength(1);
    expect(mailbox.closed).toBe(true);
    expect(sent.map((m) => m.from)).toEqual([
      "Answermachine <work-forwarder@example.com>",
      "Answermachine <answermachine@example.com>",
    ]);
  });

  it("routes a note to the proxy address through the proxy rule", async () => {
    const journal: string[] = [];
    const mailbox = new FakeMailbox(journal);
    const uid = mailbox.add({
      from: "me@example.com",
      to: "ae2931cf@example.com",
      subject: "No links today",
      messageId: "<note@example.com>",
    });
    const { send, sent } = createRecordingSend(journal);

    const result = await run({
      config: loadDaemonConfig(),
      rules: buildRuleTable(profile),
      userAgent: profile.proxy.userAgent,
      once: true,
      connect: async () => mailbox,
      send,
    });

    expect(result).toEqual({ matched: ["proxy"], halted: [] });
    expect(sent).toEqual([]);
    expect(mailbox.folders.get("INBOX.Read")).toHaveLength(1);
    expect(journal).toContain(`COPY ${uid} INBOX.Read`);
  });
});
