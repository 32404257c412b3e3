import { startDaemon } from "./app.js";
import { loadProfile } from "./config/profile.js";
import { describeError } from "./errors/index.js";
import { compileFilter, match, parseJsonFilter } from "./query/index.js";
import { buildRuleTable, describeStep } from "./rules/index.js";

const DEFAULT_PROFILE = "./config/profile.json";

function printUsage(): void {
  console.log(`
Usage: tsx src/cli.ts <command> [options]

Commands:
  run [--once] [--password <pw>]   Process the mailbox; with --once a single pass
  rules [--profile <path>]         List the rule table with compiled queries
  query <json>                     Compile a filter to IMAP SEARCH criteria

Filter JSON:
  '{"allOf":[{"from":"@example.com"},{"not":{"anyOf":[{"to":"@"},{"cc":"@"}]}}]}'

  Keys: from, to, cc, subject (string or string array), anyOf, allOf, not
`.trim());
}

function parseArgs(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith("--")) {
      const key = args[i].slice(2);
      const value = args[i + 1];
      if (value && !value.startsWith("--")) {
        result[key] = value;
        i++;
      } else {
        result[key] = "true";
      }
    }
  }
  return result;
}

function listRules(profilePath: string): void {
  const rules = buildRuleTable(loadProfile(profilePath));

  console.log(`\n${"#".padEnd(4)} ${"Name".padEnd(16)} Steps`);
  console.log("-".repeat(100));
  rules.forEach((rule, index) => {
    console.log(
      `${String(index + 1).padEnd(4)} ${rule.name.padEnd(16)} ${rule.steps.map(describeStep).join(" -> ")}`
    );
    console.log(`${"".padEnd(21)} ${compileFilter(rule.filter)}`);
  });
  console.log(`\nTotal: ${rules.length} rule(s)`);
}

function compileQuery(raw: string): void {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error("Invalid JSON filter");
  }
  console.log(compileFilter(match(parseJsonFilter(parsed))));
}

async function runCommand(opts: Record<string, string>): Promise<void> {
  const result = await startDaemon({
    once: opts.once === "true",
    password: opts.password,
  });

  if (result) {
    console.log(`Matched: ${result.matched.join(", ") || "-"}`);
    for (const failure of result.halted) {
      console.log(`Halted:  ${failure.message}`);
    }
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === "--help" || command === "-h") {
    printUsage();
    process.exit(0);
  }

  switch (command) {
    case "run":
      await runCommand(parseArgs(args.slice(1)));
      break;
    case "rules": {
      const opts = parseArgs(args.slice(1));
      listRules(opts.profile ?? process.env.PROFILE_PATH ?? DEFAULT_PROFILE);
      break;
    }
    case "query": {
      const raw = args[1];
      if (!raw) {
        console.error("Usage: query <json>");
        process.exit(1);
      }
      compileQuery(raw);
      break;
    }
    default:
      console.error(`Unknown command: ${command}`);
      printUsage();
      process.exit(1);
  }
}

main()
  .then(() => process.exit(0))
  .catch((err) => {
    console.error(`Error: ${describeError(err)}`);
    process.exit(1);
  });
