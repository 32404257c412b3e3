import { readFileSync } from "node:fs";
import { z } from "zod";
import { FatalConfigurationError } from "../errors/index.js";

const address = z.string().min(1);
const addressList = z.array(address).min(1);
const templates = z.object({ en: z.string() }).catchall(z.string());

const profileSchema = z.object({
  /** Own domain, matched as a substring of From/To, e.g. `@example.com`. */
  domain: address,
  proxyTo: address,
  folders: z.object({
    work: z.string().min(1),
    later: z.string().min(1),
    read: z.string().min(1),
    hints: z.string().min(1),
  }),
  senders: z.object({
    work: addressList,
    newsletters: addressList,
    forTheRecord: addressList,
    rejected: addressList,
  }),
  autoReply: z.object({
    forwardTo: address,
    forwardBy: address,
    replyFrom: address,
    reply: templates,
    forwardNote: templates,
  }),
  reject: z.object({
    replyFrom: address,
    reply: templates,
  }),
  proxy: z.object({
    sendFrom: address,
    storeFolder: z.string().min(1),
    device: z.object({ from: address, to: address }),
    userAgent: z.string().min(1),
    fetchTimeoutMs: z.number().int().positive().default(30_000),
    maxDownloadBytes: z.number().int().positive().default(100 * 1024 * 1024),
    imageTimeoutMs: z.number().int().positive().default(10_000),
    maxImages: z.number().int().nonnegative().default(100),
    deobfuscators: z
      .array(
        z.object({
          domainSuffix: z.string().min(1),
          variant: z.enum(["shiftedAlphabet"]),
        })
      )
      .default([]),
  }),
});

export type Profile = z.infer<typeof profileSchema>;

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/** Validate a profile value; the result is frozen. */
export function parseProfile(input: unknown): Profile {
  const parsed = profileSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new FatalConfigurationError(`Invalid profile: ${issues}`);
  }
  return deepFreeze(parsed.data);
}

export function loadProfile(path: string): Profile {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    throw new FatalConfigurationError(`Cannot read profile ${path}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new FatalConfigurationError(`Profile ${path} is not valid JSON`, { cause: err });
  }

  return parseProfile(json);
}
