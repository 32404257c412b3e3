import { z } from "zod";
import { loadSharedConfig, type SharedConfig } from "./shared.js";

const flag = (fallback: "true" | "false") =>
  z.preprocess(
    (v) => (v === undefined ? fallback : v),
    z.string().transform((v) => v === "true")
  );

const daemonEnvSchema = z.object({
  IMAP_HOST: z.string().min(1),
  IMAP_PORT: z.coerce.number().int().min(1).max(65535).default(993),
  IMAP_SECURE: flag("true"),
  IMAP_USER: z.string().min(1),
  IMAP_PASSWORD: z.string().default(""),
  IMAP_MAILBOX: z.string().default("INBOX"),
  SMTP_HOST: z.string().min(1),
  SMTP_PORT: z.coerce.number().int().min(1).max(65535).default(465),
  SMTP_SECURE: flag("true"),
  SMTP_USER: z.string().default(""),
  SMTP_PASSWORD: z.string().default(""),
  RECONNECT_INITIAL_DELAY_MS: z.coerce.number().int().min(1).default(60_000),
  RECONNECT_MAX_DELAY_MS: z.coerce.number().int().min(1).default(3_600_000),
  IDLE_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .min(1000)
    .default(29 * 60_000 - 1000),
  PROFILE_PATH: z.string().default("./config/profile.json"),
});

type DaemonEnv = z.infer<typeof daemonEnvSchema>;

export interface SmtpCredentials {
  host: string;
  port: number;
  secure: boolean;
  /** `pass` is empty when the relay accepts unauthenticated submission. */
  auth: { user: string; pass: string };
}

type DaemonSpecificConfig = {
  imap: {
    host: DaemonEnv["IMAP_HOST"];
    port: DaemonEnv["IMAP_PORT"];
    secure: DaemonEnv["IMAP_SECURE"];
    user: DaemonEnv["IMAP_USER"];
    /** Empty when the password is expected on the command line. */
    pass: DaemonEnv["IMAP_PASSWORD"];
    mailbox: DaemonEnv["IMAP_MAILBOX"];
  };
  smtp: SmtpCredentials;
  reconnect: {
    initialDelayMs: number;
    maxDelayMs: number;
  };
  idleTimeoutMs: number;
  profilePath: string;
};

export type DaemonConfig = SharedConfig & DaemonSpecificConfig;

let cachedDaemonConfig: DaemonConfig | undefined;

export function loadDaemonConfig(): DaemonConfig {
  if (cachedDaemonConfig) {
    return cachedDaemonConfig;
  }

  const sharedConfig = loadSharedConfig();
  const parsed = daemonEnvSchema.safeParse(process.env);

  if (!parsed.success) {
    console.error("❌ Invalid environment variables:");
    console.error(parsed.error.flatten().fieldErrors);
    process.exit(1);
  }

  const env = parsed.data;

  // SMTP login falls back to the IMAP account, as most providers share them
  const smtpUser = env.SMTP_USER || env.IMAP_USER;
  const smtpPass = env.SMTP_PASSWORD || env.IMAP_PASSWORD;

  cachedDaemonConfig = {
    ...sharedConfig,
    imap: {
      host: env.IMAP_HOST,
      port: env.IMAP_PORT,
      secure: env.IMAP_SECURE,
      user: env.IMAP_USER,
      pass: env.IMAP_PASSWORD,
      mailbox: env.IMAP_MAILBOX,
    },
    smtp: {
      host: env.SMTP_HOST,
      port: env.SMTP_PORT,
      secure: env.SMTP_SECURE,
      auth: { user: smtpUser, pass: smtpPass },
    },
    reconnect: {
      initialDelayMs: env.RECONNECT_INITIAL_DELAY_MS,
      maxDelayMs: Math.max(env.RECONNECT_MAX_DELAY_MS, env.RECONNECT_INITIAL_DELAY_MS),
    },
    idleTimeoutMs: env.IDLE_TIMEOUT_MS,
    profilePath: env.PROFILE_PATH,
  };

  return cachedDaemonConfig;
}

/**
 * Password given on the command line wins over the environment. The SMTP
 * login keeps its own password when one was configured.
 */
export function withPassword(config: DaemonConfig, password: string): DaemonConfig {
  const smtpPass =
    config.smtp.auth.pass && config.smtp.auth.pass !== config.imap.pass
      ? config.smtp.auth.pass
      : password;
  return {
    ...config,
    imap: { ...config.imap, pass: password },
    smtp: { ...config.smtp, auth: { user: config.smtp.auth.user, pass: smtpPass } },
  };
}
