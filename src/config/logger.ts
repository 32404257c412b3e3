import pino from "pino";
import { loadSharedConfig } from "./shared.js";

const config = loadSharedConfig();

export const logger = pino({
  name: "mailsieve",
  level: config.logLevel,
  redact: ["credentials.pass", "auth.pass"],
  transport:
    config.env === "development"
      ? {
          target: "pino/file",
          options: { destination: 1 },
        }
      : undefined,
});
