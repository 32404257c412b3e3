import nodemailer from "nodemailer";
import type { SmtpCredentials } from "../config/daemon.js";
import { logger } from "../config/logger.js";
import { DeliveryError } from "../errors/index.js";
import type { SendFn } from "../types/index.js";

const transporters = new WeakMap<SmtpCredentials, nodemailer.Transporter>();

function getTransporter(credentials: SmtpCredentials): nodemailer.Transporter {
  let transporter = transporters.get(credentials);
  if (!transporter) {
    if (!credentials.host) {
      throw new Error("SMTP host is not configured");
    }

    transporter = nodemailer.createTransport({
      host: credentials.host,
      port: credentials.port,
      secure: credentials.secure,
      auth: credentials.auth.pass ? credentials.auth : undefined,
    });
    transporters.set(credentials, transporter);
  }
  return transporter;
}

/**
 * Submit a prebuilt message. Failures are raised as `DeliveryError` and are
 * never retried here.
 */
export const sendViaSmtp: SendFn = async (credentials, from, to, message) => {
  try {
    const info = await getTransporter(credentials).sendMail({
      envelope: { from, to },
      raw: message,
    });
    logger.debug({ to, response: info.response }, "Message submitted");
  } catch (err) {
    throw new DeliveryError(to, { cause: err });
  }
};

export async function verifyTransport(credentials: SmtpCredentials): Promise<boolean> {
  try {
    await getTransporter(credentials).verify();
    logger.info({ host: credentials.host }, "SMTP transport verified");
    return true;
  } catch (err) {
    logger.warn({ error: err }, "SMTP verification failed");
    return false;
  }
}

export function resetTransporter(credentials: SmtpCredentials): void {
  transporters.get(credentials)?.close();
  transporters.delete(credentials);
}
