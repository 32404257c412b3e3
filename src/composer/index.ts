import { randomUUID } from "node:crypto";
import { hostname } from "node:os";
import MailComposer from "nodemailer/lib/mail-composer/index.js";
import type Mail from "nodemailer/lib/mailer/index.js";
import type { OutgoingMessageInput } from "../types/index.js";

export function makeMessageId(domain: string = hostname()): string {
  return `<${randomUUID()}@${domain}>`;
}

/**
 * Build an RFC 5322 message. A fresh Message-ID is assigned unless one is
 * given; `inReplyTo` also becomes `References`.
 */
export function buildMessage(input: OutgoingMessageInput): Promise<Buffer> {
  const subject = input.subjectPrefix
    ? `${input.subjectPrefix} ${input.subject}`
    : input.subject;

  const headers: Record<string, string> = {};
  if (input.contentLanguage) {
    headers["Content-Language"] = input.contentLanguage;
  }

  const options: Mail.Options = {
    subject,
    from: input.from,
    to: input.to,
    replyTo: input.replyTo,
    messageId: input.messageId ?? makeMessageId(input.messageIdDomain),
    date: new Date(),
    inReplyTo: input.inReplyTo,
    references: input.inReplyTo,
    text: input.body,
    headers,
    attachments: input.attachment
      ? [
          {
            content: input.attachment.content,
            contentType: input.attachment.contentType,
            filename: input.attachment.filename,
          },
        ]
      : undefined,
  };

  return new Promise((resolve, reject) => {
    new MailComposer(options).compile().build((err, message) => {
      if (err) {
        reject(err);
        return;
      }
      resolve(message);
    });
  });
}
