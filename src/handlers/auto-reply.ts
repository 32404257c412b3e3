import { buildMessage } from "../composer/index.js";
import { logger } from "../config/logger.js";
import type { AutoForwardReplyParams, HandlerContext, StepResult } from "../types/index.js";
import { claimItem, pickTemplate, sendBestEffort } from "./common.js";

const REPLY_ID_DOMAIN = "away";

/**
 * Forward each new message to the internal address, then answer the sender.
 * The reply goes out even when the forward failed.
 */
export async function autoForwardReply(
  params: AutoForwardReplyParams,
  uids: readonly number[],
  seen: Set<string>,
  ctx: HandlerContext
): Promise<StepResult> {
  const fetched = await ctx.session.fetch(uids);
  if (fetched.status !== "OK") {
    return { status: fetched.status, data: fetched.data, seen };
  }

  for (const raw of fetched.data) {
    const item = await claimItem(raw, seen, "autoForwardReply");
    if (!item) continue;

    const { message, sender } = item;
    const subject = message.subject ?? "";
    const reply = pickTemplate(params.reply, message);
    const note = pickTemplate(params.forwardNote, message);

    logger.info({ uid: item.uid, sender, lang: reply.lang }, "Auto forward and reply");

    const forward = await buildMessage({
      subject,
      from: params.forwardBy,
      to: params.forwardTo,
      body: note.text.replaceAll("{sender}", sender ?? "unknown sender"),
      subjectPrefix: "Fwd:",
      inReplyTo: message.messageId,
      replyTo: sender,
      attachment: { content: message.raw, contentType: "message/rfc822" },
    });
    await sendBestEffort(ctx, params.forwardBy, params.forwardTo, forward, "forward");

    if (!sender) {
      logger.warn({ uid: item.uid }, "No sender address, reply skipped");
      continue;
    }

    const answer = await buildMessage({
      subject,
      from: params.replyFrom,
      to: sender,
      body: reply.text,
      subjectPrefix: "Re:",
      inReplyTo: message.messageId,
      replyTo: params.forwardTo,
      messageIdDomain: REPLY_ID_DOMAIN,
    });
    await sendBestEffort(ctx, params.replyFrom, sender, answer, "reply");
  }

  return { status: "OK", data: fetched.data, seen };
}
