import { buildMessage } from "../composer/index.js";
import { logger } from "../config/logger.js";
import type { HandlerContext, RejectAndDeleteParams, StepResult } from "../types/index.js";
import { claimItem, pickTemplate, sendBestEffort } from "./common.js";

const REJECT_ID_DOMAIN = "rejected";

/** Delete and expunge the whole batch, then send one rejection per new message. */
export async function rejectAndDelete(
  params: RejectAndDeleteParams,
  uids: readonly number[],
  seen: Set<string>,
  ctx: HandlerContext
): Promise<StepResult> {
  const fetched = await ctx.session.fetch(uids);

  const deleted = await ctx.session.storeFlags(uids, ["\\Deleted"]);
  const expunged = await ctx.session.expunge();
  if (deleted.status !== "OK" || expunged.status !== "OK") {
    logger.warn(
      { uids, store: deleted.status, expunge: expunged.status },
      "Rejected messages were not fully removed"
    );
  }

  if (fetched.status !== "OK") {
    return { status: fetched.status, data: fetched.data, seen };
  }

  for (const raw of fetched.data) {
    const item = await claimItem(raw, seen, "rejectAndDelete");
    if (!item) continue;

    const { message, sender } = item;
    if (!sender) {
      logger.warn({ uid: item.uid }, "No sender address, rejection skipped");
      continue;
    }

    const reply = pickTemplate(params.reply, message);
    logger.info({ uid: item.uid, sender, lang: reply.lang }, "Rejecting message");

    const rejection = await buildMessage({
      subject: message.subject ?? "",
      from: params.replyFrom,
      to: sender,
      body: reply.text,
      subjectPrefix: "Re:",
      inReplyTo: message.messageId,
      messageIdDomain: REJECT_ID_DOMAIN,
    });
    await sendBestEffort(ctx, params.replyFrom, sender, rejection, "rejection");
  }

  return { status: "OK", data: fetched.data, seen };
}
