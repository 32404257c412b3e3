import type {
  AutoForwardReplyParams,
  FetchProxyParams,
  HandlerStep,
  RejectAndDeleteParams,
} from "../types/index.js";

export const expunge = (): HandlerStep => ({ kind: "expunge" });

export const deleteMessages = (): HandlerStep => ({ kind: "delete" });

export const copyTo = (folder: string): HandlerStep => ({ kind: "copy", folder });

/** Copy, then flag the originals `\Deleted` if the copy succeeded. */
export const moveTo = (folder: string): HandlerStep => ({ kind: "move", folder });

export const setFlags = (...flags: string[]): HandlerStep => ({ kind: "setFlags", flags });

export const setFlagsAndMove = (flags: string[], folder: string): HandlerStep => ({
  kind: "setFlagsAndMove",
  flags,
  folder,
});

export const autoForwardReply = (params: AutoForwardReplyParams): HandlerStep => ({
  kind: "content",
  handler: { kind: "autoForwardReply", params },
});

export const rejectAndDelete = (params: RejectAndDeleteParams): HandlerStep => ({
  kind: "content",
  handler: { kind: "rejectAndDelete", params },
});

export const fetchProxy = (params: FetchProxyParams): HandlerStep => ({
  kind: "content",
  handler: { kind: "fetchProxy", params },
});
