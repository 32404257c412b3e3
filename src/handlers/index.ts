export { autoForwardReply } from "./auto-reply.js";
export { rejectAndDelete } from "./reject.js";
export { fetchProxy, parseProxyOptions, extractUrls } from "./proxy.js";
export { canonicalId } from "./common.js";
