import { SMTPServer } from "smtp-server";

export interface CapturedMessage {
  mailFrom: string | undefined;
  rcptTo: string[];
  /** Login used for the submission, if any. */
  user: string | undefined;
  raw: Buffer;
}

export interface CaptureServer {
  messages: CapturedMessage[];
  start: () => Promise<void>;
  stop: () => Promise<void>;
}

/** In-process SMTP relay that keeps every submitted message. */
export function createCaptureServer(host: string, port: number): CaptureServer {
  const messages: CapturedMessage[] = [];

  const server = new SMTPServer({
    authOptional: true,
    allowInsecureAuth: true,
    disabledCommands: ["STARTTLS"],
    onAuth(auth, _session, callback) {
      callback(null, { user: auth.username });
    },
    onData(stream, session, callback) {
      const chunks: Buffer[] = [];
      stream.on("data", (chunk: Buffer) => chunks.push(chunk));
      stream.on("end", () => {
        messages.push({
          mailFrom: session.envelope.mailFrom ? session.envelope.mailFrom.address : undefined,
          rcptTo: session.envelope.rcptTo.map((r) => r.address),
          user: typeof session.user === "string" ? session.user : undefined,
          raw: Buffer.concat(chunks),
        });
        callback();
      });
    },
  });

  return {
    messages,
    start: () =>
      new Promise<void>((resolve, reject) => {
        server.once("error", reject);
        server.listen(port, host, () => resolve());
      }),
    stop: () =>
      new Promise<void>((resolve) => {
        server.close(() => resolve());
      }),
  };
}
