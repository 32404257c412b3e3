/**
 * Error taxonomy. Only `FatalConfigurationError` stops the daemon; transport
 * failures are retried by the supervisor and everything else is recovered
 * where it happens.
 */
export class MailsieveError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Connection or socket failure on the mailbox session. */
export class TransportError extends MailsieveError {}

/** A rule's search was refused; aborts the whole wake-up. */
export class SearchError extends TransportError {
  constructor(
    readonly rule: string,
    readonly status: string
  ) {
    super(`Search for rule "${rule}" failed with ${status}`);
  }
}

/** A pipeline step answered NO or BAD; ends that rule's pipeline only. */
export class ProtocolError extends MailsieveError {
  constructor(
    readonly rule: string,
    readonly step: string,
    readonly status: string
  ) {
    super(`Rule "${rule}" halted: ${step} failed with ${status}`);
  }
}

export class DeliveryError extends MailsieveError {
  constructor(
    readonly recipient: string,
    options?: { cause?: unknown }
  ) {
    super(`Delivery to ${recipient} failed: ${describeError(options?.cause)}`, options);
  }
}

export class ContentFetchError extends MailsieveError {
  constructor(
    readonly url: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to fetch ${url}: ${reason}`, options);
  }
}

export class FatalConfigurationError extends MailsieveError {}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (err === undefined) return "Unknown error";
  return String(err);
}
