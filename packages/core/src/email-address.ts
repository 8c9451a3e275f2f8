import { InvalidRecipientError, InvalidSenderError } from "@relaymail/errors";
import { isValidDomainName } from "./domain-name.js";

const SENDER_LOCAL_PART = /^[a-zA-Z0-9._%+-]+$/;
const TEST_SENDER_PREFIX = /^[a-zA-Z0-9._-]+$/;
const RECIPIENT = /^[^@\s]+@[^@\s]+\.[^@\s]+$/;
// "Display Name <addr@domain>"
const DISPLAY_FORM = /^\s*(.*?)\s*<([^<>]+)>\s*$/;

export interface ParsedSender {
  address: string;
  displayName: string | null;
  localPart: string;
  /** Lower-cased; used to look the sending domain up by name. */
  domain: string;
}

/**
 * @throws InvalidSenderError for anything but `addr@domain` or
 * `Name <addr@domain>` with a plain local part
 */
export function parseSender(from: string): ParsedSender {
  const display = DISPLAY_FORM.exec(from);
  const address = (display?.[2] ?? from).trim();

  const at = address.indexOf("@");
  if (at <= 0 || at !== address.lastIndexOf("@")) {
    throw new InvalidSenderError(`Invalid sender address: ${from}`);
  }

  const localPart = address.slice(0, at);
  const domain = address.slice(at + 1).toLowerCase();
  if (!SENDER_LOCAL_PART.test(localPart)) {
    throw new InvalidSenderError(`Invalid sender prefix: ${localPart}`);
  }
  if (!isValidDomainName(domain)) {
    throw new InvalidSenderError(`Invalid sender domain: ${domain}`);
  }

  const name = display?.[1]?.replace(/^"(.*)"$/, "$1").trim();
  return { address, displayName: name ? name : null, localPart, domain };
}

export function isValidSenderPrefix(prefix: string): boolean {
  return TEST_SENDER_PREFIX.test(prefix);
}

export function isValidRecipient(address: string): boolean {
  return RECIPIENT.test(address);
}

/**
 * @throws InvalidRecipientError naming the first bad address
 */
export function assertRecipients(addresses: readonly string[]): void {
  for (const address of addresses) {
    if (!isValidRecipient(address)) {
      throw new InvalidRecipientError(address);
    }
  }
}
