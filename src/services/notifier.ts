import { describeError } from "../errors.js";
import type { Notifier } from "../types.js";

/**
 * Best-effort failure report. If the report itself cannot be delivered we
 * log it and stop there, never notifying about the failed notification.
 */
export async function reportFailure(notifier: Notifier, text: string): Promise<boolean> {
  try {
    await notifier.send(text);
    return true;
  } catch (err) {
    console.error(`  -> Failure report not delivered:`, describeError(err));
    return false;
  }
}

// Telegram "Markdown" treats these as formatting; error text can contain any of them.
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, "\\$1");
}

/** Bold entity; escapes are not honoured inside it, so only a closing `*` is dropped. */
export function bold(text: string): string {
  return `*${text.replace(/\*/g, "")}*`;
}
