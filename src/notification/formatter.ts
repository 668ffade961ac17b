/**
 * Message Formatter
 *
 * Error notifications are plain text so arbitrary error
 * messages need no escaping.
 */

import type { PollError } from '../review/types.js';

/**
 * Format a poll failure into the text sent to the chat.
 * The same text is used to suppress repeated alerts.
 */
export function formatErrorMessage(error: PollError): string {
  return `Program malfunction: ${error.message}`;
}
