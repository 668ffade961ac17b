/**
 * Status Formatter
 *
 * Turns a homework record into the message sent to the chat.
 */

import { fail, isRecord, ok, type HomeworkStatus, type Result } from './types.js';

export const HOMEWORK_VERDICTS: Readonly<Record<HomeworkStatus, string>> = Object.freeze({
  approved: 'Работа проверена: ревьюеру всё понравилось. Ура!',
  reviewing: 'Работа взята на проверку ревьюером.',
  rejected: 'Работа проверена: у ревьюера есть замечания.',
});

const REQUIRED_FIELDS = ['homework_name', 'status'] as const;

function isHomeworkStatus(value: unknown): value is HomeworkStatus {
  return typeof value === 'string' && Object.hasOwn(HOMEWORK_VERDICTS, value);
}

export function formatStatus(homework: unknown): Result<string> {
  const record: Record<string, unknown> = isRecord(homework) ? homework : {};

  const missingKeys = REQUIRED_FIELDS.filter((key) => !(key in record));
  if (missingKeys.length > 0) {
    return fail({
      kind: 'MissingField',
      message: `Homework is missing keys: ${missingKeys.join(', ')}`,
      missingKeys,
    });
  }

  const status = record.status;
  if (!isHomeworkStatus(status)) {
    return fail({
      kind: 'UnknownStatus',
      message: `Unknown homework status: ${String(status)}`,
      status,
    });
  }

  return ok(`Changed review status of "${String(record.homework_name)}". ${HOMEWORK_VERDICTS[status]}`);
}
