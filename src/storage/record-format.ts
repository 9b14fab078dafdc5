import { RECORD_FORMAT } from '../constants/index.js';
import type { IRecord } from '../types/index.js';

const { DELIMITER, TERMINATOR, LINE_END } = RECORD_FORMAT;

const FIELD_ORDER = ['address', 'secret', 'token', 'completedAt'] as const;

/**
 * `address,secret,token,completedAt;\n`
 */
export function formatRecordLine(record: IRecord): string {
  const fields = FIELD_ORDER.map(key => record[key]);

  for (const [index, value] of fields.entries()) {
    if (value.length === 0 || /[,;\r\n]/.test(value)) {
      throw new Error(`Record field "${FIELD_ORDER[index]}" is empty or contains a separator`);
    }
  }

  return `${fields.join(DELIMITER)}${TERMINATOR}${LINE_END}`;
}

/**
 * Inverse of formatRecordLine. Returns null for blank or malformed lines.
 * Splits on the delimiter only, so values keep any inner whitespace.
 */
export function parseRecordLine(line: string): IRecord | null {
  const trimmed = line.replace(/\r?\n$/, '');
  if (!trimmed.endsWith(TERMINATOR)) {
    return null;
  }

  const fields = trimmed.slice(0, -TERMINATOR.length).split(DELIMITER);
  if (fields.length !== FIELD_ORDER.length || fields.some(field => field.length === 0)) {
    return null;
  }

  const [address, secret, token, completedAt] = fields;
  return Object.freeze({ address, secret, token, completedAt });
}
