const SCRIPT_OR_STYLE_TAG_REGEX = /<(script|style)\b[^>]*>[\s\S]*?<\/\1>/gi;
const HTML_TAG_REGEX = /<[^>]+>/g;
const CONTROL_CHARACTER_REGEX = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;

export const PATIENT_NAME_MAX_LENGTH = 120;
export const CHAT_MESSAGE_MAX_LENGTH = 4000;

const normalizeLineEndings = (value: string): string =>
  value.replace(/\r\n/g, '\n').replace(/\r/g, '\n');

const truncate = (value: string, maxLength: number): string =>
  value.length > maxLength ? value.slice(0, maxLength).trimEnd() : value;

export function sanitizePlainText(value: unknown, maxLength = 10000): string {
  if (typeof value !== 'string') {
    return '';
  }

  let clean = normalizeLineEndings(value)
    .replace(SCRIPT_OR_STYLE_TAG_REGEX, ' ')
    .replace(HTML_TAG_REGEX, ' ')
    .replace(CONTROL_CHARACTER_REGEX, '');

  clean = clean
    .split('\n')
    .map((line) => line.replace(/[ \t]{2,}/g, ' ').trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();

  return truncate(clean, maxLength);
}

/** Single-line display name with markup removed. */
export function sanitizePatientName(value: unknown): string {
  return truncate(
    sanitizePlainText(value, PATIENT_NAME_MAX_LENGTH * 2).replace(/\s*\n\s*/g, ' '),
    PATIENT_NAME_MAX_LENGTH,
  );
}

/**
 * Chat text keeps its characters (users paste codes and symbols), only
 * control characters are dropped and line endings normalized.
 */
export function sanitizeChatMessage(value: unknown): string {
  if (typeof value !== 'string') {
    return '';
  }

  return truncate(
    normalizeLineEndings(value).replace(CONTROL_CHARACTER_REGEX, '').trim(),
    CHAT_MESSAGE_MAX_LENGTH,
  );
}
