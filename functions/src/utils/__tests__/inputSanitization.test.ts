import {
  CHAT_MESSAGE_MAX_LENGTH,
  sanitizeChatMessage,
  sanitizePatientName,
  sanitizePlainText,
} from '../inputSanitization';

describe('inputSanitization', () => {
  it('strips script/style blocks and html tags from text', () => {
    const dirty = '  Hello <b>team</b><script>alert("x")</script><style>p{}</style> <i>today</i> ';

    expect(sanitizePlainText(dirty, 500)).toBe('Hello team today');
  });

  it('truncates output to configured max length', () => {
    expect(sanitizePlainText('abcdef', 4)).toBe('abcd');
  });

  it('returns an empty string for non-string input', () => {
    expect(sanitizePlainText(42)).toBe('');
    expect(sanitizeChatMessage(undefined)).toBe('');
  });

  it('flattens patient names onto one line', () => {
    expect(sanitizePatientName('  Jane <b>Doe</b>\nJr ')).toBe('Jane Doe Jr');
  });

  it('keeps symbols in chat messages and drops control characters', () => {
    expect(sanitizeChatMessage('  Add <Lisinopril> {"code": 29046}\u0007\r\n ')).toBe(
      'Add <Lisinopril> {"code": 29046}',
    );
  });

  it('caps chat message length', () => {
    expect(sanitizeChatMessage('a'.repeat(CHAT_MESSAGE_MAX_LENGTH + 10))).toHaveLength(
      CHAT_MESSAGE_MAX_LENGTH,
    );
  });
});
