import {
  extractWhatsAppPhone,
  isBusinessHoursTime,
  normalizePhone,
  sanitizeText,
} from '../../src/utils/validators';

describe('normalizePhone', () => {
  it('keeps only digits', () => {
    expect(normalizePhone('+55 (51) 99999-9999')).toBe('5551999999999');
  });

  it('accepts 10 to 15 digits', () => {
    expect(normalizePhone('5199999999')).toBe('5199999999');
    expect(normalizePhone('123456789012345')).toBe('123456789012345');
  });

  it.each([['999999999'], ['1234567890123456'], ['0000000000'], ['000-000-0000-00'], [''], [null], [undefined]])(
    'rejects %p',
    (raw) => {
      expect(normalizePhone(raw)).toBeNull();
    }
  );
});

describe('extractWhatsAppPhone', () => {
  it('takes the part before @', () => {
    expect(extractWhatsAppPhone('5551999999999@s.whatsapp.net')).toBe('5551999999999');
  });

  it('accepts a bare number', () => {
    expect(extractWhatsAppPhone('5575999999999')).toBe('5575999999999');
  });

  it('rejects a JID with no user part', () => {
    expect(extractWhatsAppPhone('@s.whatsapp.net')).toBeNull();
  });
});

describe('sanitizeText', () => {
  it('drops control characters except newline and tab', () => {
    expect(sanitizeText('a\u0000b\u001fc\n\td\r')).toBe('abc\n\td');
  });

  it('truncates to the limit', () => {
    expect(sanitizeText('abcdef', 4)).toBe('abcd');
  });

  it('counts kept characters toward the limit', () => {
    expect(sanitizeText('\u0001\u0002abc', 2)).toBe('ab');
  });

  it('does not split surrogate pairs', () => {
    expect(sanitizeText('👍👍👍', 2)).toBe('👍👍');
  });

  it('returns an empty string for empty input', () => {
    expect(sanitizeText(null)).toBe('');
    expect(sanitizeText('')).toBe('');
  });

  it('defaults to 5000 characters', () => {
    expect(sanitizeText('x'.repeat(5001))).toHaveLength(5000);
  });
});

describe('isBusinessHoursTime', () => {
  it.each([
    ['09:00', true],
    ['17:59', true],
    ['18:00', false],
    ['08:59', false],
    ['9:30', true],
    ['25:00', false],
    ['noon', false],
  ])('%s -> %p', (time, expected) => {
    expect(isBusinessHoursTime(time)).toBe(expected);
  });
});
