import { describe, it, expect } from 'vitest';
import { createPIIScrubber } from './piiScrubber.js';

describe('PIIScrubber', () => {
  const scrubber = createPIIScrubber();

  describe('text', () => {
    it('redacts email addresses', () => {
      expect(scrubber.scrub('Contact jane.doe+loan@example.com today')).toBe(
        'Contact [EMAIL_REDACTED] today',
      );
    });

    it('redacts formatted SSNs', () => {
      expect(scrubber.scrub('ssn 123-45-6789 on file')).toBe('ssn [SSN_REDACTED] on file');
    });

    it('redacts unformatted nine-digit SSNs', () => {
      expect(scrubber.scrub('SSN 123456789')).toBe('SSN [SSN_REDACTED]');
    });

    it('redacts US phone numbers', () => {
      expect(scrubber.scrub('call (555) 123-4567')).toBe('call [PHONE_REDACTED]');
      expect(scrubber.scrub('call 555-123-4567')).toBe('call [PHONE_REDACTED]');
      expect(scrubber.scrub('call +1 555 123 4567')).toBe('call [PHONE_REDACTED]');
    });

    it('redacts long account numbers', () => {
      expect(scrubber.scrub('account 000123456789')).toBe('account [ACCOUNT_REDACTED]');
    });

    it('leaves short numbers alone', () => {
      expect(scrubber.scrub('sequence 42 of 1000')).toBe('sequence 42 of 1000');
    });
  });

  describe('objects', () => {
    it('scrubs nested objects and arrays', () => {
      expect(
        scrubber.scrubObject({
          borrowers: [{ ssn: '987-65-4321' }, { phone: '555.123.4567' }],
          count: 2,
        }),
      ).toEqual({
        borrowers: [{ ssn: '[SSN_REDACTED]' }, { phone: '[PHONE_REDACTED]' }],
        count: 2,
      });
    });
  });

  describe('custom patterns', () => {
    it('applies added patterns after the built-in ones', () => {
      const custom = createPIIScrubber();
      custom.addPattern('loan_number', /LN-\d{6}/g, '[LOAN_REDACTED]');
      expect(custom.scrub('loan LN-123456')).toBe('loan [LOAN_REDACTED]');
    });
  });
});
