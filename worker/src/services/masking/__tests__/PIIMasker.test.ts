import { PIIMasker, getPIIMasker } from '../PIIMasker';

describe('PIIMasker', () => {
  const masker = new PIIMasker();

  describe('maskText', () => {
    it('masks API tokens in authorization headers', () => {
      expect(masker.maskText('Authorization: Token abc123def')).toBe('Authorization: Token ****');
      expect(masker.maskText('Bearer test-secret.value')).toBe('Bearer ****');
    });

    it('masks e-mail addresses', () => {
      expect(masker.maskText('reply to jane.doe@example.com today')).toBe('reply to ***@***.*** today');
    });

    it('masks SSN-like numbers', () => {
      expect(masker.maskText('SSN 123-45-6789')).toBe('SSN ***-**-****');
    });

    it('keeps the last four digits of long account numbers', () => {
      expect(masker.maskText('card 4111111111111111')).toBe('card ****1111');
      expect(masker.maskText('IBAN DE89 3704 0044 0532 0130 00')).toBe('IBAN ****3000');
    });

    it('leaves ordinary text alone', () => {
      expect(masker.maskText('Invoice 2023-01-05 total 120.50')).toBe('Invoice 2023-01-05 total 120.50');
    });
  });

  describe('maskObject', () => {
    it('masks sensitive keys wholesale and free text inside other values', () => {
      expect(
        masker.maskObject({
          apiKey: 'test-secret',
          nested: { token: 'test-secret', note: 'mail a@b.io' },
          tags: ['x@y.org'],
          count: 3,
          missing: null,
        })
      ).toEqual({
        apiKey: '****',
        nested: { token: '****', note: 'mail ***@***.***' },
        tags: ['***@***.***'],
        count: 3,
        missing: null,
      });
    });
  });

  it('matches sensitive keys case-insensitively', () => {
    expect(masker.shouldMask('Authorization')).toBe(true);
    expect(masker.shouldMask('PAPERLESS_API_KEY')).toBe(true);
    expect(masker.shouldMask('title')).toBe(false);
  });

  it('shares one instance', () => {
    expect(getPIIMasker()).toBe(getPIIMasker());
  });
});
