import {
  decodeMetadataValue,
  encodeMetadataValue,
  extractResolutionMetadata,
  mergeMetadata,
} from '@/modules/feedback/domain/resolution-metadata';

describe('resolution metadata', () => {
  describe('extractResolutionMetadata', () => {
    it('extracts ticket and session ids', () => {
      expect(
        extractResolutionMetadata('Issue resolved. Ticket ID: SUP-1042 Session ID: 9f2c'),
      ).toEqual({ ticketId: 'SUP-1042', correlationId: '9f2c' });
    });

    it('accepts the hash ticket form and correlation ids', () => {
      expect(extractResolutionMetadata('Ticket #881 closed, correlation id=abc_12')).toEqual({
        ticketId: '881',
        correlationId: 'abc_12',
      });
    });

    it('matches across line breaks', () => {
      expect(extractResolutionMetadata('Issue resolved\nTicket\nID:\n  T-9')).toEqual({
        ticketId: 'T-9',
      });
    });

    it('returns an empty object when nothing matches', () => {
      expect(extractResolutionMetadata('all good now, thanks')).toEqual({});
    });
  });

  describe('button value encoding', () => {
    it('encodes only present fields', () => {
      expect(encodeMetadataValue({})).toBe('{}');
      expect(encodeMetadataValue({ ticketId: 'T-1' })).toBe('{"ticketId":"T-1"}');
    });

    it('decodes tolerantly', () => {
      expect(decodeMetadataValue('{"ticketId":"T-1","correlationId":"c-2"}')).toEqual({
        ticketId: 'T-1',
        correlationId: 'c-2',
      });
      expect(decodeMetadataValue('not json')).toEqual({});
      expect(decodeMetadataValue('[1,2]')).toEqual({});
      expect(decodeMetadataValue('{"ticketId":5}')).toEqual({});
      expect(decodeMetadataValue(undefined)).toEqual({});
    });
  });

  describe('mergeMetadata', () => {
    it('keeps current fields and lets incoming values win', () => {
      expect(mergeMetadata({ ticketId: 'A' }, { correlationId: 'B' })).toEqual({
        ticketId: 'A',
        correlationId: 'B',
      });
      expect(mergeMetadata({ ticketId: 'A' }, { ticketId: 'C' })).toEqual({ ticketId: 'C' });
    });
  });
});
