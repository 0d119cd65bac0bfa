/**
 * Tests for the WHOIS registration validator
 * whois-json is mocked so no query leaves the process
 */

import whois from 'whois-json';
import {
  checkRegistration,
  lookupRegistration,
  parseIsoTimestamp,
  findExpirationCandidate,
} from '../src/validators/registrationValidator';

jest.mock('whois-json', () => jest.fn());

const mockWhois = whois as jest.MockedFunction<typeof whois>;

const NOW = new Date('2026-01-01T00:00:00Z');

describe('RegistrationValidator', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('checkRegistration', () => {
    it('should report a domain with a future expiry as alive', async () => {
      mockWhois.mockResolvedValue({ registryExpiryDate: '2030-01-01T00:00:00Z' });

      const result = await checkRegistration('example.com', NOW);

      expect(result.registrationAlive).toBe(true);
      expect(result.expiresAt).toBe('2030-01-01T00:00:00.000Z');
      expect(result.reasonCodes).toEqual(['registration_alive']);
      expect(mockWhois).toHaveBeenCalledWith('example.com', { follow: 2 });
    });

    it('should report an expired domain as not alive', async () => {
      mockWhois.mockResolvedValue({ expirationDate: '2020-06-30T12:00:00Z' });

      const result = await checkRegistration('expired.com', NOW);

      expect(result.registrationAlive).toBe(false);
      expect(result.reasonCodes).toEqual(['registration_expired']);
    });

    it('should require the expiry to be strictly after now', async () => {
      mockWhois.mockResolvedValue({ registryExpiryDate: '2026-01-01T00:00:00Z' });

      const result = await checkRegistration('edge.com', NOW);

      expect(result.registrationAlive).toBe(false);
    });

    it('should use the first value when the expiry is a list', async () => {
      mockWhois.mockResolvedValue({
        expirationDate: ['2020-01-01T00:00:00Z', '2035-01-01T00:00:00Z'],
      });

      const result = await checkRegistration('listed.com', NOW);

      expect(result.registrationAlive).toBe(false);
      expect(result.expiresAt).toBe('2020-01-01T00:00:00.000Z');
    });

    it('should search every record of a multi-server response', async () => {
      mockWhois.mockResolvedValue([
        { server: 'whois.registry.test', data: { domainName: 'EXAMPLE.NET' } },
        { server: 'whois.registrar.test', data: { registrarRegistrationExpirationDate: '2031-05-05T00:00:00Z' } },
      ]);

      const result = await checkRegistration('example.net', NOW);

      expect(result.registrationAlive).toBe(true);
      expect(result.expiresAt).toBe('2031-05-05T00:00:00.000Z');
    });

    it('should treat an expiry without offset as UTC', async () => {
      mockWhois.mockResolvedValue({ registryExpiryDate: '2026-01-01T00:00:01' });

      const result = await checkRegistration('naive.com', NOW);

      expect(result.registrationAlive).toBe(true);
      expect(result.expiresAt).toBe('2026-01-01T00:00:01.000Z');
    });

    it('should fail closed when no expiry is present', async () => {
      mockWhois.mockResolvedValue({ domainName: 'nothing.com', registrar: 'Test Registrar' });

      const result = await checkRegistration('nothing.com', NOW);

      expect(result.registrationAlive).toBe(false);
      expect(result.expiresAt).toBeUndefined();
      expect(result.reasonCodes).toEqual(['registration_expiry_missing']);
    });

    it('should fail closed when the expiry is not ISO-8601', async () => {
      mockWhois.mockResolvedValue({ expiryDate: '13-aug-2030' });

      const result = await checkRegistration('odd.com', NOW);

      expect(result.registrationAlive).toBe(false);
      expect(result.reasonCodes).toEqual(['registration_expiry_unparseable']);
    });

    it('should fail closed when the expiry names a day the month does not have', async () => {
      mockWhois.mockResolvedValue({ registryExpiryDate: '2030-02-31T00:00:00Z' });

      const result = await checkRegistration('example.com', NOW);

      expect(result).toEqual({ registrationAlive: false, reasonCodes: ['registration_expiry_unparseable'] });
    });

    it('should fail closed when the query throws', async () => {
      mockWhois.mockRejectedValue(new Error('connect ECONNREFUSED'));

      const result = await checkRegistration('down.com', NOW);

      expect(result.registrationAlive).toBe(false);
      expect(result.reasonCodes).toEqual(['registration_lookup_failed']);
    });
  });

  describe('lookupRegistration', () => {
    it('should collapse the result to a boolean', async () => {
      mockWhois.mockResolvedValueOnce({ registryExpiryDate: '2999-01-01T00:00:00Z' });
      await expect(lookupRegistration('future.com')).resolves.toBe(true);

      mockWhois.mockRejectedValueOnce(new Error('timeout'));
      await expect(lookupRegistration('future.com')).resolves.toBe(false);
    });
  });

  describe('findExpirationCandidate', () => {
    it('should prefer the registry expiry over other labels', () => {
      expect(findExpirationCandidate({
        expirationDate: '2028-01-01',
        registryExpiryDate: '2027-01-01',
      })).toBe('2027-01-01');
    });

    it('should return undefined for non-object responses', () => {
      expect(findExpirationCandidate('raw text')).toBeUndefined();
      expect(findExpirationCandidate(null)).toBeUndefined();
    });
  });

  describe('parseIsoTimestamp', () => {
    it('should parse a trailing Z as UTC', () => {
      expect(parseIsoTimestamp('2030-06-01T12:30:00Z')?.toISOString()).toBe('2030-06-01T12:30:00.000Z');
    });

    it('should apply explicit offsets with or without a colon', () => {
      expect(parseIsoTimestamp('2030-06-01T12:30:00+02:00')?.toISOString()).toBe('2030-06-01T10:30:00.000Z');
      expect(parseIsoTimestamp('2030-06-01T12:30:00+0200')?.toISOString()).toBe('2030-06-01T10:30:00.000Z');
    });

    it('should accept date-only and space-separated forms', () => {
      expect(parseIsoTimestamp('2030-06-01')?.toISOString()).toBe('2030-06-01T00:00:00.000Z');
      expect(parseIsoTimestamp('2030-06-01 12:30')?.toISOString()).toBe('2030-06-01T12:30:00.000Z');
    });

    it('should keep milliseconds of long fractions', () => {
      expect(parseIsoTimestamp('2030-06-01T12:30:00.123456Z')?.toISOString()).toBe('2030-06-01T12:30:00.123Z');
    });

    it('should return null for anything else', () => {
      expect(parseIsoTimestamp('garbage')).toBeNull();
      expect(parseIsoTimestamp('June 1, 2030')).toBeNull();
      expect(parseIsoTimestamp('2030-13-01')).toBeNull();
    });

    it('should return null for calendar dates that do not exist', () => {
      expect(parseIsoTimestamp('2030-02-31T00:00:00Z')).toBeNull();
      expect(parseIsoTimestamp('2030-04-31')).toBeNull();
      expect(parseIsoTimestamp('2030-02-29')).toBeNull();
      expect(parseIsoTimestamp('2028-02-29')?.toISOString()).toBe('2028-02-29T00:00:00.000Z');
    });
  });
});
