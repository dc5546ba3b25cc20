import { ClaimDeduplicator } from '../deduplicator';
import { TestDataGenerator } from '../../test-utils';

const TODAY = new Date('2025-03-01T00:00:00.000Z');

describe('ClaimDeduplicator', () => {
  describe('dedupeByClaimNo', () => {
    it('should collapse three A1 lines and one B2 line into two claims', () => {
      const lines = [
        TestDataGenerator.createClaimLine({ claimNo: 'A1', billedCharge: 100 }),
        TestDataGenerator.createClaimLine({ claimNo: 'A1', billedCharge: 40 }),
        TestDataGenerator.createClaimLine({ claimNo: 'B2', billedCharge: 75 }),
        TestDataGenerator.createClaimLine({ claimNo: 'A1', billedCharge: 25 }),
      ];

      const claims = ClaimDeduplicator.dedupeByClaimNo(lines);

      expect(claims).toHaveLength(2);
      expect(claims.map(c => c.claimNo)).toEqual(['A1', 'B2']);
    });

    it('should keep the first line of each claim without summing amounts', () => {
      const lines = [
        TestDataGenerator.createClaimLine({ claimNo: 'A1', billedCharge: 100, renderingProvider: 'First' }),
        TestDataGenerator.createClaimLine({ claimNo: 'A1', billedCharge: 40, renderingProvider: 'Second' }),
      ];

      const [claim] = ClaimDeduplicator.dedupeByClaimNo(lines);

      expect(claim).toBe(lines[0]);
      expect(claim.billedCharge).toBe(100);
      expect(claim.renderingProvider).toBe('First');
    });

    it('should preserve the distinct claim number set and never grow', () => {
      const ids = ['C3', 'A1', 'C3', 'B2', 'A1', 'D4', 'B2'];
      const lines = ids.map(claimNo => TestDataGenerator.createClaimLine({ claimNo }));

      const claims = ClaimDeduplicator.dedupeByClaimNo(lines);

      expect(claims.length).toBeLessThanOrEqual(lines.length);
      expect(new Set(claims.map(c => c.claimNo))).toEqual(new Set(ids));
      expect(claims.map(c => c.claimNo)).toEqual(['C3', 'A1', 'B2', 'D4']);
    });

    it('should not mutate its input', () => {
      const lines = [
        TestDataGenerator.createClaimLine({ claimNo: 'A1' }),
        TestDataGenerator.createClaimLine({ claimNo: 'A1' }),
      ];

      ClaimDeduplicator.dedupeByClaimNo(lines);

      expect(lines).toHaveLength(2);
    });
  });

  describe('deriveBalance', () => {
    it('should use the explicit balance when the column exists', () => {
      const line = TestDataGenerator.createClaimLine({ balance: 12.5 });

      expect(ClaimDeduplicator.deriveBalance(line, true)).toBe(12.5);
    });

    it('should compute billed minus payment minus adjustment otherwise', () => {
      const line = TestDataGenerator.createClaimLine({
        billedCharge: 200,
        totalPayment: 120,
        contractualAdjustment: 50,
        balance: 0,
      });

      expect(ClaimDeduplicator.deriveBalance(line, false)).toBe(30);
    });
  });

  describe('deriveAgingDays', () => {
    it('should count whole days from the date of service', () => {
      expect(ClaimDeduplicator.deriveAgingDays(new Date('2025-01-30T00:00:00.000Z'), TODAY)).toBe(30);
    });

    it('should ignore the time of day of today', () => {
      const lateToday = new Date('2025-03-01T21:15:00.000Z');

      expect(ClaimDeduplicator.deriveAgingDays(new Date('2025-02-28T00:00:00.000Z'), lateToday)).toBe(1);
    });

    it('should be null without a date of service', () => {
      expect(ClaimDeduplicator.deriveAgingDays(null, TODAY)).toBeNull();
    });
  });

  describe('deriveClaims', () => {
    it('should attach balance and aging to each representative line', () => {
      const lines = [
        TestDataGenerator.createClaimLine({ claimNo: 'A1', serviceDate: new Date('2025-02-01T00:00:00.000Z') }),
        TestDataGenerator.createClaimLine({ claimNo: 'A1' }),
        TestDataGenerator.createClaimLine({ claimNo: 'B2', serviceDate: null }),
      ];

      const claims = ClaimDeduplicator.deriveClaims(lines, { hasBalanceColumn: false, today: TODAY });

      expect(claims).toHaveLength(2);
      expect(claims[0]).toMatchObject({ claimNo: 'A1', agingDays: 28, balance: 20 });
      expect(claims[1]).toMatchObject({ claimNo: 'B2', agingDays: null });
    });
  });
});
