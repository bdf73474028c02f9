import { describe, test, expect } from '@jest/globals';
import { assessFraud, isExcludable } from '../fraud-detection';

describe('assessFraud', () => {
  test('should clamp the summed score at 100', () => {
    const result = assessFraud({
      handle: 'official_shop',
      followersEst: 150_000,
      postsCount: 3,
      avgEngagementRate: 0.05,
      notes: 'DM for promo',
    });

    expect(result.score).toBe(100);
    expect(result.flags).toEqual({
      low_posts: 3,
      low_er_for_size: 0.05,
      very_low_er_for_mega: 0.05,
      brandish_handle: true,
      spam_signals: true,
    });
  });

  test('should score a clean creator at zero', () => {
    expect(
      assessFraud({ handle: 'kay', followersEst: 12_000, postsCount: 40, avgEngagementRate: 2.5, notes: null })
    ).toEqual({ score: 0, flags: {} });
  });

  test('should skip engagement checks without a rate', () => {
    const result = assessFraud({
      handle: 'kay',
      followersEst: 150_000,
      postsCount: 40,
      avgEngagementRate: null,
      notes: null,
    });
    expect(result).toEqual({ score: 0, flags: {} });
  });

  test('should not flag unknown post counts', () => {
    const result = assessFraud({ handle: 'kay', followersEst: null, postsCount: null, avgEngagementRate: null, notes: '' });
    expect(result.flags.low_posts).toBeUndefined();
  });
});

describe('isExcludable', () => {
  test('should check brand, then spam, then size', () => {
    expect(isExcludable({ isBrand: true, isSpam: true, followersEst: 500_000 })).toBe('brand');
    expect(isExcludable({ isBrand: false, isSpam: true, followersEst: 500_000 })).toBe('spam');
    expect(isExcludable({ isBrand: false, isSpam: false, followersEst: 250_000 })).toBe('mega_account');
  });

  test('should keep regular and unknown-size creators', () => {
    expect(isExcludable({ isBrand: false, isSpam: false, followersEst: 249_999 })).toBeNull();
    expect(isExcludable({ isBrand: false, isSpam: false, followersEst: null })).toBeNull();
  });
});
