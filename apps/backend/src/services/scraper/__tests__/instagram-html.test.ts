import { describe, test, expect } from '@jest/globals';
import {
  countMentions,
  extractHandles,
  extractHashtags,
  extractMentions,
  extractOwnerHandle,
  extractPostShortcodes,
  extractProfileShortcodes,
  looksLikeLoginWall,
  normalizeHandle,
  parseProfileSnapshot,
  uniqueHandles,
} from '../instagram-html';
import {
  LOGIN_WALL_HTML,
  listingPageHtml,
  postPageHtml,
  profilePageHtml,
} from '../../../__tests__/helpers/instagram-fixtures';

describe('handle normalization', () => {
  test('should strip @ and lower-case', () => {
    expect(normalizeHandle('  @Kay.Glow ')).toBe('kay.glow');
    expect(normalizeHandle(null)).toBe('');
  });

  test('should be idempotent', () => {
    const once = normalizeHandle('@@Some_One');
    expect(normalizeHandle(once)).toBe(once);
  });

  test('should dedupe case-insensitively in first-seen order', () => {
    expect(uniqueHandles(['a', 'B', 'a', 'c', 'b'])).toEqual(['a', 'b', 'c']);
  });
});

describe('mention extraction', () => {
  test('should extract normalized handles in first-seen order', () => {
    expect(extractHandles('hi @Ann @bob @ann @Cat @BOB')).toEqual(['ann', 'bob', 'cat']);
  });

  test('should trim trailing sentence dots', () => {
    expect(extractHandles('thanks @jane.')).toEqual(['jane']);
  });

  test('should ignore single-character handles', () => {
    expect(extractHandles('@a and @bb')).toEqual(['bb']);
  });

  test('should drop numeric-only mentions', () => {
    expect(extractMentions('@12345 @real_user')).toEqual(new Set(['real_user']));
  });

  test('should count repeated mentions', () => {
    const counts = countMentions('@ann hi @Ann and @bob @2024');
    expect(Array.from(counts.entries())).toEqual([
      ['ann', 2],
      ['bob', 1],
    ]);
  });

  test('should collect hashtags without the #', () => {
    expect(extractHashtags('Loving #SheaButter and #selfcare')).toEqual(['SheaButter', 'selfcare']);
  });
});

describe('shortcode extraction', () => {
  test('should keep shortcode case and dedupe', () => {
    const html = '<a href="/p/AbC123/">x</a><a href="/p/AbC123/">y</a><a href="/p/xyz99/">z</a>';
    expect(extractPostShortcodes(html)).toEqual(['AbC123', 'xyz99']);
  });

  test('should ignore codes shorter than five characters', () => {
    expect(extractPostShortcodes('<a href="/p/abcd/">x</a>')).toEqual([]);
  });

  test('should limit profile shortcodes', () => {
    const html = listingPageHtml(['AAAAA1', 'BBBBB2', 'CCCCC3']);
    expect(extractProfileShortcodes(html, 2)).toEqual(['AAAAA1', 'BBBBB2']);
  });
});

describe('page parsing', () => {
  test('should read the post owner', () => {
    expect(extractOwnerHandle(postPageHtml('Jane.Doe'))).toBe('jane.doe');
    expect(extractOwnerHandle('<html></html>')).toBeNull();
  });

  test('should detect login walls and throttle pages', () => {
    expect(looksLikeLoginWall(LOGIN_WALL_HTML)).toBe(true);
    expect(looksLikeLoginWall('<p>Please wait a few minutes before you try again.</p>')).toBe(true);
    expect(looksLikeLoginWall(profilePageHtml({ followers: 100 }))).toBe(false);
  });

  test('should parse a profile snapshot', () => {
    const html = profilePageHtml({
      followers: 12345,
      posts: 87,
      bio: 'Shea butter lover',
      externalUrl: 'https://example.com/links',
      verified: true,
    });
    expect(parseProfileSnapshot(html, '@Kay')).toEqual({
      handle: 'kay',
      followers: 12345,
      posts: 87,
      bio: 'Shea butter lover',
      externalUrl: 'https://example.com/links',
      isVerified: true,
    });
  });

  test('should decode escaped embedded strings', () => {
    const html = '{"biography":"Caf\\u00e9 owner\\nATL","external_url":"https:\\/\\/example.com\\/x"}';
    const snapshot = parseProfileSnapshot(html, 'cafe');
    expect(snapshot.bio).toBe('Café owner\nATL');
    expect(snapshot.externalUrl).toBe('https://example.com/x');
  });

  test('should degrade to empty values on unknown markup', () => {
    expect(parseProfileSnapshot('<html></html>', '@Some.One')).toEqual({
      handle: 'some.one',
      followers: null,
      posts: null,
      bio: '',
      externalUrl: '',
      isVerified: false,
    });
  });
});
