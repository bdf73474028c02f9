import { describe, test, expect } from '@jest/globals';
import { generateComment, passesCommentRules, sanitizeComment, wordCount } from '../comment-generator';
import { ScriptedTextGenerator } from '../../../__tests__/helpers/scripted-text-generator';

const GOOD_COMMENT = 'That slow morning body oil ritual looks so calming and intentional';
const TARGET = { url: 'https://www.instagram.com/p/PostA1/', caption: 'Slow mornings with body oil' };

describe('comment rules', () => {
  test('should strip quotes, mentions and hashtags', () => {
    expect(sanitizeComment('  "Love how @kay layers #shea  butter here"  ')).toBe('Love how layers butter here');
  });

  test('should count words on any whitespace', () => {
    expect(wordCount(' one  two\nthree ')).toBe(3);
  });

  test('should accept 8-20 words without links', () => {
    expect(passesCommentRules(GOOD_COMMENT)).toBe(true);
    expect(passesCommentRules('Love this so much')).toBe(false);
    expect(passesCommentRules('Check out this routine at http://x.example it is really good')).toBe(false);
  });
});

describe('generateComment', () => {
  test('should accept a valid first draft', async () => {
    const generator = new ScriptedTextGenerator([`"${GOOD_COMMENT}"`]);
    await expect(generateComment(generator, TARGET)).resolves.toBe(GOOD_COMMENT);
    expect(generator.calls.map((call) => call.temperature)).toEqual([0.7]);
  });

  test('should repair an invalid draft once', async () => {
    const generator = new ScriptedTextGenerator(['Love it', GOOD_COMMENT]);

    await expect(generateComment(generator, TARGET)).resolves.toBe(GOOD_COMMENT);
    expect(generator.calls.map((call) => call.temperature)).toEqual([0.7, 0.6]);
    expect(generator.calls[1].prompt).toContain('Bad comment: Love it');
  });

  test('should return empty when the repair also fails', async () => {
    const generator = new ScriptedTextGenerator(['nope', 'still bad']);
    await expect(generateComment(generator, TARGET)).resolves.toBe('');
  });

  test('should return empty when generation throws', async () => {
    const generator = new ScriptedTextGenerator([new Error('timeout')]);
    await expect(generateComment(generator, TARGET)).resolves.toBe('');
  });

  test('should list recent comments to avoid', async () => {
    const generator = new ScriptedTextGenerator([GOOD_COMMENT]);
    await generateComment(generator, TARGET, ['An earlier comment']);
    expect(generator.calls[0].prompt).toContain('- An earlier comment');
  });
});
