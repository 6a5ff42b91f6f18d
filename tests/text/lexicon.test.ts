import { describe, it, expect } from 'vitest';
import { NotFoundError, ValidationError } from '../../src/errors.js';
import { createLexicon, loadLexicon, parseLexicon } from '../../src/text/lexicon.js';

describe('createLexicon', () => {
  it('lower-cases stop words and synonym entries', () => {
    const lexicon = createLexicon({
      stopWords: ['The'],
      synonyms: { Drop: ['Withdraw'] },
    });
    expect(lexicon.stopWords.has('the')).toBe(true);
    expect(lexicon.synonyms.get('drop')).toEqual(['withdraw']);
  });
});

describe('parseLexicon', () => {
  it('builds a lexicon from a valid payload', () => {
    const lexicon = parseLexicon({ stopWords: ['a'], synonyms: { appt: ['appointment'] } });
    expect([...lexicon.stopWords]).toEqual(['a']);
    expect(lexicon.synonyms.get('appt')).toEqual(['appointment']);
  });

  it('rejects a payload that is not an object', () => {
    expect(() => parseLexicon(['a'])).toThrow(new ValidationError('lexicon must be a JSON object'));
  });

  it('collects every field error', () => {
    try {
      parseLexicon({ stopWords: 'a', synonyms: { drop: 'withdraw' } });
      expect.unreachable('parseLexicon should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (!(err instanceof ValidationError)) return;
      expect(err.message).toBe('Invalid lexicon');
      expect(err.details).toEqual({
        fields: ['stopWords must be an array', 'synonyms.drop must be an array of strings'],
      });
    }
  });

  it('requires both tables', () => {
    expect(() => parseLexicon({})).toThrow('Invalid lexicon');
  });
});

describe('loadLexicon', () => {
  it('loads the bundled lexicon by default', async () => {
    const lexicon = await loadLexicon();
    expect(lexicon.stopWords.has('the')).toBe(true);
    expect(lexicon.synonyms.get('drop')).toEqual(['withdraw']);
    expect(lexicon.synonyms.get('fafsa')).toEqual(['financial', 'aid']);
  });

  it('raises NotFoundError for a missing file', async () => {
    await expect(
      loadLexicon(new URL('../fixtures/no-such-lexicon.json', import.meta.url))
    ).rejects.toBeInstanceOf(NotFoundError);
  });
});
