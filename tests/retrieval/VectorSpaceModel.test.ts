import { describe, it, expect } from 'vitest';
import { cosineSimilarity, VectorSpaceModel } from '../../src/retrieval/VectorSpaceModel.js';
import { createLexicon } from '../../src/text/lexicon.js';
import { TextNormalizer } from '../../src/text/TextNormalizer.js';

const normalizer = new TextNormalizer(createLexicon({ stopWords: [], synonyms: {} }));

function buildModel(): VectorSpaceModel {
  return new VectorSpaceModel(
    [
      { id: 'a', text: 'apple banana' },
      { id: 'b', text: 'apple cherry cherry' },
      { id: 'c', text: 'durian' },
    ],
    normalizer
  );
}

describe('VectorSpaceModel', () => {
  it('indexes the vocabulary in first-seen order', () => {
    const model = buildModel();
    expect([...model.vocabulary.keys()]).toEqual(['apple', 'banana', 'cherry', 'durian']);
    expect(model.size).toBe(3);
  });

  it('computes smoothed IDF', () => {
    const model = buildModel();
    expect(model.idf[0]).toBeCloseTo(Math.log(4 / 3) + 1, 12);
    expect(model.idf[1]).toBeCloseTo(Math.log(2) + 1, 12);
    expect(model.idf[3]).toBeCloseTo(Math.log(2) + 1, 12);
  });

  it('weights terms by frequency over document length', () => {
    const model = buildModel();
    const vector = model.documentVector(1);
    expect(vector.get(0)).toBeCloseTo((1 / 3) * model.idf[0], 12);
    expect(vector.get(2)).toBeCloseTo((2 / 3) * model.idf[2], 12);
    expect(vector.has(1)).toBe(false);
  });

  it('drops out-of-vocabulary query tokens but counts them in the length', () => {
    const model = buildModel();
    const vector = model.vectorize('kiwi apple');
    expect([...vector.keys()]).toEqual([0]);
    expect(vector.get(0)).toBeCloseTo(0.5 * model.idf[0], 12);
  });

  it('scores a document against its own text as 1', () => {
    const [score] = buildModel().scores('apple banana');
    expect(score).toBeCloseTo(1, 10);
  });

  it('scores unrelated documents as 0', () => {
    expect(buildModel().scores('apple banana')[2]).toBe(0);
  });

  it('returns all zeros for unknown or empty queries', () => {
    const model = buildModel();
    expect(model.scores('kiwi mango')).toEqual([0, 0, 0]);
    expect(model.scores('')).toEqual([0, 0, 0]);
  });

  it('keeps every score within [0, 1]', () => {
    const model = buildModel();
    for (const query of ['apple', 'cherry apple', 'banana durian cherry', 'apple apple apple']) {
      for (const score of model.scores(query)) {
        expect(score).toBeGreaterThanOrEqual(0);
        expect(score).toBeLessThanOrEqual(1);
      }
    }
  });

  it.each(['apple', 'banana cherry', 'cherry apple kiwi', 'durian durian apple'])(
    'gives "%s" an identity similarity of 1 with itself',
    (text) => {
      const model = buildModel();
      expect(cosineSimilarity(model.vectorize(text), model.vectorize(text))).toBeCloseTo(1, 12);
    }
  );

  it('is symmetric between query vectors', () => {
    const model = buildModel();
    const a = model.vectorize('apple banana banana');
    const b = model.vectorize('cherry apple durian');
    expect(cosineSimilarity(a, b)).toBe(cosineSimilarity(b, a));
  });

  it('is symmetric between documents', () => {
    const model = buildModel();
    expect(model.documentSimilarity(0, 1)).toBe(model.documentSimilarity(1, 0));
    expect(model.documentSimilarity(0, 1)).toBeGreaterThan(0);
    expect(model.documentSimilarity(0, 2)).toBe(0);
  });

  it('handles an empty collection', () => {
    const model = new VectorSpaceModel([], normalizer);
    expect(model.size).toBe(0);
    expect(model.vocabulary.size).toBe(0);
    expect(model.scores('apple')).toEqual([]);
  });
});

describe('cosineSimilarity', () => {
  it('is 0 when either vector is empty', () => {
    expect(cosineSimilarity(new Map(), new Map([[0, 1]]))).toBe(0);
    expect(cosineSimilarity(new Map([[0, 1]]), new Map())).toBe(0);
  });

  it('is 0 for vectors with no shared index', () => {
    expect(cosineSimilarity(new Map([[0, 1]]), new Map([[1, 1]]))).toBe(0);
  });

  it('ignores magnitude', () => {
    const a = new Map([[0, 1], [1, 2]]);
    const b = new Map([[0, 3], [1, 6]]);
    expect(cosineSimilarity(a, b)).toBeCloseTo(1, 12);
  });

  it('matches the textbook value', () => {
    const a = new Map([[0, 1], [1, 1]]);
    const b = new Map([[0, 1]]);
    expect(cosineSimilarity(a, b)).toBeCloseTo(1 / Math.SQRT2, 12);
  });
});
