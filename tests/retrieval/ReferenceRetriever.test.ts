import { describe, it, expect, beforeAll } from 'vitest';
import { InvalidDocumentError } from '../../src/errors.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import {
  ReferenceRetriever,
  type ReferenceRetrieverOptions,
} from '../../src/retrieval/ReferenceRetriever.js';
import { loadLexicon } from '../../src/text/lexicon.js';
import { TextNormalizer } from '../../src/text/TextNormalizer.js';
import type { KnowledgeArticle, ReferenceDocument } from '../../src/types/models.js';
import { loadFixtureCorpus } from '../fixtures/index.js';

const DEFAULT_OPTIONS: ReferenceRetrieverOptions = { diversityWeight: 0.5, tagBoost: 0.1 };
const QUESTION = 'How do I order my transcript?';

function entry(subject: string, categories: string[]): KnowledgeArticle {
  return {
    id: 'entry',
    subject,
    categories,
    utterances: ['question'],
    responseTemplate: 'Hi {student_name}',
    followUpQuestions: [],
  };
}

describe('ReferenceRetriever', () => {
  let normalizer: TextNormalizer;
  let corpus: ReferenceDocument[];

  beforeAll(async () => {
    normalizer = new TextNormalizer(await loadLexicon());
    corpus = await loadFixtureCorpus();
  });

  function retriever(options: Partial<ReferenceRetrieverOptions> = {}): ReferenceRetriever {
    return new ReferenceRetriever(corpus, normalizer, { ...DEFAULT_OPTIONS, ...options });
  }

  it('returns references with title, url, snippet and score', () => {
    const [first, second] = retriever().retrieve(QUESTION, 2);

    expect(first).toEqual({
      id: 'transcripts-online',
      title: 'Official transcripts',
      url: 'https://registrar.example.edu/transcripts',
      snippet: 'Order official transcripts online.',
      score: expect.closeTo(0.524188, 5),
    });
    expect(second).toEqual({
      id: 'transcript-fees',
      title: 'Transcript fees',
      snippet: 'Each transcript costs five dollars.',
      score: expect.closeTo(0.199233, 5),
    });
    expect('url' in second).toBe(false);
  });

  it('skips a near-duplicate of an already chosen reference', () => {
    const ids = retriever().retrieve(QUESTION, 3).map((r) => r.id);
    expect(ids).toEqual(['transcripts-online', 'transcript-fees', 'transcript-delivery']);
  });

  it('falls back to the opening of the content when no sentence matches', () => {
    const delivery = retriever()
      .retrieve(QUESTION, 3)
      .find((r) => r.id === 'transcript-delivery');
    expect(delivery?.snippet).toBe('Electronic copies arrive within one day.');
  });

  it('never returns documents that share nothing with the question', () => {
    const ids = retriever().retrieve(QUESTION, 10).map((r) => r.id);
    expect(ids).toEqual([
      'transcripts-online',
      'transcript-fees',
      'transcript-delivery',
      'transcripts-online-copy',
    ]);
  });

  it.each([0.5, 0.7, 0.9])('keeps duplicates apart with diversity weight %s', (diversityWeight) => {
    const ids = retriever({ diversityWeight }).retrieve(QUESTION, 2).map((r) => r.id);
    expect(ids).toEqual(['transcripts-online', 'transcript-fees']);
  });

  it('ranks purely by score when the diversity weight is small', () => {
    const ids = retriever({ diversityWeight: 0.1 }).retrieve(QUESTION, 2).map((r) => r.id);
    expect(ids).toEqual(['transcripts-online', 'transcripts-online-copy']);
  });

  it('boosts documents whose tags appear in the question', () => {
    const [top] = retriever({ tagBoost: 0.4 }).retrieve('order a transcript cost', 1);
    expect(top.id).toBe('transcript-fees');
    expect(top.score).toBeCloseTo(0.599233, 5);

    const [unboosted] = retriever({ tagBoost: 0 }).retrieve('order a transcript cost', 1);
    expect(unboosted.id).toBe('transcripts-online');
  });

  it('caps boosted scores at 1', () => {
    const [top] = retriever({ tagBoost: 1 }).retrieve('order a transcript cost', 1);
    expect(top.id).toBe('transcript-fees');
    expect(top.score).toBe(1);
  });

  // --- chosen entry ---

  it('searches the chosen entry categories alongside the question', () => {
    const plain = retriever().retrieve(QUESTION, 3, entry('Transcript Request', []));
    expect(plain.map((r) => r.id)).toEqual([
      'transcripts-online',
      'transcript-fees',
      'transcript-delivery',
    ]);

    const parking = retriever().retrieve(QUESTION, 3, entry('Transcript Request', ['parking']));
    expect(parking.map((r) => r.id)).toEqual(['transcripts-online', 'parking', 'transcript-fees']);
  });

  it('finds references through the entry when the question alone matches nothing', () => {
    expect(retriever().retrieve('Where can I find help?', 3)).toEqual([]);

    const references = retriever().retrieve(
      'Where can I find help?',
      3,
      entry('Campus Services', ['parking'])
    );
    expect(references).toEqual([
      {
        id: 'parking',
        title: 'Parking permits',
        snippet: 'Buy a campus parking permit.',
        score: expect.closeTo(0.85, 5),
      },
    ]);
  });

  it('treats a null entry like no entry', () => {
    expect(retriever().retrieve(QUESTION, 3, null)).toEqual(retriever().retrieve(QUESTION, 3));
  });

  it('returns nothing when no references are requested', () => {
    expect(retriever().retrieve(QUESTION, 0)).toEqual([]);
  });

  it('returns nothing from an empty corpus', () => {
    const empty = new ReferenceRetriever([], normalizer, DEFAULT_OPTIONS);
    expect(empty.size).toBe(0);
    expect(empty.retrieve(QUESTION, 3)).toEqual([]);
  });

  it('returns nothing for an unrelated question', () => {
    expect(retriever().retrieve('Where is the campus gym located?', 3)).toEqual([]);
  });

  it('trims long unmatched content to a word boundary', () => {
    const content = `${'word '.repeat(60)}end`;
    const single = new ReferenceRetriever(
      [{ id: 'long', title: 'Transcript guide', content, tags: [] }],
      normalizer,
      DEFAULT_OPTIONS
    );
    const [ref] = single.retrieve('transcript', 1);
    expect(ref.snippet).toBe(`${'word '.repeat(39)}word...`);
  });

  it('logs the index size', () => {
    const logProvider = new ConsoleLogProvider();
    new ReferenceRetriever(corpus, normalizer, DEFAULT_OPTIONS, logProvider);
    expect(logProvider.events[0]).toMatchObject({
      level: 'debug',
      message: 'reference corpus indexed',
      fields: { documents: 5 },
    });
  });

  it('rejects documents without a title', () => {
    expect(
      () => new ReferenceRetriever([{ id: 'x', title: '', content: 'text', tags: [] }], normalizer, DEFAULT_OPTIONS)
    ).toThrow(new InvalidDocumentError('reference corpus', 0, ['title must not be empty'], 'x'));
  });
});
