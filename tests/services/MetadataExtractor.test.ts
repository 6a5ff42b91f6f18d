import { describe, it, expect } from 'vitest';
import { MetadataExtractor } from '../../src/services/MetadataExtractor.js';

describe('MetadataExtractor', () => {
  const extractor = new MetadataExtractor({ stopWords: ['about', 'and', 'from'] });

  it('extracts term, deadline and name in that order', () => {
    const facts = extractor.extract(
      'Hi, my name is Taylor. I need to remove a course for Fall 2024 before October 21.'
    );
    expect(facts).toEqual([
      {
        key: 'term',
        value: 'Fall 2024',
        reason: "Detected academic term 'Fall 2024' from student email.",
      },
      {
        key: 'withdrawal_deadline',
        value: 'October 21',
        reason: "Identified withdrawal deadline 'October 21' in message context.",
      },
      {
        key: 'student_name',
        value: 'Taylor',
        reason: "Captured student name 'Taylor' from greeting.",
      },
    ]);
  });

  // --- terms ---

  it('normalises the season and accepts a missing space', () => {
    expect(extractor.extract('Plans for SPRING 2025 and fall2024').map((f) => f.value)).toEqual([
      'Spring 2025',
      'Fall 2024',
    ]);
  });

  it('ignores seasons without a year', () => {
    expect(extractor.extract('See you in the fall')).toEqual([]);
  });

  // --- dates ---

  it('reads numeric dates with a year as registration deadlines', () => {
    expect(extractor.extract('Can I register by 1/15/2025?')).toEqual([
      {
        key: 'registration_deadline',
        value: 'January 15, 2025',
        reason: "Identified registration deadline 'January 15, 2025' in message context.",
      },
    ]);
  });

  it('expands abbreviated month names', () => {
    const [fact] = extractor.extract('I want to drop a class by Sept. 5');
    expect(fact).toMatchObject({ key: 'withdrawal_deadline', value: 'September 5' });
  });

  it('records both deadlines when both kinds of keyword appear', () => {
    const facts = extractor.extract('I will drop one class and add another before Oct 2');
    expect(facts.map((f) => f.key)).toEqual(['withdrawal_deadline', 'registration_deadline']);
    expect(facts.map((f) => f.value)).toEqual(['October 2', 'October 2']);
  });

  it('falls back to a generic deadline', () => {
    expect(extractor.extract('What is the deadline, March 3rd?')).toEqual([
      { key: 'deadline', value: 'March 3', reason: "Detected deadline reference 'March 3'." },
    ]);
  });

  it('ignores dates with no deadline context', () => {
    expect(extractor.extract('See you on December 1')).toEqual([]);
  });

  it('only looks for keywords within the context window', () => {
    const text = `remove ${'x'.repeat(30)} on March 3`;
    expect(extractor.extract(text).map((f) => f.key)).toEqual(['withdrawal_deadline']);
    expect(new MetadataExtractor({ contextWindow: 10 }).extract(text)).toEqual([]);
  });

  // --- names ---

  it('captures multi-word names after "this is"', () => {
    const [fact] = extractor.extract('Hello, this is Maria Lopez from biology.');
    expect(fact).toMatchObject({ key: 'student_name', value: 'Maria Lopez' });
  });

  it('capitalises names written in lower case', () => {
    expect(extractor.extract('my name is jordan')).toEqual([
      {
        key: 'student_name',
        value: 'Jordan',
        reason: "Captured student name 'Jordan' from greeting.",
      },
    ]);
    expect(extractor.extract('THIS IS maria LOPEZ')[0]).toMatchObject({ value: 'Maria Lopez' });
  });

  it('ends the name at a stop word', () => {
    expect(extractor.extract('this is about my schedule')).toEqual([]);
    expect(extractor.extract('my name is sam and I have a question')[0]).toMatchObject({
      value: 'Sam',
    });
  });

  it('takes every word up to three without stop words', () => {
    const [fact] = new MetadataExtractor().extract('Hello, this is Maria Lopez from biology.');
    expect(fact).toMatchObject({ value: 'Maria Lopez From' });
  });

  it('skips single-letter names', () => {
    expect(extractor.extract('my name is J')).toEqual([]);
  });

  it('returns nothing for plain text', () => {
    expect(extractor.extract('How do I order my transcript?')).toEqual([]);
    expect(extractor.extract('')).toEqual([]);
  });
});
