/**
 * Scores every knowledge-base article against a question.
 * Each article is indexed as the concatenation of its sample utterances.
 * Nothing is filtered here; thresholds belong to the decision engine.
 */

import type { ILogProvider } from '../providers/ILogProvider.js';
import type { TextNormalizer } from '../text/TextNormalizer.js';
import type { KnowledgeArticle, MatchResult } from '../types/models.js';
import { assertKnowledgeArticles } from '../validation/documents.js';
import { VectorSpaceModel } from './VectorSpaceModel.js';

export class KnowledgeRetriever {
  private readonly model: VectorSpaceModel;
  private readonly articles: readonly KnowledgeArticle[];

  constructor(
    articles: readonly KnowledgeArticle[],
    normalizer: TextNormalizer,
    logProvider?: ILogProvider
  ) {
    assertKnowledgeArticles(articles);
    this.articles = Object.freeze([...articles]);
    this.model = new VectorSpaceModel(
      this.articles.map((article) => ({
        id: article.id,
        text: article.utterances.join('\n'),
      })),
      normalizer
    );

    logProvider?.debug('knowledge base indexed', {
      articles: this.articles.length,
      terms: this.model.vocabulary.size,
    });
  }

  get size(): number {
    return this.articles.length;
  }

  get(id: string): KnowledgeArticle | undefined {
    return this.articles.find((article) => article.id === id);
  }

  /** All articles, best first; equal scores keep knowledge-base order. */
  rank(query: string): MatchResult<KnowledgeArticle>[] {
    const scores = this.model.scores(query);

    return this.articles
      .map((article, index) => ({
        documentId: article.id,
        score: scores[index],
        document: article,
      }))
      .sort((a, b) => b.score - a.score);
  }
}
