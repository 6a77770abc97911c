import type { Candidate, ScoredCandidate } from '../../shared/types';
import { describeError, type Logger } from '../obs/logger';
import { queryTerms } from '../utils/text';

const SNIPPET_RICHNESS_CHARS = 800;

export const DEFAULT_TOP_K = 2;

/**
 * Lexical relevance: 2 points per query term found in the title or snippet,
 * up to 1 point for snippet length, and up to 1 point for an early rank.
 */
export const scoreCandidate = (terms: string[], candidate: Candidate): number => {
  const title = candidate.title.toLowerCase();
  const snippet = candidate.snippet.toLowerCase();
  const overlap = terms.reduce((count, term) => (title.includes(term) || snippet.includes(term) ? count + 1 : count), 0);
  const lengthBonus = Math.min(candidate.snippet.length, SNIPPET_RICHNESS_CHARS) / SNIPPET_RICHNESS_CHARS;
  const rankBonus = 1 / (1 + candidate.rank / 10);
  return 2 * overlap + lengthBonus + rankBonus;
};

export const scoreCandidates = (
  query: string,
  candidates: ReadonlyArray<Candidate>,
  logger?: Logger,
): ScoredCandidate[] => {
  const terms = queryTerms(query);
  return candidates.map((candidate) => {
    let score = 0;
    try {
      score = scoreCandidate(terms, candidate);
    } catch (error) {
      logger?.debug('Candidate scoring failed', { rank: candidate.rank, error: describeError(error) });
    }
    return { ...candidate, score: Number.isFinite(score) ? score : 0 };
  });
};

/**
 * Picks the `k` highest-scoring candidates. Equal scores keep their input order.
 */
export const selectTop = (
  query: string,
  candidates: ReadonlyArray<Candidate>,
  k: number = DEFAULT_TOP_K,
  logger?: Logger,
): Candidate[] => {
  const limit = Math.max(0, Math.min(Math.floor(k), candidates.length));
  if (limit === 0) {
    return [];
  }
  const scored = scoreCandidates(query, candidates, logger).map((entry, index) => ({ entry, index }));
  scored.sort((a, b) => b.entry.score - a.entry.score || a.index - b.index);
  return scored.slice(0, limit).map(({ index }) => candidates[index]);
};
