/**
 * ConsensusPanel Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { ConsensusPanel, pickQuestion } from '../src/consensus/panel.js';
import { createDefaultRaters, RATER_PROFILES, type RaterProfile } from '../src/consensus/profiles.js';
import { rankCandidates, weightedScore } from '../src/consensus/scoring.js';
import type {
  Ballot,
  Candidate,
  Question,
  Rater,
  ScoreMetrics,
  Vote,
} from '../src/types/index.js';
import { ConfigError } from '../src/utils/errors.js';

function metrics(value: number): ScoreMetrics {
  return {
    accuracy: value,
    relevance: value,
    completeness: value,
    explainability: value,
    efficiency: value,
    safety: value,
  };
}

function candidate(id: string): Candidate {
  return {
    id,
    answer: vi.fn((question: Question) => Promise.resolve(`${id} answers ${question.id}`)),
  };
}

function rater(profile: RaterProfile, votes: Record<string, Vote>, score = 4): Rater {
  return {
    id: `${profile.specialty}-rater`,
    specialty: profile.specialty,
    weights: profile.weights,
    evaluate: ({ candidate: id }) =>
      Promise.resolve({ metrics: metrics(score), vote: votes[id] ?? 'reject', rationale: `${id} reviewed` }),
  };
}

function profile(index: number): RaterProfile {
  const found = RATER_PROFILES[index];
  if (!found) throw new Error(`no profile ${index}`);
  return found;
}

function adjudicator(selected: string | null) {
  const draftTieBreaker = vi.fn(() =>
    Promise.resolve({ id: 'tie-break', text: 'Explain the hardest edge case', focus: 'technical' })
  );
  const judge = vi.fn(() => Promise.resolve({ selected, justification: 'clearer answer', scores: {} }));
  return { draftTieBreaker, judge };
}

describe('ConsensusPanel', () => {
  describe('majority vote', () => {
    it('should pick a unanimously accepted candidate with high confidence', async () => {
      const judge = adjudicator(null);
      const panel = new ConsensusPanel({
        raters: createDefaultRaters(3, (p) => rater(p, { x: 'accept', y: 'reject' }).evaluate),
        adjudicator: judge,
      });

      const result = await panel.evaluate('Summarize a report', [candidate('x'), candidate('y')]);

      expect(result.winner).toBe('x');
      expect(result.tieBreakUsed).toBe(false);
      expect(result.confidence).toBe('high');
      expect(result.transcript.tieBreak).toBeNull();
      expect(judge.draftTieBreaker).not.toHaveBeenCalled();
    });

    it('should report medium confidence below the high threshold', async () => {
      const raters = [0, 1, 2, 3, 4].map((i) =>
        rater(profile(i), i < 3 ? { x: 'accept' } : { x: 'reject' })
      );
      const panel = new ConsensusPanel({ raters, adjudicator: adjudicator(null) });

      const result = await panel.evaluate('Summarize a report', [candidate('x')]);

      expect(result.winner).toBe('x');
      expect(result.confidence).toBe('medium');
    });

    it('should treat four of five favouring raters as high confidence', async () => {
      const raters = [0, 1, 2, 3, 4].map((i) =>
        rater(profile(i), i < 4 ? { x: 'accept' } : { x: 'reject' })
      );
      const panel = new ConsensusPanel({ raters, adjudicator: adjudicator(null) });

      const result = await panel.evaluate('Summarize a report', [candidate('x')]);

      expect(result.confidence).toBe('high');
    });
  });

  describe('tie-break', () => {
    function splitPanel(selected: string | null): { panel: ConsensusPanel; judge: ReturnType<typeof adjudicator> } {
      const judge = adjudicator(selected);
      const raters = [0, 1, 2, 3].map((i) =>
        rater(profile(i), i < 2 ? { x: 'accept', y: 'reject' } : { x: 'reject', y: 'accept' })
      );
      return { panel: new ConsensusPanel({ raters, adjudicator: judge }), judge };
    }

    it('should run exactly one tie-break round on a 2-2 split', async () => {
      const { panel, judge } = splitPanel('y');
      const x = candidate('x');
      const y = candidate('y');

      const result = await panel.evaluate('Summarize a report', [x, y]);

      expect(result.tieBreakUsed).toBe(true);
      expect(result.confidence).toBe('low');
      expect(result.winner).toBe('y');
      expect(judge.draftTieBreaker).toHaveBeenCalledTimes(1);
      expect(judge.judge).toHaveBeenCalledTimes(1);
      expect(result.transcript.tieBreak?.leaders).toEqual(['x', 'y']);
      expect(result.transcript.tieBreak?.answers).toEqual({
        x: 'x answers tie-break',
        y: 'y answers tie-break',
      });
      expect(result.transcript.tieBreak?.fallback).toBeNull();
    });

    it('should fall back to the top-ranked leader when the judgement names nobody', async () => {
      const { panel } = splitPanel(null);

      const result = await panel.evaluate('Summarize a report', [candidate('x'), candidate('y')]);

      expect(result.winner).toBe('x');
      expect(result.confidence).toBe('low');
      expect(result.transcript.tieBreak?.fallback).toBe('ranking');
    });

    it('should ignore a pick outside the leaders', async () => {
      const { panel } = splitPanel('z');

      const result = await panel.evaluate('Summarize a report', [candidate('x'), candidate('y')]);

      expect(result.winner).toBe('x');
      expect(result.transcript.tieBreak?.fallback).toBe('ranking');
    });
  });

  describe('protocol', () => {
    it('should have every rater score every answer', async () => {
      const panel = new ConsensusPanel({
        raters: createDefaultRaters(3, (p) => rater(p, { x: 'accept' }).evaluate),
        adjudicator: adjudicator(null),
      });

      const result = await panel.evaluate('Summarize a report', [candidate('x')]);

      // three default questions, one per specialty, each scored by three raters
      expect(result.ballots).toHaveLength(9);
      expect(result.transcript.rounds[0]?.questions.map((q) => q.questionId)).toEqual([
        'default-technical',
        'default-creative',
        'default-efficiency',
      ]);
    });

    it('should ask a shared question only once', async () => {
      const x = candidate('x');
      const panel = new ConsensusPanel({
        raters: createDefaultRaters(3, (p) => rater(p, { x: 'accept' }).evaluate),
        adjudicator: adjudicator(null),
      });

      const result = await panel.evaluate('Summarize a report', [x], {
        questions: [{ id: 'q1', text: 'What is the plan?', focus: 'general' }],
      });

      expect(x.answer).toHaveBeenCalledTimes(1);
      expect(result.ballots.map((b) => b.rater)).toEqual([
        'technical-rater',
        'creative-rater',
        'efficiency-rater',
      ]);
    });

    it('should use questions from the designer when one is configured', async () => {
      const design = vi.fn(() =>
        Promise.resolve([{ id: 'designed', text: 'Walk through the risks', focus: 'risk' }])
      );
      const panel = new ConsensusPanel({
        raters: createDefaultRaters(3, (p) => rater(p, { x: 'accept' }).evaluate),
        adjudicator: adjudicator(null),
        questionDesigner: { design },
      });

      const result = await panel.evaluate('Summarize a report', [candidate('x')], {
        questions: [{ id: 'ignored', text: 'Unused', focus: 'technical' }],
      });

      expect(design).toHaveBeenCalledWith('Summarize a report');
      expect(result.ballots.every((b) => b.questionId === 'designed')).toBe(true);
    });

    it('should rank by mean score with a stable order', async () => {
      const raters = createDefaultRaters(3, (p) => (input) =>
        Promise.resolve({
          metrics: metrics(input.candidate === 'b' ? 5 : 3),
          vote: 'accept',
          rationale: p.specialty,
        })
      );
      const panel = new ConsensusPanel({ raters, adjudicator: adjudicator(null) });

      const result = await panel.evaluate('Summarize a report', [
        candidate('a'),
        candidate('b'),
        candidate('c'),
      ]);

      expect(result.ranking).toEqual([
        ['b', 100],
        ['a', 60],
        ['c', 60],
      ]);
      // all three win outright; most favouring raters tie, so ranking decides
      expect(result.winner).toBe('b');
    });

    it('should summarize vote counts', async () => {
      const panel = new ConsensusPanel({
        raters: createDefaultRaters(3, (p) => rater(p, { x: 'accept', y: 'reject' }).evaluate),
        adjudicator: adjudicator(null),
      });
      const result = await panel.evaluate('Summarize a report', [candidate('x'), candidate('y')]);

      expect(panel.summarize(result).votes).toEqual({
        x: { accept: 9, reject: 0, favoringRaters: 3 },
        y: { accept: 0, reject: 9, favoringRaters: 0 },
      });
    });
  });

  describe('construction', () => {
    it('should require at least three raters', () => {
      const raters = [rater(profile(0), {}), rater(profile(1), {})];

      expect(() => new ConsensusPanel({ raters, adjudicator: adjudicator(null) })).toThrow(ConfigError);
    });

    it('should reject raters sharing a weight profile', () => {
      const twin: Rater = { ...rater(profile(0), {}), id: 'twin' };
      const raters = [rater(profile(0), {}), rater(profile(1), {}), twin];

      expect(() => new ConsensusPanel({ raters, adjudicator: adjudicator(null) })).toThrow(
        'Raters technical-rater and twin share a weight profile'
      );
    });

    it('should only build odd default panels', () => {
      expect(() => createDefaultRaters(4, (p) => rater(p, {}).evaluate)).toThrow(ConfigError);
      expect(createDefaultRaters(5, (p) => rater(p, {}).evaluate).map((r) => r.specialty)).toEqual([
        'technical',
        'creative',
        'efficiency',
        'user-centric',
        'risk',
      ]);
    });
  });
});

describe('pickQuestion', () => {
  const bank: Question[] = [
    { id: 'q1', text: 'General question', focus: 'general' },
    { id: 'q2', text: 'What could go wrong?', focus: 'Risk and safety' },
  ];

  it('should prefer a question matching the specialty', () => {
    expect(pickQuestion(rater(profile(4), {}), bank).id).toBe('q2');
  });

  it('should fall back to the first question', () => {
    expect(pickQuestion(rater(profile(0), {}), bank).id).toBe('q1');
  });

  it('should generate a question for an empty bank', () => {
    expect(pickQuestion(rater(profile(1), {}), []).text).toBe(
      'How would you approach this task from a creative perspective?'
    );
  });
});

describe('scoring', () => {
  it('should clamp metrics and weight them', () => {
    const weights = profile(0).weights;

    expect(weightedScore({ ...metrics(0), accuracy: 7, relevance: -2, completeness: 2.5 }, weights)).toBe(50);
  });

  it('should keep candidate order for equal means', () => {
    const ballot = (c: string, overallScore: number): Ballot => ({
      candidate: c,
      rater: 'r',
      questionId: 'q',
      vote: 'accept',
      scores: metrics(3),
      rationale: '',
      overallScore,
    });

    expect(rankCandidates(['p', 'q', 'r'], [ballot('p', 40), ballot('q', 70), ballot('r', 40)])).toEqual([
      ['q', 70],
      ['p', 40],
      ['r', 40],
    ]);
  });
});
