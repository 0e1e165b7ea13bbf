/**
 * Consensus Panel
 *
 * Interviews candidates with a panel of raters and picks one by vote.
 *
 * Each rater picks one question per candidate, the candidate answers each
 * distinct question once, and every rater scores every answer. A rater
 * favours a candidate when most of its ballots for that candidate accept.
 * A candidate with a strict majority of favouring raters wins outright;
 * otherwise a single tie-break round is judged by the adjudicator.
 */

import { nanoid } from 'nanoid';
import type {
  Adjudicator,
  Ballot,
  Candidate,
  Confidence,
  ConsensusResult,
  ConsensusTranscript,
  Question,
  QuestionDesigner,
  RankingEntry,
  Rater,
  TieBreakTranscript,
  TranscriptEntry,
  VoteSummary,
} from '../types/index.js';
import { AssignmentError, ConfigError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { clampMetrics, rankCandidates, sameWeights, weightedScore } from './scoring.js';

const log = createLogger('consensus-panel');

/** Share of favouring raters at or above which confidence is high */
export const HIGH_CONFIDENCE_RATIO = 0.8;

export interface ConsensusPanelOptions {
  raters: Rater[];
  adjudicator: Adjudicator;
  questionDesigner?: QuestionDesigner;
  /** How many top-ranked candidates enter a tie-break */
  tieBreakLeaders?: number;
}

export interface EvaluateOptions {
  /** Question bank; ignored when a question designer is configured */
  questions?: Question[];
}

interface Tally {
  accept: number;
  reject: number;
  favoringRaters: number;
}

export class ConsensusPanel {
  private readonly raters: Rater[];
  private readonly adjudicator: Adjudicator;
  private readonly questionDesigner: QuestionDesigner | undefined;
  private readonly tieBreakLeaders: number;

  constructor(options: ConsensusPanelOptions) {
    validateRaters(options.raters);
    this.raters = [...options.raters];
    this.adjudicator = options.adjudicator;
    this.questionDesigner = options.questionDesigner;
    this.tieBreakLeaders = options.tieBreakLeaders ?? 2;
    if (!Number.isInteger(this.tieBreakLeaders) || this.tieBreakLeaders < 1) {
      throw new ConfigError(`tieBreakLeaders must be a positive integer, got ${this.tieBreakLeaders}`);
    }
  }

  get size(): number {
    return this.raters.length;
  }

  async evaluate(
    taskDescription: string,
    candidates: Candidate[],
    options: EvaluateOptions = {}
  ): Promise<ConsensusResult> {
    if (candidates.length === 0) {
      throw new AssignmentError('No candidates to evaluate');
    }
    const candidateIds = candidates.map((c) => c.id);
    if (new Set(candidateIds).size !== candidateIds.length) {
      throw new ConfigError(`Duplicate candidate ids: ${candidateIds.join(', ')}`);
    }

    const sessionId = nanoid(12);
    const bank = this.questionDesigner
      ? await this.questionDesigner.design(taskDescription)
      : (options.questions ?? []);

    log.info(
      { sessionId, candidates: candidateIds, raters: this.raters.map((r) => r.id), questions: bank.length },
      'Consensus session started'
    );

    const transcript: ConsensusTranscript = { sessionId, task: taskDescription, rounds: [], tieBreak: null };
    const ballots: Ballot[] = [];

    for (const candidate of candidates) {
      const entries = await this.interview(candidate, taskDescription, bank);
      transcript.rounds.push({ candidate: candidate.id, questions: entries });
      ballots.push(...(await this.score(candidate.id, taskDescription, bank, entries)));
    }

    const ranking = rankCandidates(candidateIds, ballots);
    const tallies = this.tally(candidateIds, ballots);
    const majority = this.majorityWinner(ranking, tallies);

    let winner: string;
    let confidence: Confidence;
    if (majority) {
      winner = majority.candidate;
      confidence = majority.ratio >= HIGH_CONFIDENCE_RATIO ? 'high' : 'medium';
    } else {
      transcript.tieBreak = await this.tieBreak(taskDescription, candidates, ranking, bank);
      winner = transcript.tieBreak.selected;
      confidence = 'low';
    }

    log.info(
      { sessionId, winner, confidence, tieBreakUsed: transcript.tieBreak !== null, ranking },
      'Consensus reached'
    );

    return {
      sessionId,
      taskDescription,
      candidates: candidateIds,
      raters: this.raters.map((r) => r.id),
      ballots,
      ranking,
      winner,
      confidence,
      tieBreakUsed: transcript.tieBreak !== null,
      transcript,
      createdAt: new Date(),
    };
  }

  /**
   * Vote counts per candidate for a finished session.
   */
  summarize(result: ConsensusResult): VoteSummary {
    return {
      sessionId: result.sessionId,
      votes: Object.fromEntries(this.tally(result.candidates, result.ballots)),
      ranking: result.ranking,
      winner: result.winner,
      confidence: result.confidence,
      tieBreakUsed: result.tieBreakUsed,
    };
  }

  private async interview(
    candidate: Candidate,
    taskDescription: string,
    bank: readonly Question[]
  ): Promise<TranscriptEntry[]> {
    const entries: TranscriptEntry[] = [];
    for (const rater of this.raters) {
      const question = pickQuestion(rater, bank);
      if (entries.some((entry) => entry.questionId === question.id)) {
        continue;
      }
      const answer = await candidate.answer(question, taskDescription);
      entries.push({ rater: rater.id, questionId: question.id, question: question.text, answer });
    }
    return entries;
  }

  private async score(
    candidate: string,
    taskDescription: string,
    bank: readonly Question[],
    entries: readonly TranscriptEntry[]
  ): Promise<Ballot[]> {
    const ballots: Ballot[] = [];
    for (const entry of entries) {
      const question = bank.find((q) => q.id === entry.questionId) ?? {
        id: entry.questionId,
        text: entry.question,
        focus: '',
      };
      for (const rater of this.raters) {
        const evaluation = await rater.evaluate({
          taskDescription,
          candidate,
          question,
          answer: entry.answer,
        });
        const scores = clampMetrics(evaluation.metrics);
        ballots.push({
          candidate,
          rater: rater.id,
          questionId: entry.questionId,
          vote: evaluation.vote,
          scores,
          rationale: evaluation.rationale,
          overallScore: weightedScore(scores, rater.weights),
        });
      }
    }
    return ballots;
  }

  private tally(candidates: readonly string[], ballots: readonly Ballot[]): Map<string, Tally> {
    const tallies = new Map<string, Tally>();
    for (const candidate of candidates) {
      const own = ballots.filter((b) => b.candidate === candidate);
      const raterIds = [...new Set(own.map((b) => b.rater))];
      const favoringRaters = raterIds.filter((rater) => {
        const mine = own.filter((b) => b.rater === rater);
        return mine.filter((b) => b.vote === 'accept').length * 2 > mine.length;
      }).length;
      const accept = own.filter((b) => b.vote === 'accept').length;
      tallies.set(candidate, { accept, reject: own.length - accept, favoringRaters });
    }
    return tallies;
  }

  private majorityWinner(
    ranking: readonly RankingEntry[],
    tallies: ReadonlyMap<string, Tally>
  ): { candidate: string; ratio: number } | null {
    let best: { candidate: string; favoring: number } | null = null;
    for (const [candidate] of ranking) {
      const favoring = tallies.get(candidate)?.favoringRaters ?? 0;
      if (favoring * 2 <= this.raters.length) continue;
      if (!best || favoring > best.favoring) {
        best = { candidate, favoring };
      }
    }
    return best ? { candidate: best.candidate, ratio: best.favoring / this.raters.length } : null;
  }

  private async tieBreak(
    taskDescription: string,
    candidates: readonly Candidate[],
    ranking: readonly RankingEntry[],
    bank: Question[]
  ): Promise<TieBreakTranscript> {
    const leaders = ranking.slice(0, this.tieBreakLeaders).map(([candidate]) => candidate);
    log.info({ leaders }, 'No majority, running tie-break');

    const question = await this.adjudicator.draftTieBreaker({ taskDescription, leaders, bank });
    const answers: Record<string, string> = {};
    for (const leader of leaders) {
      const candidate = candidates.find((c) => c.id === leader);
      if (candidate) {
        answers[leader] = await candidate.answer(question, taskDescription);
      }
    }

    const judgement = await this.adjudicator.judge({ taskDescription, question, answers });
    const [topLeader] = leaders;
    if (topLeader === undefined) {
      throw new AssignmentError('Tie-break has no leaders');
    }

    const named = judgement.selected !== null && leaders.includes(judgement.selected);
    if (!named) {
      log.warn({ selected: judgement.selected, leaders }, 'Tie-break inconclusive, using ranking');
    }
    return {
      question,
      leaders,
      answers,
      judgement,
      fallback: named ? null : 'ranking',
      selected: named && judgement.selected !== null ? judgement.selected : topLeader,
    };
  }
}

/**
 * First bank question whose focus mentions the rater's specialty, else the
 * bank's first question, else a generic one.
 */
export function pickQuestion(rater: Rater, bank: readonly Question[]): Question {
  const specialty = rater.specialty.toLowerCase();
  const focused = bank.find((q) => q.focus.toLowerCase().includes(specialty));
  if (focused) return focused;
  const [first] = bank;
  if (first) return first;
  return {
    id: `default-${rater.specialty}`,
    text: `How would you approach this task from a ${rater.specialty} perspective?`,
    focus: rater.specialty,
  };
}

function validateRaters(raters: readonly Rater[]): void {
  if (raters.length < 3) {
    throw new ConfigError(`A consensus panel needs at least 3 raters, got ${raters.length}`);
  }
  const ids = new Set(raters.map((r) => r.id));
  if (ids.size !== raters.length) {
    throw new ConfigError('Rater ids must be unique');
  }
  raters.forEach((rater, index) => {
    const twin = raters.slice(index + 1).find((other) => sameWeights(rater.weights, other.weights));
    if (twin) {
      throw new ConfigError(`Raters ${rater.id} and ${twin.id} share a weight profile`);
    }
  });
}
