/**
 * Evaluation criteria, always scored 0-5.
 */
export const CRITERIA = [
  'accuracy',
  'relevance',
  'completeness',
  'explainability',
  'efficiency',
  'safety',
] as const;

export type Criterion = (typeof CRITERIA)[number];

export type ScoreMetrics = Record<Criterion, number>;

/**
 * Per-criterion weights of one rater. Sum to 1.
 */
export type CriterionWeights = Record<Criterion, number>;

export type Vote = 'accept' | 'reject';

export type Confidence = 'low' | 'medium' | 'high';

export interface Question {
  id: string;
  text: string;
  /** What the question probes, matched against rater specialties */
  focus: string;
}

export interface Ballot {
  candidate: string;
  rater: string;
  questionId: string;
  vote: Vote;
  scores: ScoreMetrics;
  rationale: string;
  /** Weighted 0-100 score under the rater's weight profile */
  overallScore: number;
}

export interface EvaluationInput {
  taskDescription: string;
  candidate: string;
  question: Question;
  answer: string;
}

export interface RaterEvaluation {
  metrics: ScoreMetrics;
  vote: Vote;
  rationale: string;
}

export interface Rater {
  readonly id: string;
  readonly specialty: string;
  readonly weights: CriterionWeights;
  evaluate(input: EvaluationInput): Promise<RaterEvaluation>;
}

export interface Candidate {
  readonly id: string;
  answer(question: Question, taskDescription: string): Promise<string>;
}

export interface QuestionDesigner {
  design(taskDescription: string): Promise<Question[]>;
}

export interface TieBreakJudgement {
  selected: string | null;
  justification: string;
  scores: Record<string, number>;
}

export interface Adjudicator {
  draftTieBreaker(input: {
    taskDescription: string;
    leaders: string[];
    bank: Question[];
  }): Promise<Question>;
  judge(input: {
    taskDescription: string;
    question: Question;
    answers: Record<string, string>;
  }): Promise<TieBreakJudgement>;
}

export interface TranscriptEntry {
  rater: string;
  questionId: string;
  question: string;
  answer: string;
}

export interface TieBreakTranscript {
  question: Question;
  leaders: string[];
  answers: Record<string, string>;
  judgement: TieBreakJudgement;
  /** Set when the judgement named no leader and ranking order decided */
  fallback: 'ranking' | null;
  selected: string;
}

export interface ConsensusTranscript {
  sessionId: string;
  task: string;
  rounds: Array<{ candidate: string; questions: TranscriptEntry[] }>;
  tieBreak: TieBreakTranscript | null;
}

export type RankingEntry = [candidate: string, meanScore: number];

export interface ConsensusResult {
  sessionId: string;
  taskDescription: string;
  candidates: string[];
  raters: string[];
  ballots: Ballot[];
  ranking: RankingEntry[];
  winner: string;
  confidence: Confidence;
  tieBreakUsed: boolean;
  transcript: ConsensusTranscript;
  createdAt: Date;
}

export interface VoteSummary {
  sessionId: string;
  votes: Record<string, { accept: number; reject: number; favoringRaters: number }>;
  ranking: RankingEntry[];
  winner: string;
  confidence: Confidence;
  tieBreakUsed: boolean;
}
