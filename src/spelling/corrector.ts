import { z } from "zod";

import { resolveEditCosts, type EditCosts } from "../editDistance/costs.js";
import { distanceWithCosts } from "../editDistance/distance.js";
import { InvalidConfigurationError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import { isAlphabeticToken, tokenizeText } from "../text/tokenizer.js";
import { BUNDLED_VOCABULARY, LazyVocabulary } from "../vocabulary/loader.js";
import { Vocabulary } from "../vocabulary/vocabulary.js";
import { DEFAULT_MAX_EDITS } from "../config/settings.js";
import { createCandidateIndex, SEARCH_STRATEGIES, type SearchStrategy } from "./candidateIndex.js";
import { scoreCandidate, selectBestCandidate } from "./scoring.js";

/** Costs used while discovering candidates: replacing counts as two edits. */
export const CANDIDATE_COSTS: EditCosts = Object.freeze({ insertCost: 1, deleteCost: 1, replaceCost: 2 });

/** Replace cost used while scoring candidates. */
export const DEFAULT_SCORING_REPLACE_COST = 2;

const costOverride = z.number().finite().nonnegative();

const CorrectorOptionsSchema = z
  .object({
    maxEdits: z.number().int().nonnegative().optional(),
    searchStrategy: z.enum(SEARCH_STRATEGIES).optional(),
    scoringReplaceCost: costOverride.optional(),
    candidateCosts: z
      .object({
        insertCost: costOverride.optional(),
        deleteCost: costOverride.optional(),
        replaceCost: costOverride.optional(),
      })
      .strict()
      .optional(),
  })
  .passthrough();

export interface SpellingCorrectorOptions {
  /** Word list to check against; the fallback vocabulary is used when absent. */
  readonly vocabulary?: readonly string[] | Vocabulary;
  /** Candidates must be within this many edits. Defaults to 2. */
  readonly maxEdits?: number;
  readonly candidateCosts?: Partial<EditCosts>;
  /** Replace cost when scoring; insert and delete stay at 1. Defaults to 2. */
  readonly scoringReplaceCost?: number;
  readonly searchStrategy?: SearchStrategy;
  readonly fallbackVocabulary?: LazyVocabulary;
  readonly logger?: StructuredLogger;
}

/** Misspelled token together with its ranked replacements. */
export interface CandidateEntry {
  readonly misspelled: string;
  /** Position of the token in {@link SpellingCorrector.tokens}. */
  readonly tokenIndex: number;
  readonly candidates: readonly string[];
  readonly scores: readonly number[];
  /** Highest scoring candidate, `null` when nothing was close enough. */
  readonly best: string | null;
}

interface DraftEntry {
  misspelled: string;
  tokenIndex: number;
  candidates: string[];
  scores: number[];
  best: string | null;
}

function resolveVocabulary(options: SpellingCorrectorOptions): Vocabulary {
  if (options.vocabulary instanceof Vocabulary) {
    return options.vocabulary;
  }
  if (options.vocabulary !== undefined) {
    return Vocabulary.from(options.vocabulary);
  }
  return (options.fallbackVocabulary ?? BUNDLED_VOCABULARY).get();
}

/**
 * Vocabulary-based spelling corrector. The constructor runs the whole
 * pipeline once: tokens absent from the vocabulary are flagged, words within
 * `maxEdits` are collected as candidates, every candidate is scored from its
 * vocabulary frequency and distance, and the best one is kept.
 *
 * Candidate discovery and scoring use separate replace costs; both default to
 * 2 and neither is tied to `maxEdits`.
 */
export class SpellingCorrector {
  readonly text: string;
  readonly tokens: readonly string[];
  readonly vocabulary: Vocabulary;
  readonly maxEdits: number;
  readonly misspelledWords: readonly CandidateEntry[];

  private readonly candidateCosts: EditCosts;
  private readonly scoringCosts: EditCosts;
  private readonly searchStrategy: SearchStrategy;
  private readonly logger: StructuredLogger | undefined;

  constructor(text: string, options: SpellingCorrectorOptions = {}) {
    const parsed = CorrectorOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw InvalidConfigurationError.fromZod("spelling corrector options", parsed.error);
    }

    this.text = text;
    this.maxEdits = parsed.data.maxEdits ?? DEFAULT_MAX_EDITS;
    this.searchStrategy = parsed.data.searchStrategy ?? "length-bucket";
    const candidateOverrides = parsed.data.candidateCosts;
    this.candidateCosts = resolveEditCosts({
      insertCost: candidateOverrides?.insertCost ?? CANDIDATE_COSTS.insertCost,
      deleteCost: candidateOverrides?.deleteCost ?? CANDIDATE_COSTS.deleteCost,
      replaceCost: candidateOverrides?.replaceCost ?? CANDIDATE_COSTS.replaceCost,
    });
    this.scoringCosts = resolveEditCosts({ replaceCost: parsed.data.scoringReplaceCost ?? DEFAULT_SCORING_REPLACE_COST });
    this.logger = options.logger;
    this.vocabulary = resolveVocabulary(options);
    this.tokens = Object.freeze(tokenizeText(text));

    const drafts = this.findMisspelled();
    this.findCandidates(drafts);
    this.computeScores(drafts);
    this.selectBest(drafts);
    this.misspelledWords = Object.freeze(
      drafts.map((draft): CandidateEntry =>
        Object.freeze({
          misspelled: draft.misspelled,
          tokenIndex: draft.tokenIndex,
          candidates: Object.freeze(draft.candidates),
          scores: Object.freeze(draft.scores),
          best: draft.best,
        }),
      ),
    );

    this.logger?.debug("spelling_correction_completed", {
      tokens: this.tokens.length,
      misspelled: this.misspelledWords.length,
      corrected: this.misspelledWords.filter((entry) => entry.best !== null).length,
    });
  }

  /**
   * Rebuilds the text from its tokens separated by single spaces, replacing
   * each misspelled token at its own position with its best candidate.
   */
  retrieveCorrected(): string {
    const output = [...this.tokens];
    for (const entry of this.misspelledWords) {
      if (entry.best !== null) {
        output[entry.tokenIndex] = entry.best;
      }
    }
    return output.join(" ");
  }

  private findMisspelled(): DraftEntry[] {
    const drafts: DraftEntry[] = [];
    this.tokens.forEach((token, tokenIndex) => {
      if (isAlphabeticToken(token) && !this.vocabulary.has(token)) {
        drafts.push({ misspelled: token, tokenIndex, candidates: [], scores: [], best: null });
      }
    });
    this.logger?.debug("spelling_misspelled_detected", {
      count: drafts.length,
      tokens: drafts.map((draft) => draft.misspelled),
    });
    return drafts;
  }

  private findCandidates(drafts: DraftEntry[]): void {
    if (drafts.length === 0) {
      return;
    }
    const index = createCandidateIndex(this.vocabulary, this.searchStrategy);
    const cache = new Map<string, string[]>();
    for (const draft of drafts) {
      let found = cache.get(draft.misspelled);
      if (!found) {
        found = index.candidates(draft.misspelled, this.maxEdits, this.candidateCosts);
        cache.set(draft.misspelled, found);
      }
      draft.candidates.push(...found);
    }
  }

  private computeScores(drafts: DraftEntry[]): void {
    for (const draft of drafts) {
      for (const candidate of draft.candidates) {
        const distance = distanceWithCosts(draft.misspelled, candidate, this.scoringCosts);
        draft.scores.push(scoreCandidate(this.vocabulary.frequency(candidate), distance));
      }
    }
  }

  private selectBest(drafts: DraftEntry[]): void {
    for (const draft of drafts) {
      draft.best = selectBestCandidate(draft.candidates, draft.scores);
      this.logger?.debug("spelling_candidates_ranked", {
        misspelled: draft.misspelled,
        token_index: draft.tokenIndex,
        candidates: draft.candidates.length,
        best: draft.best,
      });
    }
  }
}
