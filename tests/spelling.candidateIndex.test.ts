import { describe, it } from "mocha";
import { expect } from "chai";

import { CANDIDATE_COSTS } from "../src/spelling/corrector.js";
import { createCandidateIndex, LengthBucketIndex, LinearScanIndex } from "../src/spelling/candidateIndex.js";
import { scoreCandidate, selectBestCandidate } from "../src/spelling/scoring.js";
import { Vocabulary } from "../src/vocabulary/vocabulary.js";

const VOCABULARY = Vocabulary.from(["hat", "hot", "heat", "hit", "hat", "at", "bathe", "ht"]);

describe("candidate indexes", () => {
  it("collects every distinct word within the threshold in first-appearance order", () => {
    const index = new LinearScanIndex(VOCABULARY);
    expect(index.candidates("hbt", 2, CANDIDATE_COSTS)).to.deep.equal(["hat", "hot", "hit", "ht"]);
  });

  it("returns the same candidates from the length buckets", () => {
    const linear = new LinearScanIndex(VOCABULARY);
    const buckets = new LengthBucketIndex(VOCABULARY);
    for (const token of ["hbt", "he", "bath", "hhat", "x"]) {
      for (const maxEdits of [0, 1, 2, 3]) {
        expect(buckets.candidates(token, maxEdits, CANDIDATE_COSTS), `${token}/${maxEdits}`).to.deep.equal(
          linear.candidates(token, maxEdits, CANDIDATE_COSTS),
        );
      }
    }
  });

  it("scans every word when inserting is free", () => {
    const vocabulary = Vocabulary.from(["hbt", "xhbtyy", "ab"]);
    const costs = { insertCost: 0, deleteCost: 1, replaceCost: 2 };
    expect(new LengthBucketIndex(vocabulary).candidates("hbt", 0, costs)).to.deep.equal(["hbt", "xhbtyy"]);
  });

  it("builds the index matching the requested strategy", () => {
    expect(createCandidateIndex(VOCABULARY, "linear")).to.be.instanceOf(LinearScanIndex);
    expect(createCandidateIndex(VOCABULARY, "length-bucket")).to.be.instanceOf(LengthBucketIndex);
  });
});

describe("candidate scoring", () => {
  it("weights frequency against distance", () => {
    expect(scoreCandidate(4, 0)).to.equal(2);
    expect(scoreCandidate(0, 1)).to.equal(0);
    expect(scoreCandidate(2, 2)).to.be.closeTo(Math.sqrt(2 / 3), 1e-12);
  });

  it("keeps the highest score", () => {
    expect(selectBestCandidate(["hat", "hot"], [0.5, 0.9])).to.equal("hot");
  });

  it("breaks ties on the lexicographically smallest word", () => {
    expect(selectBestCandidate(["hot", "hit", "hat"], [1, 1, 1])).to.equal("hat");
  });

  it("returns null without candidates", () => {
    expect(selectBestCandidate([], [])).to.equal(null);
  });
});
