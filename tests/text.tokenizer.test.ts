import { describe, it } from "mocha";
import { expect } from "chai";

import { isAlphabeticToken, tokenizeText } from "../src/text/tokenizer.js";

describe("tokenizeText", () => {
  it("lowercases words and splits on whitespace", () => {
    expect(tokenizeText("Iranin financal  banks\tare strongss")).to.deep.equal([
      "iranin",
      "financal",
      "banks",
      "are",
      "strongss",
    ]);
  });

  it("emits punctuation as separate tokens", () => {
    expect(tokenizeText("Banks, rates; oil!")).to.deep.equal(["banks", ",", "rates", ";", "oil", "!"]);
  });

  it("keeps numbers, contractions and hyphenated words whole", () => {
    expect(tokenizeText("don't sell 2024 year-end")).to.deep.equal(["don't", "sell", "2024", "year-end"]);
  });

  it("returns no tokens for blank text", () => {
    expect(tokenizeText("   ")).to.deep.equal([]);
  });
});

describe("isAlphabeticToken", () => {
  it("accepts letters only", () => {
    expect(isAlphabeticToken("banks")).to.equal(true);
    expect(isAlphabeticToken("café")).to.equal(true);
  });

  it("rejects digits, punctuation and mixed tokens", () => {
    expect(isAlphabeticToken("2024")).to.equal(false);
    expect(isAlphabeticToken("don't")).to.equal(false);
    expect(isAlphabeticToken("b4")).to.equal(false);
    expect(isAlphabeticToken(",")).to.equal(false);
  });
});
