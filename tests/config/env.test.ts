/**
 * Table-driven tests covering the environment readers. Values are read from
 * plain objects so nothing leaks into `process.env`.
 */
import { describe, it } from "mocha";
import { expect } from "chai";

import { readOptionalEnum, readOptionalInt, readOptionalString } from "../../src/config/env.js";
import { InvalidConfigurationError } from "../../src/errors.js";

describe("config/env", () => {
  describe("readOptionalInt", () => {
    const cases: Array<{ raw: string | undefined; expected: number | undefined }> = [
      { raw: undefined, expected: undefined },
      { raw: "", expected: undefined },
      { raw: "   ", expected: undefined },
      { raw: "3", expected: 3 },
      { raw: " 12 ", expected: 12 },
      { raw: "+4", expected: 4 },
    ];

    for (const { raw, expected } of cases) {
      it(`reads ${JSON.stringify(raw)}`, () => {
        expect(readOptionalInt({ LIMIT: raw }, "LIMIT")).to.equal(expected);
      });
    }

    it("rejects values that are not integers", () => {
      expect(() => readOptionalInt({ LIMIT: "2.5" }, "LIMIT")).to.throw(
        InvalidConfigurationError,
        'environment variable LIMIT="2.5" must be an integer',
      );
      expect(() => readOptionalInt({ LIMIT: "two" }, "LIMIT")).to.throw(InvalidConfigurationError);
      expect(() => readOptionalInt({ LIMIT: "99999999999999999999" }, "LIMIT")).to.throw(
        InvalidConfigurationError,
        "must be a safe integer",
      );
    });

    it("enforces the bounds", () => {
      expect(() => readOptionalInt({ LIMIT: "-1" }, "LIMIT", { min: 0 })).to.throw(
        InvalidConfigurationError,
        "must be at least 0",
      );
      expect(() => readOptionalInt({ LIMIT: "9" }, "LIMIT", { max: 8 })).to.throw(
        InvalidConfigurationError,
        "must be at most 8",
      );
      expect(readOptionalInt({ LIMIT: "0" }, "LIMIT", { min: 0, max: 8 })).to.equal(0);
    });

    it("points the hint at the variable", () => {
      try {
        readOptionalInt({ LIMIT: "x" }, "LIMIT");
        expect.fail("malformed integers should be rejected");
      } catch (error) {
        expect(error).to.be.instanceOf(InvalidConfigurationError);
        if (!(error instanceof InvalidConfigurationError)) {
          return;
        }
        expect(error.hint).to.equal("unset LIMIT or fix its value");
        expect(error.details.issues).to.deep.equal([{ path: "LIMIT", message: "must be an integer" }]);
      }
    });
  });

  describe("readOptionalString", () => {
    it("trims values and maps blanks to undefined", () => {
      expect(readOptionalString({ NAME: "  words.txt " }, "NAME")).to.equal("words.txt");
      expect(readOptionalString({ NAME: " " }, "NAME")).to.equal(undefined);
      expect(readOptionalString({}, "NAME")).to.equal(undefined);
    });
  });

  describe("readOptionalEnum", () => {
    const allowed = ["linear", "length-bucket"] as const;

    it("matches case-insensitively and returns the canonical spelling", () => {
      expect(readOptionalEnum({ MODE: "LINEAR" }, "MODE", allowed)).to.equal("linear");
      expect(readOptionalEnum({ MODE: " length-bucket " }, "MODE", allowed)).to.equal("length-bucket");
      expect(readOptionalEnum({}, "MODE", allowed)).to.equal(undefined);
    });

    it("rejects values outside the allow-list", () => {
      expect(() => readOptionalEnum({ MODE: "trie" }, "MODE", allowed)).to.throw(
        InvalidConfigurationError,
        "must be one of linear, length-bucket",
      );
    });
  });
});
