import { describe, expect, it } from "vitest";
import {
  CustomTokenizer,
  DelimiterTokenizer,
  SliceTokenizer,
  createTokenizer,
} from "../index.js";
import { TrieError } from "../../errors.js";
import { validateTokenizerConfig } from "../../validation.js";

const E_ACUTE = "e\u0301";
const THUMBS_UP_MEDIUM = "\u{1F44D}\u{1F3FD}";
const FAMILY = "\u{1F468}\u200D\u{1F469}\u200D\u{1F467}";

describe("SliceTokenizer", () => {
  it("splits one grapheme per token by default", () => {
    expect(new SliceTokenizer().tokenize("cat")).toEqual(["c", "a", "t"]);
  });

  it("groups graphemes and leaves a shorter last token", () => {
    const t = new SliceTokenizer(2);
    expect(t.tokenize("abcdef")).toEqual(["ab", "cd", "ef"]);
    expect(t.tokenize("abc")).toEqual(["ab", "c"]);
  });

  it("never splits a multi-codepoint grapheme", () => {
    expect(new SliceTokenizer(1).tokenize(`a${FAMILY}b`)).toEqual(["a", FAMILY, "b"]);
    expect(new SliceTokenizer(1).tokenize(`caf${E_ACUTE}`)).toEqual(["c", "a", "f", E_ACUTE]);
    expect(new SliceTokenizer(2).tokenize(`${E_ACUTE}x${THUMBS_UP_MEDIUM}`)).toEqual([`${E_ACUTE}x`, THUMBS_UP_MEDIUM]);
  });

  it("yields no tokens for the empty key", () => {
    expect(new SliceTokenizer(3).tokenize("")).toEqual([]);
  });

  it("round-trips keys", () => {
    for (const n of [1, 2, 3]) {
      const t = new SliceTokenizer(n);
      for (const key of ["", "x", E_ACUTE, FAMILY, `hello ${THUMBS_UP_MEDIUM} w${E_ACUTE}rld`]) {
        expect(t.detokenize(t.tokenize(key))).toBe(key);
      }
    }
  });

  it("exposes its configuration", () => {
    expect(new SliceTokenizer(4).config).toEqual({ kind: "slice", length: 4 });
  });

  it("rejects a zero or fractional length", () => {
    expect(() => new SliceTokenizer(0)).toThrow(TrieError);
    expect(() => new SliceTokenizer(1.5)).toThrow("Invalid argument: invalid slice tokenizer ($.length must be an integer)");

    try {
      new SliceTokenizer(0);
    } catch (e) {
      expect(e).toBeInstanceOf(TrieError);
      if (e instanceof TrieError) {
        expect(e.code).toBe("INVALID_ARGUMENT");
        expect(e.title).toBe("Invalid argument");
        expect(e.errors).toEqual([{ path: "$.length", message: "must be at least 1" }]);
      }
    }
  });
});

describe("DelimiterTokenizer", () => {
  it("splits on the delimiter", () => {
    expect(new DelimiterTokenizer("_").tokenize("a_b_c")).toEqual(["a", "b", "c"]);
    expect(new DelimiterTokenizer("::").tokenize("std::io::Read")).toEqual(["std", "io", "Read"]);
  });

  it("yields no tokens for the empty key", () => {
    expect(new DelimiterTokenizer("_").tokenize("")).toEqual([]);
  });

  it("keeps empty segments", () => {
    expect(new DelimiterTokenizer("_").tokenize("_a__b_")).toEqual(["", "a", "", "b", ""]);
  });

  it("round-trips keys", () => {
    const t = new DelimiterTokenizer("/");
    for (const key of ["", "a", "/", "a/b/c", "/leading", "trailing/", `${FAMILY}/${E_ACUTE}`]) {
      expect(t.detokenize(t.tokenize(key))).toBe(key);
    }
  });

  it("never splits inside a grapheme cluster", () => {
    expect(new DelimiterTokenizer("\u200D").tokenize(FAMILY)).toEqual([FAMILY]);
    expect(new DelimiterTokenizer("\u0301").tokenize(`caf${E_ACUTE}`)).toEqual([`caf${E_ACUTE}`]);
    expect(new DelimiterTokenizer("e").tokenize(`caf${E_ACUTE}x`)).toEqual([`caf${E_ACUTE}x`]);
    expect(new DelimiterTokenizer("e").tokenize(`be${E_ACUTE}e`)).toEqual([`b${E_ACUTE}`, ""]);
  });

  it("splits next to multi-codepoint graphemes", () => {
    const t = new DelimiterTokenizer("/");
    expect(t.tokenize(`${THUMBS_UP_MEDIUM}/${FAMILY}/x`)).toEqual([THUMBS_UP_MEDIUM, FAMILY, "x"]);
  });

  it("rejects the empty delimiter", () => {
    expect(() => new DelimiterTokenizer("")).toThrow("Invalid argument: invalid delimiter tokenizer ($.delimiter must be non-empty)");
  });
});

describe("CustomTokenizer", () => {
  const split = (key: string): string[] => (key.length ? key.split(".").reverse() : []);
  const join = (tokens: string[]): string => [...tokens].reverse().join(".");

  it("delegates to the supplied functions", () => {
    const t = new CustomTokenizer(split, join);
    expect(t.tokenize("www.example.com")).toEqual(["com", "example", "www"]);
    expect(t.detokenize(["com", "example", "www"])).toBe("www.example.com");
  });

  it("holds the functions by reference", () => {
    const t = new CustomTokenizer(split, join);
    expect(t.config.kind).toBe("custom");
    if (t.config.kind === "custom") {
      expect(t.config.tokenize).toBe(split);
      expect(t.config.detokenize).toBe(join);
    }
  });

  it("does not let detokenize mutate the caller's tokens", () => {
    const t = new CustomTokenizer(split, (tokens) => tokens.reverse().join("."));
    const tokens = ["com", "example"];
    expect(t.detokenize(tokens)).toBe("example.com");
    expect(tokens).toEqual(["com", "example"]);
  });
});

describe("createTokenizer", () => {
  it("builds the strategy named by the config", () => {
    expect(createTokenizer({ kind: "slice", length: 2 })).toBeInstanceOf(SliceTokenizer);
    expect(createTokenizer({ kind: "delimiter", delimiter: "_" }).tokenize("a_b")).toEqual(["a", "b"]);

    const custom = createTokenizer({ kind: "custom", tokenize: (k) => [k], detokenize: (ts) => ts.join("") });
    expect(custom).toBeInstanceOf(CustomTokenizer);
    expect(custom.tokenize("whole")).toEqual(["whole"]);
  });
});

describe("validateTokenizerConfig", () => {
  it("accepts usable configurations", () => {
    expect(validateTokenizerConfig({ kind: "slice", length: 2 })).toEqual([]);
    expect(validateTokenizerConfig({ kind: "delimiter", delimiter: "/" })).toEqual([]);
  });

  it("reports each unusable field", () => {
    expect(validateTokenizerConfig({ kind: "slice", length: -2 })).toEqual([{ path: "$.length", message: "must be at least 1" }]);
    expect(validateTokenizerConfig({ kind: "delimiter", delimiter: "" })).toEqual([{ path: "$.delimiter", message: "must be non-empty" }]);
  });
});
