import { Effect, Either } from "effect";
import { expect, test } from "vitest";
import {
  alphabet,
  type ConfigInvalid,
  decodeAlphabet,
  isColorCode,
} from "./alphabet.ts";

// --- Helpers ---

const colors = {
  red: 63,
  orange: 64,
  yellow: 65,
  green: 66,
  blue: 67,
  violet: 68,
  white: 69,
  black: 70,
  filled: 71,
};

async function decodeFailure(json: unknown): Promise<ConfigInvalid> {
  const result = await Effect.runPromise(Effect.either(decodeAlphabet(json)));
  if (Either.isRight(result)) throw new Error("Expected failure but got success");
  return result.left;
}

// --- Loaded table ---

test("alphabet: maps letters, digits and punctuation to tile codes", () => {
  expect(alphabet.codeByCharacter.get(" ")).toBe(0);
  expect(alphabet.codeByCharacter.get("A")).toBe(1);
  expect(alphabet.codeByCharacter.get("Z")).toBe(26);
  expect(alphabet.codeByCharacter.get("1")).toBe(27);
  expect(alphabet.codeByCharacter.get("0")).toBe(36);
  expect(alphabet.codeByCharacter.get(",")).toBe(55);
  expect(alphabet.codeByCharacter.get("°")).toBe(62);
});

test("alphabet: maps codes back to characters", () => {
  expect(alphabet.characterByCode.get(56)).toBe(".");
  expect(alphabet.characterByCode.get(50)).toBe(":");
});

test("alphabet: has no lowercase letters", () => {
  expect(alphabet.codeByCharacter.has("a")).toBe(false);
});

test("alphabet: names the nine color tiles", () => {
  expect(alphabet.codeByColor.size).toBe(9);
  expect(alphabet.codeByColor.get("red")).toBe(63);
  expect(alphabet.codeByColor.get("filled")).toBe(71);
  expect(alphabet.colorByCode.get(67)).toBe("blue");
});

test("isColorCode: accepts 63..71 only", () => {
  expect(isColorCode(62)).toBe(false);
  expect(isColorCode(63)).toBe(true);
  expect(isColorCode(71)).toBe(true);
  expect(isColorCode(72)).toBe(false);
});

// --- decodeAlphabet ---

test("decodeAlphabet: valid table decodes", async () => {
  const table = await Effect.runPromise(
    decodeAlphabet({ characters: { " ": 0, A: 1 }, colors }),
  );
  expect(table.codeByCharacter.get("A")).toBe(1);
  expect(table.colorByCode.get(64)).toBe("orange");
});

test("decodeAlphabet: non-object input returns ConfigInvalid", async () => {
  const error = await decodeFailure("nope");
  expect(error._tag).toBe("ConfigInvalid");
  expect(error.message.startsWith("Invalid alphabet:")).toBe(true);
});

test("decodeAlphabet: multi-character key is rejected", async () => {
  const error = await decodeFailure({ characters: { AB: 1 }, colors });
  expect(error.message).toBe('Character key "AB" must be a single character');
});

test("decodeAlphabet: character code in the color range is rejected", async () => {
  const error = await decodeFailure({ characters: { A: 70 }, colors });
  expect(error.message).toBe('Character "A" has code 70 outside 0..62');
});

test("decodeAlphabet: duplicate codes are rejected", async () => {
  const error = await decodeFailure({ characters: { A: 1, B: 1 }, colors });
  expect(error.message).toBe("Code 1 is used more than once");
});

test("decodeAlphabet: wrong number of colors is rejected", async () => {
  const { filled: _, ...eight } = colors;
  const error = await decodeFailure({ characters: { A: 1 }, colors: eight });
  expect(error.message).toBe("Expected 9 colors, found 8");
});

test("decodeAlphabet: color code outside 63..71 is rejected", async () => {
  const error = await decodeFailure({
    characters: { A: 1 },
    colors: { ...colors, red: 10 },
  });
  expect(error.message).toBe('Color "red" has code 10 outside 63..71');
});
