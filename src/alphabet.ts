// Display alphabet — tile codes for characters and color swatches.
//
// The table lives in alphabet.json and is decoded once when this module
// loads; a malformed table throws on import.

import { readFileSync } from "node:fs";
import { Data, Effect, Schema } from "effect";

// --- Error ---

export class ConfigInvalid extends Data.TaggedError("ConfigInvalid")<{
  readonly message: string;
}> {}

// --- Code ranges ---

export const BLANK_CODE = 0;
export const MAX_CHARACTER_CODE = 62;
export const FIRST_COLOR_CODE = 63;
export const COLOR_COUNT = 9;
export const LAST_COLOR_CODE = FIRST_COLOR_CODE + COLOR_COUNT - 1;

export function isColorCode(code: number): boolean {
  return code >= FIRST_COLOR_CODE && code <= LAST_COLOR_CODE;
}

// --- Table ---

export interface Alphabet {
  readonly codeByCharacter: ReadonlyMap<string, number>;
  readonly characterByCode: ReadonlyMap<number, string>;
  readonly codeByColor: ReadonlyMap<string, number>;
  readonly colorByCode: ReadonlyMap<number, string>;
}

const AlphabetFile = Schema.Struct({
  characters: Schema.Record({ key: Schema.String, value: Schema.Int }),
  colors: Schema.Record({ key: Schema.String, value: Schema.Int }),
});

export function decodeAlphabet(
  json: unknown,
): Effect.Effect<Alphabet, ConfigInvalid> {
  return Schema.decodeUnknown(AlphabetFile)(json).pipe(
    Effect.mapError(
      (e) => new ConfigInvalid({ message: `Invalid alphabet: ${e.message}` }),
    ),
    Effect.flatMap(buildAlphabet),
  );
}

function buildAlphabet(
  file: typeof AlphabetFile.Type,
): Effect.Effect<Alphabet, ConfigInvalid> {
  return Effect.gen(function* () {
    const codeByCharacter = new Map<string, number>();
    const characterByCode = new Map<number, string>();
    const codeByColor = new Map<string, number>();
    const colorByCode = new Map<number, string>();
    const seen = new Set<number>();

    const claim = (code: number) => {
      if (seen.has(code)) {
        return Effect.fail(
          new ConfigInvalid({ message: `Code ${code} is used more than once` }),
        );
      }
      seen.add(code);
      return Effect.void;
    };

    for (const [character, code] of Object.entries(file.characters)) {
      if (Array.from(character).length !== 1) {
        return yield* Effect.fail(
          new ConfigInvalid({
            message: `Character key "${character}" must be a single character`,
          }),
        );
      }
      if (code < BLANK_CODE || code > MAX_CHARACTER_CODE) {
        return yield* Effect.fail(
          new ConfigInvalid({
            message: `Character "${character}" has code ${code} outside ${BLANK_CODE}..${MAX_CHARACTER_CODE}`,
          }),
        );
      }
      yield* claim(code);
      codeByCharacter.set(character, code);
      characterByCode.set(code, character);
    }

    const colors = Object.entries(file.colors);
    if (colors.length !== COLOR_COUNT) {
      return yield* Effect.fail(
        new ConfigInvalid({
          message: `Expected ${COLOR_COUNT} colors, found ${colors.length}`,
        }),
      );
    }
    for (const [name, code] of colors) {
      if (!isColorCode(code)) {
        return yield* Effect.fail(
          new ConfigInvalid({
            message: `Color "${name}" has code ${code} outside ${FIRST_COLOR_CODE}..${LAST_COLOR_CODE}`,
          }),
        );
      }
      yield* claim(code);
      codeByColor.set(name, code);
      colorByCode.set(code, name);
    }

    return { codeByCharacter, characterByCode, codeByColor, colorByCode };
  });
}

// --- Process-wide table ---

const source = new URL("./alphabet.json", import.meta.url);

export const alphabet: Alphabet = Effect.runSync(
  Effect.try({
    try: (): unknown => JSON.parse(readFileSync(source, "utf8")),
    catch: (e) =>
      new ConfigInvalid({ message: `Cannot read alphabet: ${String(e)}` }),
  }).pipe(Effect.flatMap(decodeAlphabet)),
);

export function isSupported(character: string): boolean {
  return alphabet.codeByCharacter.has(character);
}

export function codeFor(character: string): number {
  return alphabet.codeByCharacter.get(character) ?? BLANK_CODE;
}
