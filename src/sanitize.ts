// Character sanitizer — maps arbitrary text onto the display alphabet.

import { Console, Effect } from "effect";
import { isSupported } from "./alphabet.ts";

const LAYOUT = /[\n\r\t]/;

function sanitizeCharacter(character: string): string {
  const upper = character.toUpperCase();
  return isSupported(upper) ? upper : " ";
}

/** Upper-case `text` and blank out every code point the board cannot show.
 *  The result has as many code points as the input. */
export function sanitize(text: string): string {
  return Array.from(text, sanitizeCharacter).join("");
}

/** Sanitize line by line so newlines survive as row breaks. */
export function sanitizeLines(text: string): string {
  return text.split("\n").map(sanitize).join("\n");
}

/** Distinct characters `sanitize` would replace, excluding newlines, carriage
 *  returns and tabs, in first-seen order. */
export function unsupportedCharacters(text: string): readonly string[] {
  const found = new Set<string>();
  for (const character of text) {
    if (LAYOUT.test(character)) continue;
    if (!isSupported(character.toUpperCase())) found.add(character);
  }
  return [...found];
}

export function sanitizeLogged(text: string): Effect.Effect<string> {
  const unsupported = unsupportedCharacters(text);
  const log = unsupported.length > 0
    ? Console.debug(`[sanitize] replaced with blanks: ${unsupported.join(" ")}`)
    : Effect.void;
  return log.pipe(Effect.as(sanitizeLines(text)));
}
