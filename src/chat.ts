// Chat responses — trims model output down to what the board can hold.

import { BOARD_CAPACITY } from "./domain.ts";

const SPECIAL_TOKENS = ["<|im_start|>", "<|im_end|>", "<|endoftext|>"];
const SENTENCE_ENDINGS = [". ", "! ", "? "];
const ELLIPSIS = "...";

/** Strip an echoed prompt and chat-template tokens. */
export function cleanResponse(response: string, prompt?: string): string {
  let text = prompt !== undefined && prompt.length > 0 &&
      response.startsWith(prompt)
    ? response.slice(prompt.length)
    : response;
  for (const token of SPECIAL_TOKENS) {
    text = text.split(token).join("");
  }
  return text.trim();
}

/** Fit `text` into `max` code points, preferring to end on a full sentence
 *  that keeps more than half the room, then on a word with an ellipsis. */
export function truncateResponse(
  text: string,
  max: number = BOARD_CAPACITY,
): string {
  const characters = Array.from(text);
  if (characters.length <= max) return text;

  const head = characters.slice(0, max).join("");
  for (const ending of SENTENCE_ENDINGS) {
    const at = head.lastIndexOf(ending);
    if (at >= 0 && Array.from(head.slice(0, at)).length > max * 0.5) {
      return head.slice(0, at + 1).trim();
    }
  }

  const room = characters
    .slice(0, Math.max(0, max - ELLIPSIS.length))
    .join("");
  const lastSpace = room.lastIndexOf(" ");
  const cut = lastSpace > 0 ? room.slice(0, lastSpace) : room;
  return cut.trim() + ELLIPSIS;
}

export function prepareChatResponse(response: string, prompt?: string): string {
  return truncateResponse(cleanResponse(response, prompt));
}
