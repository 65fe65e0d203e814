// Board API — service definition and transport errors.

import { Context, Data, Effect } from "effect";
import type { DisplayGrid } from "./domain.ts";

// --- Errors ---

export class SendFailed extends Data.TaggedError("SendFailed")<{
  readonly message: string;
}> {}

export class ReadFailed extends Data.TaggedError("ReadFailed")<{
  readonly message: string;
}> {}

export type BoardError = SendFailed | ReadFailed;

// --- Service ---

export class Board extends Context.Tag("Board")<
  Board,
  {
    /** Where the board lives, for status messages. */
    readonly label: string;
    /** Lay out plain text and show it. */
    readonly post: (text: string) => Effect.Effect<void, SendFailed>;
    /** Show an exact 6x22 grid of tile codes. */
    readonly raw: (grid: DisplayGrid) => Effect.Effect<void, SendFailed>;
    readonly read: Effect.Effect<DisplayGrid, ReadFailed>;
  }
>() {}

export type BoardService = Context.Tag.Service<typeof Board>;
