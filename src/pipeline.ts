// Board operations — what callers (the CLI, a scheduler) invoke.
//
// Every operation settles into an OperationResult; nothing fails past this
// module.

import { Console, Effect } from "effect";
import {
  Board,
  type BoardService,
  type ReadFailed,
  type SendFailed,
} from "./board-api.ts";
import { prepareChatResponse } from "./chat.ts";
import type { DisplayGrid, PriceSnapshot } from "./domain.ts";
import { formatPrices, formatSummary } from "./format.ts";
import { colorTestGrid } from "./grid.ts";
import { MetalsSource, type SourceTimeout } from "./metals-api.ts";
import { failure, type OperationResult, success } from "./result.ts";
import { sanitizeLogged } from "./sanitize.ts";

const PREVIEW_LENGTH = 50;

const preview = (text: string) =>
  text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;

const sendFailure = (e: SendFailed) =>
  Console.error(`[board] send failed: ${e.message}`).pipe(
    Effect.as(failure(`Error sending message: ${e.message}`, "SendFailed")),
  );

const readFailure = (prefix: string) => (e: ReadFailed) =>
  Console.error(`[board] read failed: ${e.message}`).pipe(
    Effect.as(failure(`${prefix}: ${e.message}`, "ReadFailed")),
  );

// --- Messages ---

export function sendMessage(
  message: string,
): Effect.Effect<OperationResult, never, Board> {
  return Effect.gen(function* () {
    if (message.trim().length === 0) {
      return failure("Please enter a message", "InvalidInput");
    }
    const board = yield* Board;
    const text = yield* sanitizeLogged(message);
    return yield* board.post(text).pipe(
      Effect.as(success(`Message sent successfully: ${preview(message)}`)),
      Effect.catchTag("SendFailed", sendFailure),
    );
  });
}

export function displayChatResponse(
  response: string,
  prompt?: string,
): Effect.Effect<OperationResult<string>, never, Board> {
  return Effect.gen(function* () {
    const prepared = prepareChatResponse(response, prompt);
    if (prepared.length === 0) {
      return failure("The response was empty", "InvalidInput");
    }
    const board = yield* Board;
    const text = yield* sanitizeLogged(prepared);
    return yield* board.post(text).pipe(
      Effect.as(success(`Response sent: ${preview(prepared)}`, prepared)),
      Effect.catchTag("SendFailed", sendFailure),
    );
  });
}

// --- Board status ---

export const readBoard: Effect.Effect<
  OperationResult<DisplayGrid>,
  never,
  Board
> = Effect.gen(function* () {
  const board = yield* Board;
  return yield* board.read.pipe(
    Effect.map((grid) => success("Message read successfully", grid)),
    Effect.catchTag("ReadFailed", readFailure("Error reading message")),
  );
});

export const testConnection: Effect.Effect<OperationResult, never, Board> =
  Effect.gen(function* () {
    const board = yield* Board;
    return yield* board.read.pipe(
      Effect.as(success(`Successfully connected to board at ${board.label}`)),
      Effect.catchTag("ReadFailed", readFailure("Connection failed")),
    );
  });

export const sendColorTest: Effect.Effect<OperationResult, never, Board> =
  Effect.gen(function* () {
    const board = yield* Board;
    return yield* board.raw(colorTestGrid()).pipe(
      Effect.as(success("Color test pattern sent")),
      Effect.catchTag("SendFailed", sendFailure),
    );
  });

// --- Metals ---

/** Put the timeout notice on the board so nobody reads stale prices as
 *  live. Reports whether the board took it. */
function showTimeoutNotice(
  board: BoardService,
  e: SourceTimeout,
): Effect.Effect<OperationResult> {
  const posted = e.displayOnBoard
    ? sanitizeLogged(e.message).pipe(
      Effect.flatMap(board.post),
      Effect.as(true),
      Effect.catchTag("SendFailed", (err) =>
        Console.error(`[metals] timeout notice not shown: ${err.message}`).pipe(
          Effect.as(false),
        )),
    )
    : Effect.succeed(false);
  return posted.pipe(
    Effect.map((boardUpdated) =>
      failure(e.message, "SourceTimeout", boardUpdated)
    ),
  );
}

export const displayMetalsPrices: Effect.Effect<
  OperationResult<PriceSnapshot>,
  never,
  MetalsSource | Board
> = Effect.gen(function* () {
  const source = yield* MetalsSource;
  const board = yield* Board;

  return yield* source.fetchPrices.pipe(
    Effect.tap((snapshot) =>
      Console.debug(`[metals] fetched ${formatSummary(snapshot)}`)
    ),
    Effect.flatMap((snapshot) =>
      sanitizeLogged(formatPrices(snapshot)).pipe(
        Effect.flatMap(board.post),
        Effect.as(success(formatSummary(snapshot), snapshot)),
      )
    ),
    Effect.catchTags({
      SourceTimeout: (e) => showTimeoutNotice(board, e),
      ExtractionFailed: (e) =>
        Console.error(`[metals] ${e.message}`).pipe(
          Effect.as(failure(e.message, "ExtractionFailed")),
        ),
      SendFailed: sendFailure,
    }),
  );
});
