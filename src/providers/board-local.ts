// Local network Board — the board's own HTTP API on the LAN.

import {
  FetchHttpClient,
  HttpClient,
  HttpClientRequest,
} from "@effect/platform";
import { Config, Effect, Layer, Redacted, Schema } from "effect";
import { Board, ReadFailed, SendFailed } from "../board-api.ts";
import { type DisplayGrid, isDisplayGrid } from "../domain.ts";
import { layoutText } from "../grid.ts";

// --- Board response schema ---

const Grid = Schema.Array(Schema.Array(Schema.Int));

/** Boards answer reads either wrapped in { message } or with the bare grid. */
const BoardResponse = Schema.Union(Schema.Struct({ message: Grid }), Grid);

export function decodeBoardResponse(
  json: unknown,
): Effect.Effect<DisplayGrid, ReadFailed> {
  return Schema.decodeUnknown(BoardResponse)(json).pipe(
    Effect.mapError(
      (e) => new ReadFailed({ message: `Invalid board response: ${e.message}` }),
    ),
    Effect.map((response) => "message" in response ? response.message : response),
    Effect.filterOrFail(
      isDisplayGrid,
      () => new ReadFailed({ message: "Board returned a grid that is not 6x22" }),
    ),
  );
}

// --- Local board layer ---

const REQUEST_TIMEOUT = "10 seconds";
export const DEFAULT_PORT = 7000;
export const API_KEY_HEADER = "X-Vestaboard-Local-Api-Key";

export const LocalBoardLive = Layer.effect(
  Board,
  Effect.gen(function* () {
    const host = yield* Config.string("BOARD_HOST");
    const port = yield* Config.integer("BOARD_PORT").pipe(
      Config.withDefault(DEFAULT_PORT),
    );
    const apiKey = yield* Config.redacted("BOARD_API_KEY");
    const label = `${host}:${port}`;
    const url = `http://${label}/local-api/message`;

    const client = (yield* HttpClient.HttpClient).pipe(
      HttpClient.filterStatusOk,
      HttpClient.mapRequest(
        HttpClientRequest.setHeader(API_KEY_HEADER, Redacted.value(apiKey)),
      ),
    );

    const write = (grid: DisplayGrid): Effect.Effect<void, SendFailed> =>
      client.execute(
        HttpClientRequest.post(url).pipe(HttpClientRequest.bodyUnsafeJson(grid)),
      ).pipe(
        Effect.asVoid,
        Effect.timeoutFail({
          duration: REQUEST_TIMEOUT,
          onTimeout: () =>
            new SendFailed({ message: `Board at ${label} did not answer` }),
        }),
        Effect.catchTags({
          RequestError: (e) =>
            Effect.fail(new SendFailed({ message: e.message })),
          ResponseError: (e) =>
            Effect.fail(
              new SendFailed({ message: `HTTP ${e.response.status}` }),
            ),
        }),
      );

    return Board.of({
      label,
      post: (text) => write(layoutText(text)),
      raw: (grid) =>
        isDisplayGrid(grid)
          ? write(grid)
          : Effect.fail(new SendFailed({ message: "grid must be 6x22" })),
      read: client.get(url).pipe(
        Effect.flatMap((response) => response.json),
        Effect.timeoutFail({
          duration: REQUEST_TIMEOUT,
          onTimeout: () =>
            new ReadFailed({ message: `Board at ${label} did not answer` }),
        }),
        Effect.catchTags({
          RequestError: (e) =>
            Effect.fail(new ReadFailed({ message: e.message })),
          ResponseError: (e) =>
            Effect.fail(
              new ReadFailed({
                message: e.reason === "StatusCode"
                  ? `HTTP ${e.response.status}`
                  : `Board response is not JSON: ${e.message}`,
              }),
            ),
        }),
        Effect.flatMap(decodeBoardResponse),
      ),
    });
  }),
).pipe(Layer.provide(FetchHttpClient.layer));
