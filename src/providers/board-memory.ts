// In-memory Board — records every write. Backs dry runs and tests.

import { Console, Effect, Layer, Ref } from "effect";
import { Board, type BoardService, SendFailed } from "../board-api.ts";
import { type DisplayGrid, isDisplayGrid } from "../domain.ts";
import { layoutText, renderGrid } from "../grid.ts";

export interface MemoryBoardOptions {
  /** Reject every write, as an unreachable board would. */
  readonly failSends?: boolean;
  /** Print each new board state. */
  readonly echo?: boolean;
}

export interface MemoryBoard {
  readonly service: BoardService;
  readonly posts: Effect.Effect<readonly string[]>;
  readonly rawGrids: Effect.Effect<readonly DisplayGrid[]>;
}

const emptyGrid = layoutText("");

export function makeMemoryBoard(
  options: MemoryBoardOptions = {},
): Effect.Effect<MemoryBoard> {
  return Effect.gen(function* () {
    const current = yield* Ref.make<DisplayGrid>(emptyGrid);
    const posts = yield* Ref.make<readonly string[]>([]);
    const rawGrids = yield* Ref.make<readonly DisplayGrid[]>([]);

    const show = (grid: DisplayGrid) =>
      Ref.set(current, grid).pipe(
        Effect.zipRight(
          options.echo === true ? Console.log(renderGrid(grid)) : Effect.void,
        ),
      );

    const refuse = Effect.fail(
      new SendFailed({ message: "memory board is set to reject writes" }),
    );

    const service = Board.of({
      label: "memory",
      post: (text) =>
        Ref.update(posts, (all) => [...all, text]).pipe(
          Effect.zipRight(options.failSends === true ? refuse : Effect.void),
          Effect.zipRight(show(layoutText(text))),
        ),
      raw: (grid) =>
        Ref.update(rawGrids, (all) => [...all, grid]).pipe(
          Effect.zipRight(
            isDisplayGrid(grid)
              ? Effect.void
              : Effect.fail(new SendFailed({ message: "grid must be 6x22" })),
          ),
          Effect.zipRight(options.failSends === true ? refuse : Effect.void),
          Effect.zipRight(show(grid)),
        ),
      read: Ref.get(current),
    });

    return {
      service,
      posts: Ref.get(posts),
      rawGrids: Ref.get(rawGrids),
    };
  });
}

export const MemoryBoardLive = Layer.effect(
  Board,
  makeMemoryBoard({ echo: true }).pipe(Effect.map((board) => board.service)),
);
