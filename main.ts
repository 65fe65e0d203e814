import { Command, Options, Prompt } from "@effect/cli";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import {
  Config,
  Console,
  Duration,
  Effect,
  Layer,
  Option,
  Schedule,
} from "effect";
import { formatResult } from "./src/format.ts";
import { renderGrid } from "./src/grid.ts";
import {
  displayChatResponse,
  displayMetalsPrices,
  readBoard,
  sendColorTest,
  sendMessage,
  testConnection,
} from "./src/pipeline.ts";
import { PageFetcherLive } from "./src/page-fetcher.ts";
import { KitcoLive } from "./src/providers/kitco.ts";
import { MetalsSourceTestLive } from "./src/providers/metals-mock.ts";
import { LocalBoardLive } from "./src/providers/board-local.ts";
import { MemoryBoardLive } from "./src/providers/board-memory.ts";
import type { OperationResult } from "./src/result.ts";

const report = <A>(result: OperationResult<A>) =>
  Console.log(formatResult(result));

// --- CLI ---

const message = Options.text("message").pipe(
  Options.withAlias("m"),
  Options.withDescription("Text to show on the board"),
  Options.withFallbackPrompt(
    Prompt.text({
      message: "Enter a message:",
      validate: (value) =>
        value.trim().length === 0
          ? Effect.fail("Message cannot be empty")
          : Effect.succeed(value),
    }),
  ),
);

const send = Command.make("send", { message }, ({ message }) =>
  sendMessage(message).pipe(Effect.flatMap(report)));

const read = Command.make("read", {}, () =>
  readBoard.pipe(
    Effect.tap((result) =>
      result.status === "success" && result.data !== undefined
        ? Console.log(renderGrid(result.data))
        : Effect.void
    ),
    Effect.flatMap(report),
  ));

const colorTest = Command.make("color-test", {}, () =>
  sendColorTest.pipe(Effect.flatMap(report)));

const check = Command.make("check", {}, () =>
  testConnection.pipe(Effect.flatMap(report)));

const response = Options.text("response").pipe(
  Options.withDescription("Chat response to put on the board"),
);
const prompt = Options.text("prompt").pipe(
  Options.withDescription("Prompt the response may echo"),
  Options.optional,
);

const chat = Command.make("chat", { response, prompt }, ({ response, prompt }) =>
  displayChatResponse(response, Option.getOrUndefined(prompt)).pipe(
    Effect.flatMap(report),
  ));

const watch = Options.boolean("watch").pipe(
  Options.withDescription("Keep refreshing the prices"),
);
const interval = Options.integer("interval").pipe(
  Options.withDescription("Seconds between refreshes with --watch"),
  Options.withDefault(60),
);

const metals = Command.make("metals", { watch, interval }, ({ watch, interval }) => {
  const once = displayMetalsPrices.pipe(Effect.flatMap(report));
  return watch
    ? once.pipe(Effect.repeat(Schedule.spaced(Duration.seconds(interval))), Effect.asVoid)
    : once;
});

const command = Command.make("flapboard").pipe(
  Command.withSubcommands([send, read, colorTest, check, chat, metals]),
);

// --- Layers ---
// METALS_PROVIDER: "kitco" (default) or "test".
// BOARD_PROVIDER: "local" (default) or "memory".

const MetalsSourceLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const provider = yield* Config.string("METALS_PROVIDER").pipe(
      Config.withDefault("kitco"),
    );
    switch (provider) {
      case "test":
        return MetalsSourceTestLive;
      default:
        return KitcoLive.pipe(Layer.provide(PageFetcherLive));
    }
  }),
);

const BoardLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const provider = yield* Config.string("BOARD_PROVIDER").pipe(
      Config.withDefault("local"),
    );
    switch (provider) {
      case "memory":
        return MemoryBoardLive;
      default:
        return LocalBoardLive;
    }
  }),
);

// --- Run ---

const cli = Command.run(command, {
  name: "flapboard",
  version: "0.1.0",
});

cli(process.argv).pipe(
  Effect.provide(Layer.merge(MetalsSourceLive, BoardLive)),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
