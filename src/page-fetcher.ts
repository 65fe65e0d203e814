// Page fetcher — raw HTML over HTTP, behind a service so sources can be
// exercised against canned pages.

import {
  FetchHttpClient,
  HttpClient,
  HttpClientRequest,
} from "@effect/platform";
import { Context, Data, Effect, Layer } from "effect";

// --- Error ---

export class FetchError extends Data.TaggedError("FetchError")<{
  readonly url: string;
  readonly message: string;
}> {}

// --- Service ---

export class PageFetcher extends Context.Tag("PageFetcher")<
  PageFetcher,
  {
    readonly fetchPage: (url: string) => Effect.Effect<string, FetchError>;
  }
>() {}

const BROWSER_HEADERS = {
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
};

export const PageFetcherLive = Layer.effect(
  PageFetcher,
  Effect.gen(function* () {
    const client = (yield* HttpClient.HttpClient).pipe(
      HttpClient.filterStatusOk,
      HttpClient.mapRequest(HttpClientRequest.setHeaders(BROWSER_HEADERS)),
    );

    return PageFetcher.of({
      fetchPage: (url: string) =>
        client.get(url).pipe(
          Effect.flatMap((response) => response.text),
          Effect.catchTags({
            RequestError: (e) =>
              Effect.fail(new FetchError({ url, message: e.message })),
            ResponseError: (e) =>
              Effect.fail(
                new FetchError({
                  url,
                  message: e.reason === "StatusCode"
                    ? `HTTP ${e.response.status}`
                    : e.message,
                }),
              ),
          }),
        ),
    });
  }),
).pipe(Layer.provide(FetchHttpClient.layer));
