// Shared HTTP failure mapping for the provider adapters.

import type { HttpClientError } from "@effect/platform";
import { HttpError, NetworkError, ParseError } from "../price-api.ts";

export function mapHttpError(
  e: HttpClientError.HttpClientError,
): NetworkError | HttpError | ParseError {
  switch (e._tag) {
    case "RequestError":
      return new NetworkError({ message: e.message });
    case "ResponseError":
      return e.reason === "StatusCode"
        ? new HttpError({ status: e.response.status })
        : new ParseError({ message: `JSON parse failed: ${e.message}` });
  }
}
