// Caller-facing result shape shared by every board operation.

export type ErrorKind =
  | "SourceTimeout"
  | "ExtractionFailed"
  | "SendFailed"
  | "ReadFailed"
  | "InvalidInput";

export interface FailureDetails {
  readonly kind: ErrorKind;
  /** Whether the board was written on the way to this failure. */
  readonly boardUpdated: boolean;
}

export type OperationResult<A = never> =
  | { readonly status: "success"; readonly message: string; readonly data?: A }
  | {
    readonly status: "error";
    readonly message: string;
    readonly data: FailureDetails;
  };

export function success<A = never>(
  message: string,
  data?: A,
): OperationResult<A> {
  return data === undefined
    ? { status: "success", message }
    : { status: "success", message, data };
}

export function failure(
  message: string,
  kind: ErrorKind,
  boardUpdated = false,
): OperationResult {
  return { status: "error", message, data: { kind, boardUpdated } };
}
