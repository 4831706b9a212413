export type ViewerErrorKind =
  | "MissingField"
  | "InvalidDimension"
  | "UnknownStorageClass"
  | "UnknownShape"
  | "MissingArrayPayload"
  | "MalformedPayload"
  | "RequestFailed"
  | "ShaderBuildFailure";

/**
 * Typed failure raised anywhere in the loading or rendering pipeline.
 * Only ShaderBuildFailure is fatal; every other kind is recorded and skipped.
 */
export class ViewerError extends Error {
  readonly kind: ViewerErrorKind;

  constructor(kind: ViewerErrorKind, message: string) {
    super(message);
    this.name = "ViewerError";
    this.kind = kind;
  }

  get fatal(): boolean {
    return this.kind === "ShaderBuildFailure";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}
