export type ToolErrorCode =
  | "invalid_input"
  | "file_not_found"
  | "io_error"
  | "string_not_found"
  | "unsupported_media_kind"
  | "file_too_large"
  | "timeout";

export class ToolError extends Error {
  readonly code: ToolErrorCode;

  constructor(code: ToolErrorCode, message: string) {
    super(message);
    this.name = "ToolError";
    this.code = code;
  }
}

export function describeFsError(error: unknown): string {
  if (isErrnoException(error) && error.code) {
    return error.code;
  }
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
