/** Failure codes surfaced by toolup. Commands map them to exit codes in `commands/exit-codes.ts`. */
export type ErrorCode =
  // manifest acquisition
  | "MANIFEST_EMPTY"
  | "MANIFEST_EMPTY_BODY"
  | "MANIFEST_MISSING"
  | "MANIFEST_NOT_FOUND"
  | "MANIFEST_UNREACHABLE"
  | "MANIFEST_UNSUPPORTED_URI"
  | "MANIFEST_INVALID"
  // release index
  | "REGISTRY_INDEX_UNREACHABLE"
  | "REGISTRY_INDEX_INVALID"
  // resolution misses
  | "CHANNEL_NOT_FOUND"
  | "UNKNOWN_ARGUMENT"
  | "COMPONENT_UNAVAILABLE"
  | "INVALID_ALIAS"
  // lifecycle
  | "ALREADY_INSTALLED"
  | "NOT_INSTALLED"
  | "INSTALL_FAILED"
  | "INSTALL_INCOMPLETE"
  | "UNINSTALL_FAILED"
  | "SNAPSHOT_MISSING"
  | "SNAPSHOT_INVALID"
  | "UNSUPPORTED_UPDATE_TARGET"
  | "COMMAND_FAILED"
  // environment
  | "CONFIG_INVALID"
  | "TOOLCHAIN_FILE_INVALID";

export class ToolupError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ToolupError";
    this.code = code;
    this.details = details;
  }
}

export function isToolupError(e: unknown, code?: ErrorCode): e is ToolupError {
  return e instanceof ToolupError && (code === undefined || e.code === code);
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Node's errno code (`ENOENT`, `EEXIST`...) when `e` carries one. */
export function errnoCode(e: unknown): string | undefined {
  if (typeof e === "object" && e !== null && "code" in e && typeof e.code === "string") return e.code;
  return undefined;
}
