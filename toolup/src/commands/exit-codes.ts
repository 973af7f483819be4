import type { ErrorCode } from "../errors.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  FAILURE: 1,
  NOT_FOUND: 2,
  INVALID_ARGS: 3,
  INSTALL_FAILED: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeFor(code: ErrorCode | "INTERNAL"): ExitCode {
  switch (code) {
    case "CHANNEL_NOT_FOUND":
    case "UNKNOWN_ARGUMENT":
    case "COMPONENT_UNAVAILABLE":
    case "NOT_INSTALLED":
      return EXIT.NOT_FOUND;
    case "CONFIG_INVALID":
    case "TOOLCHAIN_FILE_INVALID":
    case "UNSUPPORTED_UPDATE_TARGET":
    case "INVALID_ALIAS":
      return EXIT.INVALID_ARGS;
    case "INSTALL_FAILED":
    case "INSTALL_INCOMPLETE":
    case "UNINSTALL_FAILED":
      return EXIT.INSTALL_FAILED;
    default:
      return EXIT.FAILURE;
  }
}
