import type { PushStatus } from "../types/classification.js";

/**
 * CLI exit codes. The push status owns 0, 2 and 3 so a CI step can branch on
 * the verdict without parsing output.
 */
export const EXIT = {
  GOOD: 0,
  INTERNAL_ERROR: 1,
  BAD: 2,
  UNKNOWN: 3,
  INVALID_INPUT: 4,
  EVIDENCE_UNAVAILABLE: 5,
  PUSH_NOT_FOUND: 6,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeForStatus(status: PushStatus): ExitCode {
  switch (status) {
    case "GOOD":
      return EXIT.GOOD;
    case "BAD":
      return EXIT.BAD;
    case "UNKNOWN":
      return EXIT.UNKNOWN;
  }
}

export function exitCodeForError(code: string): ExitCode {
  switch (code) {
    case "PUSH_NOT_FOUND":
    case "PARENT_PUSH_NOT_FOUND":
    case "CHILD_PUSH_NOT_FOUND":
      return EXIT.PUSH_NOT_FOUND;
    case "SNAPSHOT_INVALID":
    case "CONFIG_INVALID":
    case "INVALID_ARGS":
      return EXIT.INVALID_INPUT;
    case "SOURCES_NOT_FOUND":
    case "SOURCE_UNAVAILABLE":
    case "PREDICTION_TIMEOUT":
      return EXIT.EVIDENCE_UNAVAILABLE;
    default:
      return EXIT.INTERNAL_ERROR;
  }
}
