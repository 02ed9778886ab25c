import { AppError } from "../domain/common/errors";

export const ExitCode = {
  success: 0,
  failure: 1,
  usage: 2,
  config: 78,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeFor(error: unknown): ExitCode {
  if (!(error instanceof AppError)) return ExitCode.failure;
  if (error.kind === "config") return ExitCode.config;
  if (error.kind === "validation") return ExitCode.usage;
  return ExitCode.failure;
}
