import { z } from 'zod';
import { ArgumentError, CliError, EXIT_CODES, ExitCode } from '../types';

// Format error for the terminal report
export function formatErrorMessage(error: unknown): string {
  if (error instanceof CliError) {
    let message = error.message;

    if (error.suggestion) {
      message += `\nSuggestion: ${error.suggestion}`;
    }

    return message;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

// Map any thrown value onto the process exit code contract
export function exitCodeForError(error: unknown): ExitCode {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  return EXIT_CODES.FAILURE;
}

export function errorCode(error: unknown): string | undefined {
  if (error instanceof CliError) {
    return error.code;
  }

  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }

  return undefined;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function parseInput<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.infer<T> {
  const result = schema.safeParse(raw);

  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ArgumentError(`${field}${issue?.message ?? 'invalid arguments'}`, {
      issues: result.error.issues,
    });
  }

  return result.data;
}
