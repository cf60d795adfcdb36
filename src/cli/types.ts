import { z, ZodType, ZodTypeDef } from 'zod';
import { createLogger } from '../core/log';

/**
 * Successful handler outcome. In JSON mode it is printed as-is with
 * `command`, `timestamp` and `duration_ms` added; in text mode only
 * `textOutput` is printed.
 */
export interface CLIResult {
  ok: true;
  command?: string;
  root?: string;
  timestamp?: string;
  duration_ms?: number;
  textOutput?: string;
  [key: string]: unknown;
}

/**
 * Handler-reported failure:
 * - reason: machine-readable error code
 * - message: human-readable description
 * - hint: optional suggestion for resolution
 */
export interface CLIError {
  ok: false;
  reason: string;
  message?: string;
  hint?: string;
  [key: string]: unknown;
}

export type CLIHandler<TInput> = (input: TInput) => Promise<CLIResult | CLIError>;

/** A schema and handler pair with the input type closed over. */
export interface HandlerRegistration {
  run(rawInput: unknown): Promise<CLIResult | CLIError>;
}

export function defineHandler<TInput>(
  schema: ZodType<TInput, ZodTypeDef, unknown>,
  handler: CLIHandler<TInput>
): HandlerRegistration {
  return {
    run: (rawInput) => handler(schema.parse(rawInput)),
  };
}

export interface OutputStreams {
  stdout: { write(chunk: string): unknown };
  stderr: { write(chunk: string): unknown };
}

export const ExitCodes = {
  OK: 0,
  INVALID: 1,
  FAILED: 2,
} as const;

function wantsJson(rawInput: unknown): boolean {
  return typeof rawInput === 'object' && rawInput !== null && 'json' in rawInput && rawInput.json === true;
}

function writeFailure(io: OutputStreams, json: boolean, message: string, hint?: string): void {
  if (json) {
    io.stderr.write(JSON.stringify({ error: message }) + '\n');
    return;
  }
  io.stderr.write(`error: ${message}\n`);
  if (hint) io.stderr.write(`hint: ${hint}\n`);
}

/**
 * Validates `rawInput`, runs the registered handler and writes its outcome.
 * Returns the process exit code instead of exiting.
 */
export async function runHandler(
  commandKey: string,
  rawInput: unknown,
  io: OutputStreams = { stdout: process.stdout, stderr: process.stderr }
): Promise<number> {
  const { cliHandlers } = await import('./registry');
  const startedAt = Date.now();
  const timestamp = new Date().toISOString();
  const json = wantsJson(rawInput);

  const registration = cliHandlers[commandKey];
  if (!registration) {
    writeFailure(io, json, `unknown command: ${commandKey}`, 'Run "symtrail --help" to see available commands');
    return ExitCodes.INVALID;
  }

  const log = createLogger({ component: 'cli', cmd: commandKey });

  try {
    const result = await registration.run(rawInput);
    const duration_ms = Date.now() - startedAt;

    if (!result.ok) {
      log.info(commandKey, { ok: false, reason: result.reason, duration_ms });
      writeFailure(io, json, result.message ?? result.reason, result.hint);
      return ExitCodes.FAILED;
    }

    if (json) {
      const { textOutput: _text, ...data } = result;
      io.stdout.write(JSON.stringify({ ...data, command: commandKey, timestamp, duration_ms }, null, 2) + '\n');
    } else if (result.textOutput) {
      io.stdout.write(result.textOutput.endsWith('\n') ? result.textOutput : `${result.textOutput}\n`);
    }
    return ExitCodes.OK;
  } catch (e) {
    if (e instanceof z.ZodError) {
      const details = e.issues.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`).join('; ');
      writeFailure(io, json, `invalid arguments: ${details}`, ErrorHints.VALIDATION_ERROR);
      return ExitCodes.INVALID;
    }

    log.error(commandKey, { ok: false, duration_ms: Date.now() - startedAt, err: e });
    writeFailure(io, json, e instanceof Error ? e.message : String(e));
    return ExitCodes.INVALID;
  }
}

export async function executeHandler(commandKey: string, rawInput: unknown): Promise<void> {
  process.exitCode = await runHandler(commandKey, rawInput);
}

export function success(data: Record<string, unknown>): CLIResult {
  return {
    ...data,
    ok: true,
  };
}

export function error(reason: string, details?: { message?: string; hint?: string; [key: string]: unknown }): CLIError {
  return {
    ok: false,
    reason,
    ...details,
  };
}

export const ErrorReasons = {
  INDEX_NOT_FOUND: 'index_not_found',
} as const;

export const ErrorHints = {
  INDEX_NOT_FOUND: 'Run "symtrail scan <dir>" to create an index',
  VALIDATION_ERROR: 'Check command syntax with --help',
} as const;
