import type { Logger } from 'pino';
import { ExportJobError } from './lib/errors.js';

export const COMMANDS = ['run', 'export', 'cleanup'] as const;
export type Command = (typeof COMMANDS)[number];

export type CommandHandlers = Record<Command, () => Promise<unknown>>;

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

/**
 * Dispatch `argv[0]` (default `run`) and return the process exit code:
 * 0 on success, 1 for an unknown command or any failure.
 */
export async function runCli(
  argv: readonly string[],
  handlers: CommandHandlers,
  logger: Logger
): Promise<number> {
  const command = argv[0] ?? 'run';

  if (!isCommand(command)) {
    logger.error({ command }, `Unknown command, expected one of: ${COMMANDS.join(', ')}`);
    return 1;
  }

  try {
    await handlers[command]();
    return 0;
  } catch (error: unknown) {
    const code = error instanceof ExportJobError ? error.code : 'INTERNAL_ERROR';
    logger.fatal({ err: error, code, command }, 'Audit log export failed');
    return 1;
  }
}
