import { ConfigError } from '../../utils/errors';

export interface ParsedCommand {
    program: string;
    args: string[];
}

/**
 * Splits a configured command line on whitespace. Quoting is not supported;
 * audio commands are plain program names with flags.
 */
export function parseCommand(command: string): ParsedCommand {
    const [program, ...args] = command.trim().split(/\s+/).filter(Boolean);
    if (!program) {
        throw new ConfigError('Audio command is empty', { command });
    }
    return { program, args };
}
