import { InvalidInputError } from '@transit-console/gtfs-parser';

export interface ParsedCommand {
  /** Lowercased first word */
  name: string;
  /** Remainder of the line, trimmed, case preserved */
  argument: string;
}

export function parseCommand(line: string): ParsedCommand {
  const trimmed = line.trim();
  const space = trimmed.search(/\s/);
  if (space === -1) return { name: trimmed.toLowerCase(), argument: '' };

  return {
    name: trimmed.slice(0, space).toLowerCase(),
    argument: trimmed.slice(space + 1).trim(),
  };
}

const STOP_ID = /^\d{4}$/;

/**
 * Stop ids typed at the console are exactly four digits
 */
export function parseStopId(input: string): string {
  const candidate = input.trim();
  if (!STOP_ID.test(candidate)) {
    throw new InvalidInputError('Invalid stop ID. Must be a 4-digit number.', candidate);
  }
  return candidate;
}
