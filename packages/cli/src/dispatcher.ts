import { InvalidInputError, TransitError } from '@transit-console/gtfs-parser';
import type { Logger, RealtimeFeedClient, StaticScheduleStore } from '@transit-console/gtfs-parser';
import type { ReverseGeocoder } from './geocoder.js';
import type { Prompt } from './prompt.js';
import type { Session } from './session.js';
import { parseCommand } from './input.js';

export type FeedSource = Pick<RealtimeFeedClient, 'fetchAlerts' | 'fetchTripUpdates' | 'fetchVehiclePositions'>;

export type ScheduleSource = Pick<
  StaticScheduleStore,
  'loadStops' | 'findStop' | 'searchStopsByName' | 'routesForStop' | 'stopsForRoute' | 'agencyInfo'
>;

/** Collaborators every handler may use; fixed for the whole session */
export interface AppContext {
  store: ScheduleSource;
  feeds: FeedSource;
  /** null when reverse geocoding is switched off */
  geocoder: ReverseGeocoder | null;
  prompt: Prompt;
  logger: Logger;
}

/** What the dispatcher does after a command: read again, leave the menu, or end the session */
export type Outcome = 'stay' | 'back' | 'quit';

export type CommandHandler = (
  ctx: AppContext,
  session: Session,
  argument: string
) => Outcome | Promise<Outcome>;

export interface Menu {
  /** Shown before the input cursor, e.g. `TripUpdater >> ` */
  label: string;
  /** Printed on entry and for `help` */
  help: string;
  /** Printed before every read, for menus that keep their options on screen */
  reminder?: string;
  /** Printed for an unknown command */
  hint: string;
  commands: ReadonlyMap<string, CommandHandler>;
  onEnter?: (session: Session) => void;
}

const QUIT_WORDS = new Set(['q', 'quit']);

/**
 * Read-dispatch loop for one menu.
 * Resolves to 'back' when the user leaves the menu and 'quit' when the session ends,
 * either by `quit`/`q` or by the input closing.
 */
export async function runMenu(menu: Menu, ctx: AppContext, session: Session): Promise<'back' | 'quit'> {
  menu.onEnter?.(session);
  ctx.prompt.print(menu.help);

  for (;;) {
    if (menu.reminder) ctx.prompt.print(menu.reminder);

    const line = await ctx.prompt.ask(menu.label);
    if (line === null) return 'quit';

    const { name, argument } = parseCommand(line);
    if (QUIT_WORDS.has(name)) return 'quit';

    const handler = menu.commands.get(name);
    if (!handler) {
      ctx.prompt.print(menu.hint);
      continue;
    }

    const outcome = await dispatch(handler, ctx, session, argument);
    if (outcome !== 'stay') return outcome;
  }
}

async function dispatch(
  handler: CommandHandler,
  ctx: AppContext,
  session: Session,
  argument: string
): Promise<Outcome> {
  try {
    return await handler(ctx, session, argument);
  } catch (error) {
    if (error instanceof InvalidInputError) {
      ctx.prompt.print(error.message);
      return 'stay';
    }
    if (error instanceof TransitError) {
      ctx.logger.error(`${error.name}: ${error.message}`);
      ctx.prompt.print(`Error: ${error.message}`);
      return 'stay';
    }
    throw error;
  }
}

/**
 * Run a nested menu as a command of its parent: leaving it returns to the parent
 */
export function submenu(menu: Menu): CommandHandler {
  return async (ctx, session) => ((await runMenu(menu, ctx, session)) === 'quit' ? 'quit' : 'stay');
}

/**
 * Ask a follow-up question; null means the input closed
 */
export async function askFor(ctx: AppContext, question: string): Promise<string | null> {
  const answer = await ctx.prompt.ask(question);
  return answer === null ? null : answer.trim();
}
