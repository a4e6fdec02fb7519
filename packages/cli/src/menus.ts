import { ALL_ROUTES, GTFSQuery } from '@transit-console/gtfs-parser';
import type { FeedError } from '@transit-console/gtfs-parser';
import { askFor, runMenu, submenu } from './dispatcher.js';
import type { AppContext, CommandHandler, Menu, Outcome } from './dispatcher.js';
import { parseStopId } from './input.js';
import {
  renderAgency,
  renderAlerts,
  renderArrivals,
  renderNearestStops,
  renderRouteList,
  renderStopRoutes,
  renderStops,
  renderVehicles,
} from './render.js';
import type { LocatedVehicle } from './render.js';
import { addRoute, createSession, listRoutes, removeRoute } from './session.js';
import type { RouteChange, Session } from './session.js';

function say(ctx: AppContext, text: string): Outcome {
  ctx.prompt.print(text);
  return 'stay';
}

function feedFailure(kind: string, error: FeedError): string {
  return `Could not fetch ${kind}: ${error.message}`;
}

// Shared by every menu that edits the tracked routes

function describeChange(change: RouteChange, verb: 'add' | 'remove'): string {
  if (change.changed) return verb === 'add' ? `Tracking ${change.route}.` : `Stopped tracking ${change.route}.`;
  switch (change.reason) {
    case 'empty':
      return `Usage: ${verb} <ROUTE>`;
    case 'already tracked':
      return `${change.route} is already tracked.`;
    case 'not tracked':
      return `${change.route} is not being tracked.`;
  }
}

const addCommand: CommandHandler = (ctx, session, argument) =>
  say(ctx, describeChange(addRoute(session, argument), 'add'));

const removeCommand: CommandHandler = (ctx, session, argument) =>
  say(ctx, describeChange(removeRoute(session, argument), 'remove'));

const listCommand: CommandHandler = (ctx, session) => say(ctx, renderRouteList(listRoutes(session)));

function helpCommand(help: string): CommandHandler {
  return (ctx) => say(ctx, help);
}

const backToMain: CommandHandler = (ctx) => {
  ctx.prompt.print('Returning to main menu.');
  return 'back';
};

// Alerts

const ALERTS_HELP = `
[Alert Fetcher]
Commands:
  add <ROUTE_ID>      → Track a route (e.g., add 10)
  remove <ROUTE_ID>   → Stop tracking a route
  list                → Show tracked routes
  show                → Display alerts for tracked routes
  all                 → Show all alerts (ignore route filter)
  help                → Show this help message again
  back                → Return to main menu
`;

async function showAlerts(ctx: AppContext, session: Session): Promise<Outcome> {
  const result = await ctx.feeds.fetchAlerts();
  if (!result.ok) return say(ctx, feedFailure('alerts', result.error));

  const scope = session.alertScope === 'all' ? ALL_ROUTES : session.trackedRoutes;
  const matching = GTFSQuery.alertsMatching(result.records, scope);
  return say(ctx, renderAlerts(matching, result.records.length));
}

export const alertsMenu: Menu = {
  label: 'AlertFetcher >> ',
  help: ALERTS_HELP,
  hint: "Invalid command. Type 'help' for available options.",
  onEnter: (session) => {
    session.alertScope = 'tracked';
  },
  commands: new Map<string, CommandHandler>([
    [
      'add',
      (ctx, session, argument) => {
        session.alertScope = 'tracked';
        return addCommand(ctx, session, argument);
      },
    ],
    ['remove', removeCommand],
    ['list', listCommand],
    [
      'all',
      (ctx, session) => {
        session.alertScope = 'all';
        return say(ctx, "Type 'show' to display all alerts, or 'back' to cancel.");
      },
    ],
    ['show', showAlerts],
    ['help', helpCommand(ALERTS_HELP)],
    ['back', backToMain],
  ]),
};

// Vehicles

const VEHICLES_HELP = `
[Vehicle Tracker]
Commands:
  add <ROUTE>      → Add a route to track (e.g., add 10)
  remove <ROUTE>   → Stop tracking a route
  routes           → Show all currently tracked routes
  show             → Display real-time info for tracked buses
  help             → Show this help message again
  back             → Return to the main menu
`;

async function showVehicles(ctx: AppContext, session: Session): Promise<Outcome> {
  if (session.trackedRoutes.size === 0) {
    return say(ctx, "No routes tracked yet. Use 'add <ROUTE>' first.");
  }

  const result = await ctx.feeds.fetchVehiclePositions();
  if (!result.ok) return say(ctx, feedFailure('vehicle positions', result.error));

  const located: LocatedVehicle[] = [];
  for (const vehicle of GTFSQuery.vehiclesOnRoutes(result.records, session.trackedRoutes)) {
    const location = ctx.geocoder ? await ctx.geocoder.reverse(vehicle.lat, vehicle.lon) : null;
    located.push({ vehicle, location });
  }
  return say(ctx, renderVehicles(located));
}

export const vehiclesMenu: Menu = {
  label: 'Enter command >> ',
  help: VEHICLES_HELP,
  reminder: '\n[Vehicle Tracker] Options: add <ROUTE>, remove <ROUTE>, show, routes, help, back',
  hint: "Invalid command. Type 'help' to see available options.",
  commands: new Map<string, CommandHandler>([
    ['add', addCommand],
    ['remove', removeCommand],
    ['routes', listCommand],
    ['list', listCommand],
    ['show', showVehicles],
    ['help', helpCommand(VEHICLES_HELP)],
    ['back', () => 'back'],
  ]),
};

// Stop finder

const STOP_FINDER_OPTIONS = `
[Stop Finder]
1 - Search for a stop by name
2 - Find 3 closest stops by coordinates
3 - Get all stops served by a route
B - Back to previous menu
`;

async function searchByName(ctx: AppContext): Promise<Outcome> {
  const keyword = await askFor(ctx, 'Enter part of the stop name: ');
  if (keyword === null) return 'quit';
  if (keyword === '') return say(ctx, 'Enter at least one character of the stop name.');

  return say(ctx, renderStops(ctx.store.searchStopsByName(keyword)));
}

async function nearestToCoordinates(ctx: AppContext): Promise<Outcome> {
  const lat = await askFor(ctx, 'Enter latitude: ');
  if (lat === null) return 'quit';
  const lon = await askFor(ctx, 'Enter longitude: ');
  if (lon === null) return 'quit';

  return say(ctx, renderNearestStops(GTFSQuery.nearestStops(ctx.store.loadStops(), lat, lon)));
}

async function stopsOfRoute(ctx: AppContext): Promise<Outcome> {
  const route = await askFor(ctx, 'Enter Route ID: ');
  if (route === null) return 'quit';
  if (route === '') return say(ctx, 'Enter a route ID.');

  return say(ctx, renderStops(ctx.store.stopsForRoute(route), 'No stops found for that route.'));
}

export const stopFinderMenu: Menu = {
  label: 'StopFinder >> ',
  help: 'You can look up stop IDs by name, by location or by route.',
  reminder: STOP_FINDER_OPTIONS,
  hint: 'Invalid option. Choose 1, 2, 3, or B.',
  commands: new Map<string, CommandHandler>([
    ['1', searchByName],
    ['2', nearestToCoordinates],
    ['3', stopsOfRoute],
    ['b', () => 'back'],
    ['back', () => 'back'],
  ]),
};

// Arrivals

const ARRIVALS_HELP = `
[Trip Updater]
Commands:
  find               → Find stops
  stop <STOP_ID>     → Set the stop ID for updates (must be 4-digit)
  route <ROUTE_ID>   → Show arrivals for a specific route
  routes             → Show all routes serving the stop
  all                → Show all arrivals at a stop
  clear              → Clear the currently set stop ID
  help               → Show this help message again
  back               → Return to the main menu
`;

const NEED_STOP = 'Please enter a stop ID first (use: stop <STOP_ID>)';

async function showArrivals(ctx: AppContext, stopId: string, routeFilter: string): Promise<Outcome> {
  const result = await ctx.feeds.fetchTripUpdates();
  if (!result.ok) return say(ctx, feedFailure('trip updates', result.error));

  return say(ctx, renderArrivals(GTFSQuery.arrivalsFor(result.records, stopId, routeFilter), stopId));
}

export const arrivalsMenu: Menu = {
  label: 'TripUpdater >> ',
  help: ARRIVALS_HELP,
  hint: "Invalid command. Type 'help' for options.",
  commands: new Map<string, CommandHandler>([
    [
      'stop',
      (ctx, session, argument) => {
        const stopId = parseStopId(argument);
        session.stopId = stopId;
        const stop = ctx.store.findStop(stopId);
        return say(ctx, stop ? `Stop set to ${stopId} (${stop.stop_name}).` : `Stop set to ${stopId}.`);
      },
    ],
    [
      'route',
      (ctx, session, argument) => {
        if (session.stopId === null) return say(ctx, NEED_STOP);
        if (argument === '') return say(ctx, 'Usage: route <ROUTE_ID>');
        return showArrivals(ctx, session.stopId, argument);
      },
    ],
    [
      'routes',
      (ctx, session) => {
        if (session.stopId === null) return say(ctx, NEED_STOP);
        return say(ctx, renderStopRoutes(ctx.store.routesForStop(session.stopId)));
      },
    ],
    [
      'all',
      (ctx, session) => {
        if (session.stopId === null) return say(ctx, NEED_STOP);
        return showArrivals(ctx, session.stopId, ALL_ROUTES);
      },
    ],
    [
      'clear',
      (ctx, session) => {
        session.stopId = null;
        return say(ctx, "Cleared stop ID. Use 'stop <STOP_ID>' to set a new one.");
      },
    ],
    ['find', submenu(stopFinderMenu)],
    ['help', helpCommand(ARRIVALS_HELP)],
    ['back', backToMain],
  ]),
};

// Route manager

const ROUTE_MANAGER_HELP = `
ROUTE MANAGER COMMANDS:
  add <ROUTE>    → Add a bus route to your tracking list (e.g., add 10)
  remove <ROUTE> → Remove a bus route from your tracking list
  list           → View all tracked routes
  help           → Show this help menu
  back           → Return to main menu
`;

export const routeManagerMenu: Menu = {
  label: 'Command: ',
  help: ROUTE_MANAGER_HELP,
  reminder: '\nRoute Manager: type add <ROUTE>, remove <ROUTE>, list, back',
  hint: "Invalid command. Type 'help' to see available commands.",
  commands: new Map<string, CommandHandler>([
    ['add', addCommand],
    ['remove', removeCommand],
    ['list', listCommand],
    ['help', helpCommand(ROUTE_MANAGER_HELP)],
    ['back', () => 'back'],
  ]),
};

// Main

const MAIN_HELP = `
MAIN MENU OPTIONS:
1 - View Service Alerts
2 - Track a Bus: Add/remove/view routes to track real-time vehicles
3 - Get Route Updates: Interactive tool for tracking by stop & route
4 - Manage Tracked Routes: Add/remove routes from your tracked list
5 - Agency Info
H - Help
Q - Quit the application
`;

const MAIN_OPTIONS = `
=== Transit Console ===
1. View Service Alerts
2. Track a Bus
3. Get Route Updates (Arrivals)
4. Manage Tracked Routes
5. Agency Info
H. Help
Q. Quit
`;

function introduce(text: string, menu: Menu): CommandHandler {
  const enter = submenu(menu);
  return (ctx, session, argument) => {
    ctx.prompt.print(text);
    return enter(ctx, session, argument);
  };
}

export const mainMenu: Menu = {
  label: 'Select an option: ',
  help: `
Welcome to the Transit Console!
This tool allows you to:
- View current service alerts
- Track buses on selected routes
- Get upcoming arrival times for stops
- Manage your list of routes of interest
`,
  reminder: MAIN_OPTIONS,
  hint: 'Invalid choice. Try again.',
  commands: new Map<string, CommandHandler>([
    ['1', introduce("You can choose which routes to see alerts for, or type 'all' to see everything.", alertsMenu)],
    ['2', introduce('You can track buses by route and view live vehicle positions.', vehiclesMenu)],
    ['3', introduce('You can interactively check bus arrivals by stop ID and route.', arrivalsMenu)],
    ['4', submenu(routeManagerMenu)],
    ['5', (ctx) => say(ctx, renderAgency(ctx.store.agencyInfo()))],
    ['h', helpCommand(MAIN_HELP)],
    ['help', helpCommand(MAIN_HELP)],
  ]),
};

/**
 * Run the console until the user quits or input ends
 */
export async function runConsole(ctx: AppContext, session: Session = createSession()): Promise<Session> {
  try {
    await runMenu(mainMenu, ctx, session);
  } finally {
    ctx.prompt.print('Exiting...');
  }
  return session;
}
