import { normalizeId } from '@transit-console/gtfs-parser';

export type AlertScope = 'tracked' | 'all';

/**
 * Everything the console remembers between commands.
 * Handlers receive it explicitly; only the route functions below touch `trackedRoutes`.
 */
export interface Session {
  readonly trackedRoutes: Set<string>;
  stopId: string | null;
  alertScope: AlertScope;
}

export function createSession(): Session {
  return { trackedRoutes: new Set(), stopId: null, alertScope: 'tracked' };
}

export type RouteChange =
  | { changed: true; route: string }
  | { changed: false; route: string; reason: 'already tracked' | 'not tracked' | 'empty' };

export function addRoute(session: Session, input: string): RouteChange {
  const route = normalizeId(input);
  if (route === '') return { changed: false, route, reason: 'empty' };
  if (session.trackedRoutes.has(route)) return { changed: false, route, reason: 'already tracked' };

  session.trackedRoutes.add(route);
  return { changed: true, route };
}

export function removeRoute(session: Session, input: string): RouteChange {
  const route = normalizeId(input);
  if (route === '') return { changed: false, route, reason: 'empty' };
  if (!session.trackedRoutes.delete(route)) return { changed: false, route, reason: 'not tracked' };

  return { changed: true, route };
}

/**
 * Tracked routes in the order they were added
 */
export function listRoutes(session: Session): string[] {
  return [...session.trackedRoutes];
}
