import { useCallback, useEffect, useState } from 'react';

export type Route = 'projects' | 'workflow' | 'sprint' | 'agents' | 'claude';

export const ROUTES: readonly Route[] = ['projects', 'workflow', 'sprint', 'agents', 'claude'];

/** Views that show pushed state and so keep the event stream open */
const LIVE_ROUTES: ReadonlySet<Route> = new Set<Route>(['workflow', 'sprint', 'claude']);

function isRoute(value: string): value is Route {
  return ROUTES.some((route) => route === value);
}

/** `#/sprint` → 'sprint'; anything unknown falls back to the project picker */
export function parseRoute(hash: string): Route {
  const name = hash.replace(/^#\/?/, '').split(/[/?]/)[0].toLowerCase();
  return isRoute(name) ? name : 'projects';
}

export function routeHref(route: Route): string {
  return `#/${route}`;
}

export function needsLiveUpdates(route: Route): boolean {
  return LIVE_ROUTES.has(route);
}

export function useHashRoute(): [Route, (route: Route) => void] {
  const [route, setRoute] = useState<Route>(() => parseRoute(window.location.hash));

  useEffect(() => {
    const onHashChange = () => setRoute(parseRoute(window.location.hash));
    window.addEventListener('hashchange', onHashChange);
    return () => window.removeEventListener('hashchange', onHashChange);
  }, []);

  const navigate = useCallback((next: Route) => {
    window.location.hash = routeHref(next);
  }, []);

  return [route, navigate];
}
