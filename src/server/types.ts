// src/server/types.ts

import type { SessionState } from '../core/session/types';

export type ViewName = 'content' | 'login';

export type RouteResponse =
  | { kind: 'redirect'; location: string }
  | { kind: 'text'; status: number; body: string }
  | { kind: 'render'; view: ViewName; locals: Record<string, unknown> };

/**
 * What every handler hands back to the hosting layer: the state to persist
 * and the response to send.
 */
export interface RouteResult {
  state: SessionState;
  response: RouteResponse;
}

export function redirect(location: string): RouteResponse {
  return { kind: 'redirect', location };
}

export function text(status: number, body: string): RouteResponse {
  return { kind: 'text', status, body };
}

export function render(view: ViewName, locals: Record<string, unknown>): RouteResponse {
  return { kind: 'render', view, locals };
}
