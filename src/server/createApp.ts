// src/server/createApp.ts

import express, {
  type ErrorRequestHandler,
  type Express,
  type Request,
  type RequestHandler,
  type Response,
} from 'express';
import cookieParser from 'cookie-parser';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { SavedHub } from '../hub';
import type { SessionState } from '../core/session/types';
import type { CallbackParams } from '../core/auth/types';
import type { RouteResponse, RouteResult } from './types';

export const SESSION_COOKIE = 'sid';

type Handler = (state: SessionState, params: CallbackParams) => Promise<RouteResult>;

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function readCallbackParams(req: Request): CallbackParams {
  return {
    code: queryString(req.query.code),
    state: queryString(req.query.state),
    error: queryString(req.query.error),
  };
}

function send(res: Response, response: RouteResponse): void {
  switch (response.kind) {
    case 'redirect':
      res.redirect(302, response.location);
      return;
    case 'text':
      res.status(response.status).type('text/plain').send(response.body);
      return;
    case 'render':
      res.render(response.view, response.locals);
      return;
  }
}

/**
 * Express transport around the route controller.
 *
 * Session state is looked up by a signed `sid` cookie, handed to the
 * handler, and whatever state the handler returns is saved back.
 */
export function createApp(hub: SavedHub): Express {
  const app = express();
  const { session, baseUrl } = hub.config;

  app.disable('x-powered-by');
  app.set('view engine', 'ejs');
  app.set('views', path.join(__dirname, '../../views'));
  app.use(cookieParser(session.secret));

  const resolveSessionId = (req: Request, res: Response): string => {
    // cookie-parser leaves `false` for a cookie whose signature does not verify
    const existing: unknown = req.signedCookies[SESSION_COOKIE];
    if (typeof existing === 'string' && existing.length > 0) {
      return existing;
    }

    const sessionId = uuidv4();
    res.cookie(SESSION_COOKIE, sessionId, {
      signed: true,
      httpOnly: true,
      sameSite: 'lax',
      secure: baseUrl.startsWith('https://'),
      maxAge: session.ttlSeconds * 1000,
    });
    return sessionId;
  };

  const handle =
    (handler: Handler): RequestHandler =>
    async (req, res, next) => {
      try {
        const sessionId = resolveSessionId(req, res);
        const state = await hub.sessions.load(sessionId);
        const result = await handler(state, readCallbackParams(req));
        await hub.sessions.save(sessionId, result.state);
        send(res, result.response);
      } catch (error) {
        next(error);
      }
    };

  const { controller } = hub;

  app.get('/', handle((state) => controller.index(state)));
  app.get('/login', handle((state) => controller.login(state)));
  app.get('/youtube-login', handle((state) => controller.youtubeLogin(state)));
  app.get('/reddit-login', handle((state) => controller.redditLogin(state)));
  app.get('/youtube-callback', handle((state, params) => controller.youtubeCallback(state, params)));
  app.get('/reddit-callback', handle((state, params) => controller.redditCallback(state, params)));
  app.get('/logout-youtube', handle((state) => controller.logoutYoutube(state)));
  app.get('/logout-reddit', handle((state) => controller.logoutReddit(state)));
  app.get('/sync', handle((state) => controller.sync(state)));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  app.get('/metrics', async (_req, res, next) => {
    try {
      res.type(hub.metrics.contentType);
      res.send(await hub.metrics.getMetrics());
    } catch (error) {
      next(error);
    }
  });

  const onError: ErrorRequestHandler = (error: unknown, req, res, _next) => {
    hub.logger.error('Request failed', { path: req.path, error });
    res.status(500).type('text/plain').send('Internal Server Error');
  };
  app.use(onError);

  return app;
}
