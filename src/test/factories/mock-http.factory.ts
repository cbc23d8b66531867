import type { ArgumentsHost } from '@nestjs/common';
import type { Request, Response } from 'express';
import type { SessionData } from 'express-session';
import 'src/common/types/session';

type MockReqOverrides = {
  body?: Record<string, unknown>;
  method?: string;
  url?: string;
  path?: string;
  headers?: Record<string, string>;
  session?: Partial<SessionData>;
};

export function createMockReq(overrides: MockReqOverrides = {}): Request {
  const headers: Record<string, string> = {};
  for (const [k, v] of Object.entries(overrides.headers ?? {})) {
    headers[k.toLowerCase()] = v;
  }
  const url = overrides.url ?? '/';

  return {
    body: overrides.body ?? {},
    method: overrides.method ?? 'GET',
    url,
    originalUrl: url,
    path: overrides.path ?? url.split('?')[0],
    headers,
    query: {},
    ip: '127.0.0.1',
    xhr: false,
    get: jest.fn((name: string) => headers[name.toLowerCase()]),
    session: { ...overrides.session },
  } as unknown as Request;
}

export function createMockRes(): Response {
  const res = {
    locals: {},
    status: jest.fn(),
    json: jest.fn(),
    render: jest.fn(),
    redirect: jest.fn(),
    setHeader: jest.fn(),
    cookie: jest.fn(),
    clearCookie: jest.fn(),
  };
  res.status.mockReturnValue(res);
  return res as unknown as Response;
}

export function createMockHost(req: Request, res: Response): ArgumentsHost {
  return {
    switchToHttp: () => ({
      getRequest: () => req,
      getResponse: () => res,
      getNext: () => jest.fn(),
    }),
  } as unknown as ArgumentsHost;
}
