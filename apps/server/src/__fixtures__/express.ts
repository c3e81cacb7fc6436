import type { Request, Response } from "express";
import { vi } from "vitest";

export function mockRequest(fields: Partial<Pick<Request, "body" | "method" | "path">> = {}): Request {
  return { method: "GET", path: "/", body: undefined, ...fields } as unknown as Request;
}

/**
 * Chainable response double; the spies stay reachable for assertions.
 */
export function mockResponse() {
  const spies = {
    status: vi.fn().mockReturnThis(),
    type: vi.fn().mockReturnThis(),
    json: vi.fn().mockReturnThis(),
    send: vi.fn().mockReturnThis(),
  };
  return { res: spies as unknown as Response, ...spies };
}

export const next = vi.fn();
