import { describe, it, expect } from "vitest";

import { CodecError, DataValidationError } from "../../chart/errors";
import { mockRequest, mockResponse, next } from "../../__fixtures__/express";
import { errorHandler, notFound } from "../error";

const req = mockRequest({ method: "POST", path: "/api/chart/render" });

describe("errorHandler", () => {
  it("should surface chart errors with their status and code", () => {
    const { res, status, json } = mockResponse();
    errorHandler(new DataValidationError("open<low", 3), req, res, next);

    expect(status).toHaveBeenCalledWith(400);
    expect(json).toHaveBeenCalledWith({
      ok: false,
      error: { code: "INVALID_SERIES", message: "bar 3: open<low" },
    });
  });

  it("should map codec failures to 500", () => {
    const { res, status, json } = mockResponse();
    errorHandler(new CodecError("failed to write out.png: disk full"), req, res, next);

    expect(status).toHaveBeenCalledWith(500);
    expect(json).toHaveBeenCalledWith({
      ok: false,
      error: { code: "CODEC_FAILED", message: "failed to write out.png: disk full" },
    });
  });

  it("should treat unknown errors as internal", () => {
    const { res, status, json } = mockResponse();
    errorHandler(new Error("boom"), req, res, next);

    expect(status).toHaveBeenCalledWith(500);
    expect(json).toHaveBeenCalledWith({
      ok: false,
      error: { code: "INTERNAL_ERROR", message: "boom" },
    });
  });

  it("should not echo thrown non-errors", () => {
    const { res, json } = mockResponse();
    errorHandler("secret", req, res, next);

    expect(json).toHaveBeenCalledWith({
      ok: false,
      error: { code: "INTERNAL_ERROR", message: "Unexpected server error" },
    });
  });
});

describe("notFound", () => {
  it("should name the missing route", () => {
    const { res, status, json } = mockResponse();
    notFound(mockRequest({ method: "GET", path: "/nope" }), res);

    expect(status).toHaveBeenCalledWith(404);
    expect(json).toHaveBeenCalledWith({
      ok: false,
      error: { code: "NOT_FOUND", message: "Route not found: GET /nope" },
    });
  });
});
