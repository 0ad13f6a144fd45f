import { describe, expect, it } from "vitest";
import { isTransientFailure, toProviderError } from "../../../../src/adapters/gam/errors.js";
import { AdapterError, NotFoundError, TransientNetworkError } from "../../../../src/core/errors.js";

describe("isTransientFailure", () => {
  it("recognises socket error codes", () => {
    expect(isTransientFailure(Object.assign(new Error("timeout"), { code: "ETIMEDOUT" }))).toBe(true);
    expect(isTransientFailure(Object.assign(new Error("denied"), { code: "EACCES" }))).toBe(false);
  });

  it("recognises 5xx and 429 responses", () => {
    expect(isTransientFailure({ response: { status: 503 } })).toBe(true);
    expect(isTransientFailure({ statusCode: 429 })).toBe(true);
    expect(isTransientFailure({ status: 404 })).toBe(false);
  });

  it("recognises retryable SOAP faults", () => {
    expect(isTransientFailure(new Error("[ServerError.SERVER_BUSY @ ]"))).toBe(true);
    expect(isTransientFailure(new Error("[QuotaError.EXCEEDED_QUOTA @ ]"))).toBe(true);
    expect(isTransientFailure(new Error("[AuthenticationError.NOT_WHITELISTED_FOR_API_ACCESS @ ]"))).toBe(false);
  });

  it("judges a SOAP fault by its reason, not the HTTP 500 it came with", () => {
    const notFound = Object.assign(new Error("soap:Server: [CommonError.NOT_FOUND @ lineItemId]"), {
      response: { status: 500 },
    });
    const busy = Object.assign(new Error("soap:Server: [ServerError.SERVER_BUSY @ ]"), {
      response: { status: 500 },
    });
    expect(isTransientFailure(notFound)).toBe(false);
    expect(isTransientFailure(busy)).toBe(true);
  });

  it("reads fault reasons from the parsed envelope", () => {
    const fault = (reason: string) =>
      Object.assign(new Error("soap:Server: request failed"), {
        response: { status: 500 },
        root: { Envelope: { Body: { Fault: { faultstring: `[${reason} @ ]` } } } },
      });
    expect(isTransientFailure(fault("PermissionError.PERMISSION_DENIED"))).toBe(false);
    expect(isTransientFailure(fault("QuotaError.EXCEEDED_QUOTA"))).toBe(true);
  });

  it("looks through causes", () => {
    const socket = Object.assign(new Error("reset"), { code: "ECONNRESET" });
    expect(isTransientFailure(new Error("request failed", { cause: socket }))).toBe(true);
  });

  it("ignores non-objects", () => {
    expect(isTransientFailure("ECONNRESET")).toBe(false);
    expect(isTransientFailure(undefined)).toBe(false);
  });
});

describe("toProviderError", () => {
  it("passes domain errors through", () => {
    const notFound = new NotFoundError("LineItem", "300");
    expect(toProviderError(notFound, "getLineItem")).toBe(notFound);
  });

  it("wraps transient and fatal failures", () => {
    const busy = toProviderError(new Error("[ServerError.SERVER_BUSY @ ]"), "getOrders");
    expect(busy).toBeInstanceOf(TransientNetworkError);
    expect(busy.message).toBe("GAM getOrders failed transiently: [ServerError.SERVER_BUSY @ ]");

    const fatal = toProviderError("bad request", "getOrders");
    expect(fatal).toBeInstanceOf(AdapterError);
    expect(fatal.message).toBe("GAM getOrders failed: bad request");
    expect(fatal.retryable).toBe(false);
  });

  it("keeps a not-found fault fatal when it arrives over HTTP 500", () => {
    const fault = Object.assign(new Error("soap:Server: [CommonError.NOT_FOUND @ id]"), { response: { status: 500 } });
    const error = toProviderError(fault, "getLineItem");
    expect(error).toBeInstanceOf(AdapterError);
    expect(error.retryable).toBe(false);
  });
});
