/**
 * Classify failures coming out of the GAM SDK into transient and fatal domain errors.
 */

import { AdapterError, DomainError, TransientNetworkError, errorMessage } from "../../core/errors.js";
import { TRANSIENT_API_FAULTS, TRANSIENT_NETWORK_CODES, ADAPTER_TYPE } from "./utils/constants.js";

const MAX_CAUSE_DEPTH = 5;

function statusOf(err: object): unknown {
  if ("status" in err) return err.status;
  if ("statusCode" in err) return err.statusCode;
  if ("response" in err && typeof err.response === "object" && err.response !== null && "status" in err.response) {
    return err.response.status;
  }
  return undefined;
}

const FAULT_REASON_PATTERN = /\[\w+\.\w+ @/;

/** The `Body.Fault` node the SOAP client attaches as `root` when GAM answers with a fault. */
function soapFaultOf(err: object): unknown {
  const root = "root" in err ? err.root : undefined;
  if (typeof root !== "object" || root === null || !("Envelope" in root)) return undefined;
  const envelope = root.Envelope;
  if (typeof envelope !== "object" || envelope === null || !("Body" in envelope)) return undefined;
  const body = envelope.Body;
  if (typeof body !== "object" || body === null || !("Fault" in body)) return undefined;
  return body.Fault;
}

/** Text holding the fault reasons, or undefined when the error is not a SOAP fault. */
function faultTextOf(err: object): string | undefined {
  const message = err instanceof Error ? err.message : "";
  const fault = soapFaultOf(err);
  if (fault !== undefined) return `${message} ${JSON.stringify(fault)}`;
  return FAULT_REASON_PATTERN.test(message) ? message : undefined;
}

function isTransientLink(err: object): boolean {
  if ("code" in err && typeof err.code === "string" && TRANSIENT_NETWORK_CODES.has(err.code)) {
    return true;
  }
  // GAM sends every fault over HTTP 500, so a parsed fault is judged by its reason alone.
  const faultText = faultTextOf(err);
  if (faultText !== undefined) {
    return TRANSIENT_API_FAULTS.some((fault) => faultText.includes(fault));
  }
  const status = statusOf(err);
  return typeof status === "number" && (status >= 500 || status === 429);
}

/**
 * Walk the error and its causes looking for a socket code, a retryable fault, or
 * (when no fault was parsed) a 5xx/429 status.
 */
export function isTransientFailure(err: unknown): boolean {
  let current: unknown = err;
  for (let depth = 0; depth < MAX_CAUSE_DEPTH; depth++) {
    if (typeof current !== "object" || current === null) return false;
    if (isTransientLink(current)) return true;
    current = "cause" in current ? current.cause : undefined;
  }
  return false;
}

export function toProviderError(err: unknown, operation: string): DomainError {
  if (err instanceof DomainError) return err;
  if (isTransientFailure(err)) {
    return new TransientNetworkError(`GAM ${operation} failed transiently: ${errorMessage(err)}`, err);
  }
  return new AdapterError(`GAM ${operation} failed: ${errorMessage(err)}`, ADAPTER_TYPE, err);
}
