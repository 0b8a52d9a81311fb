import { VcenterHttpError, VcenterParseError, vapiErrorMessages } from './client';
import { SoapFaultError } from './soap';

import { ModuleFailure } from '@/lib/errors/error';
import { ErrorCode } from '@/lib/errors/error-codes';

import type { AppError, JsonValue } from '@/lib/errors/error';

const BODY_EXCERPT_LIMIT = 500;

function causeOf(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  // undici reports connection failures as `TypeError: fetch failed` with the socket error as cause.
  if (err.cause instanceof Error && err.cause.message) return `${err.message}: ${err.cause.message}`;
  return err.message;
}

function isNetworkError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if (err.name === 'AbortError' || err.name === 'TimeoutError') return true;
  return err instanceof TypeError && err.message === 'fetch failed';
}

function fromHttpError(err: VcenterHttpError): Pick<AppError, 'code' | 'category' | 'message' | 'retryable'> {
  const vendorMessage = vapiErrorMessages(err.bodyText).join(' ');
  if (err.status === 401) {
    return {
      code: ErrorCode.VCENTER_AUTH_FAILED,
      category: 'auth',
      message: vendorMessage || 'authentication failed',
      retryable: false,
    };
  }
  if (err.status === 403) {
    return {
      code: ErrorCode.VCENTER_PERMISSION_DENIED,
      category: 'permission',
      message: vendorMessage || 'permission denied',
      retryable: false,
    };
  }
  return {
    code: ErrorCode.VCENTER_API_ERROR,
    category: err.status === 404 ? 'not_found' : 'unknown',
    message: vendorMessage || err.message,
    retryable: false,
  };
}

function fromSoapFault(err: SoapFaultError): Pick<AppError, 'code' | 'category' | 'message' | 'retryable'> {
  if (err.faultType === 'InvalidLogin') {
    return { code: ErrorCode.VCENTER_AUTH_FAILED, category: 'auth', message: err.faultString, retryable: false };
  }
  if (err.faultType === 'NoPermission') {
    return {
      code: ErrorCode.VCENTER_PERMISSION_DENIED,
      category: 'permission',
      message: err.faultString,
      retryable: false,
    };
  }
  return { code: ErrorCode.VCENTER_SOAP_FAULT, category: 'unknown', message: err.faultString, retryable: false };
}

/**
 * Maps anything thrown by the REST or SOAP clients to the module error shape. The vendor's message is
 * kept verbatim as `message`; the raw body only goes into `redacted_context`.
 */
export function toVcenterError(err: unknown, stage: string): AppError {
  if (err instanceof ModuleFailure) return err.error;

  const context: Record<string, JsonValue> = { stage };
  let base: Pick<AppError, 'code' | 'category' | 'message' | 'retryable'>;

  if (err instanceof VcenterHttpError) {
    base = fromHttpError(err);
    context.op = err.op;
    context.status = err.status;
    if (err.bodyText) context.body_excerpt = err.bodyText.slice(0, BODY_EXCERPT_LIMIT);
  } else if (err instanceof SoapFaultError) {
    base = fromSoapFault(err);
    context.op = err.op;
    context.status = err.status;
    if (err.faultType) context.fault_type = err.faultType;
  } else if (err instanceof VcenterParseError) {
    base = { code: ErrorCode.VCENTER_PARSE_ERROR, category: 'parse', message: err.message, retryable: false };
    context.op = err.op;
  } else if (isNetworkError(err)) {
    const timedOut = err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
    base = {
      code: ErrorCode.VCENTER_NETWORK_ERROR,
      category: 'network',
      message: timedOut ? 'vcenter request timed out' : `vcenter request failed: ${causeOf(err)}`,
      retryable: true,
    };
  } else {
    base = { code: ErrorCode.VCENTER_API_ERROR, category: 'unknown', message: causeOf(err), retryable: false };
  }

  context.cause = causeOf(err);
  return { ...base, redacted_context: context };
}
